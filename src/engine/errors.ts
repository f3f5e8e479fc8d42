/**
 * Errors raised at the request boundary or while loading static tables.
 * `code` is stable and safe to branch on; Temporal uses the class name as the
 * failure type.
 */
export class QuoteError extends Error {
  readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class InvalidGeometryError extends QuoteError {
  readonly violations: string[];

  constructor(violations: string[]) {
    super('INVALID_GEOMETRY', `Invalid geometry metrics: ${violations.join('; ')}`);
    this.violations = violations;
  }
}

export class InvalidQuantityError extends QuoteError {
  constructor(quantity: number) {
    super('INVALID_QUANTITY', `Quantity must be a positive integer, got ${quantity}`);
  }
}

export class ConflictingShippingOptionsError extends QuoteError {
  constructor(shippingTier: string, expedited: string) {
    super(
      'CONFLICTING_SHIPPING_OPTIONS',
      `Choose either a shipping tier or an expedited option, not both (got shipping tier "${shippingTier}" and expedited "${expedited}")`
    );
  }
}

export class InvalidShippingOptionError extends QuoteError {
  constructor(kind: 'shipping tier' | 'expedited option', value: string, allowed: readonly string[]) {
    super('INVALID_SHIPPING_OPTION', `Unknown ${kind} "${value}" (expected one of ${allowed.join(', ')})`);
  }
}

export class BlockSelectionError extends QuoteError {
  constructor(dimensions: [number, number, number], largest: [number, number, number] | null) {
    const box = dimensions.map(d => d.toFixed(1)).join(' x ');
    const limit = largest ? ` (largest stock block is ${largest.join(' x ')} mm)` : ' (block catalog is empty)';
    super('BLOCK_SELECTION_EXHAUSTED', `Part is too large for available block sizes: ${box} mm${limit}`);
  }
}

export class ConfigurationError extends QuoteError {
  readonly file: string;

  constructor(file: string, detail: string) {
    super('INVALID_CONFIGURATION', `Invalid configuration in ${file}: ${detail}`);
    this.file = file;
  }
}

export class GeometryFileError extends QuoteError {
  readonly file: string;

  constructor(file: string, detail: string) {
    super('INVALID_GEOMETRY_FILE', `Failed to load geometry metrics from ${file}: ${detail}`);
    this.file = file;
  }
}

export const NON_RETRYABLE_ERROR_TYPES = [
  'QuoteError',
  'InvalidGeometryError',
  'InvalidQuantityError',
  'ConflictingShippingOptionsError',
  'InvalidShippingOptionError',
  'BlockSelectionError',
  'ConfigurationError',
  'GeometryFileError'
];
