import { QuoteRequest } from '../models/types';
import { InvalidShippingOptionError } from '../engine/errors';
import {
  EXPEDITED_OPTIONS,
  SHIPPING_TIERS,
  isExpeditedOption,
  isShippingTier
} from '../engine/schemas';

export interface RawQuoteOptions {
  quantity: number;
  shipping?: string;
  expedited?: string;
}

/**
 * Narrow command-line strings into a QuoteRequest. Both shipping fields are
 * passed through as given so the engine can reject the combination.
 */
export function buildQuoteRequest(options: RawQuoteOptions): QuoteRequest {
  const request: QuoteRequest = { quantity: options.quantity };

  if (options.shipping !== undefined) {
    const tier = options.shipping.toLowerCase();
    if (!isShippingTier(tier)) {
      throw new InvalidShippingOptionError('shipping tier', options.shipping, SHIPPING_TIERS);
    }
    request.shippingTier = tier;
  }

  if (options.expedited !== undefined) {
    if (!isExpeditedOption(options.expedited)) {
      throw new InvalidShippingOptionError('expedited option', options.expedited, EXPEDITED_OPTIONS);
    }
    request.expedited = options.expedited;
  }

  return request;
}

/**
 * Interactive answers arrive as one list choice covering both tiers and
 * legacy expedited options.
 */
export function requestFromChoice(quantity: number, choice: string): QuoteRequest {
  if (isExpeditedOption(choice)) {
    return { quantity, expedited: choice };
  }
  return buildQuoteRequest({ quantity, shipping: choice });
}
