import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { GeometryMetrics } from '../models/types';
import { GeometryFileError, InvalidGeometryError } from '../engine/errors';
import { validateGeometry } from '../engine/schemas';

// Shrink-wrap is approximated as a fixed share of the convex hull
export const SHRINK_WRAP_RATIO = 0.8;

/**
 * The geometry extraction step writes one JSON document per part. Units
 * default to millimetres; documents measured in metres are scaled on load.
 */
const GeometryDocumentSchema = z.object({
  name: z.string().optional(),
  units: z.enum(['mm', 'm']).default('mm'),
  length: z.number(),
  width: z.number(),
  height: z.number(),
  volume: z.number(),
  surfaceArea: z.number(),
  convexHullVolume: z.number(),
  shrinkWrapVolume: z.number().optional(),
  faceCount: z.number(),
  edgeCount: z.number()
});

export type GeometryDocument = z.input<typeof GeometryDocumentSchema>;

export interface LoadedGeometry {
  name: string;
  metrics: GeometryMetrics;
}

export function normalizeGeometry(document: z.output<typeof GeometryDocumentSchema>): GeometryMetrics {
  const linear = document.units === 'm' ? 1e3 : 1;
  const area = linear * linear;
  const cubic = area * linear;
  const convexHullVolume = document.convexHullVolume * cubic;

  return {
    length: document.length * linear,
    width: document.width * linear,
    height: document.height * linear,
    volume: document.volume * cubic,
    surfaceArea: document.surfaceArea * area,
    convexHullVolume,
    shrinkWrapVolume: document.shrinkWrapVolume !== undefined
      ? document.shrinkWrapVolume * cubic
      : convexHullVolume * SHRINK_WRAP_RATIO,
    faceCount: document.faceCount,
    edgeCount: document.edgeCount
  };
}

/**
 * Read and validate a geometry metrics file.
 */
export function loadGeometryMetrics(filePath: string): LoadedGeometry {
  let json: unknown;
  try {
    json = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new GeometryFileError(filePath, message);
  }

  const document = GeometryDocumentSchema.safeParse(json);
  if (!document.success) {
    const detail = document.error.issues
      .map(issue => `${issue.path.join('.') || 'document'}: ${issue.message}`)
      .join('; ');
    throw new GeometryFileError(filePath, detail);
  }

  const metrics = normalizeGeometry(document.data);
  const validation = validateGeometry(metrics);
  if (!validation.isValid || !validation.data) {
    throw new InvalidGeometryError(validation.violations);
  }

  return {
    name: document.data.name || path.basename(filePath, path.extname(filePath)),
    metrics: validation.data
  };
}
