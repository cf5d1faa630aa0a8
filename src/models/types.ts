import type { ModelDefinition } from '../config/schema.js';

export type { ModelDefinition } from '../config/schema.js';

export interface AvailableModel {
  id: string;
  definition: ModelDefinition;
  /** Absolute path of the matched GGUF file */
  path: string;
}

export interface ModelRegistryOptions {
  modelsDir: string;
  cacheDir: string;
  /** Preferred model for autoSelect() when it is available */
  defaultModel?: string | null;
}

/**
 * Whether `filename` (a base name, not a path) satisfies the definition:
 * exact name when `filename` is set, otherwise the case-insensitive pattern.
 */
export function matchesFile(definition: ModelDefinition, filename: string): boolean {
  if (definition.filename !== undefined) {
    return filename === definition.filename;
  }
  if (definition.filenamePattern !== undefined) {
    return new RegExp(definition.filenamePattern, 'i').test(filename);
  }
  return false;
}

/**
 * Rough VRAM estimate in GB: KV cache for the context plus a fixed base.
 */
export function estimateVramGb(definition: ModelDefinition): number {
  const kvCacheGb = (definition.ctxSize * 2 * 128 * 32) / 1024 ** 3;
  return Math.round((kvCacheGb + 2) * 100) / 100;
}
