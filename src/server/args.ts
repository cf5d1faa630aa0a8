/**
 * llama-server command line construction.
 */

import type { AvailableModel, ModelDefinition } from '../models/types.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('server-args');

export interface ServerArgsOptions {
  host: string;
  port: number;
  useCache: boolean;
  cachePath: string;
  extraArgs: readonly string[];
  availableModels: readonly AvailableModel[];
  ctxSize?: number;
}

export interface ServerArgs {
  args: string[];
  /** Draft model attached for speculative decoding, if any */
  draft: AvailableModel | null;
}

/**
 * Build the argument vector for a model. The same inputs always produce
 * the same vector, in the same order.
 */
export function buildServerArgs(definition: ModelDefinition, modelPath: string, options: ServerArgsOptions): ServerArgs {
  const args = [
    '--model', modelPath,
    '--alias', definition.id,
    '--ctx-size', String(options.ctxSize ?? definition.ctxSize),
    '--n-gpu-layers', String(definition.nGpuLayers),
    '--threads', String(definition.threads),
    '--batch-size', String(definition.batchSize),
    '--ubatch-size', String(definition.ubatchSize),
    '--host', options.host,
    '--port', String(options.port),
    '--temp', String(definition.temperature),
    '--top-p', String(definition.topP),
    '--top-k', String(definition.topK),
  ];

  if (definition.cacheTypeK) {
    args.push('--cache-type-k', definition.cacheTypeK);
  }
  if (definition.cacheTypeV) {
    args.push('--cache-type-v', definition.cacheTypeV);
  }
  if (definition.flashAttn) {
    args.push('--flash-attn');
  }
  if (definition.mlock) {
    args.push('--mlock');
  }
  if (!definition.mmap) {
    args.push('--no-mmap');
  }
  args.push(definition.contBatching ? '--cont-batching' : '--no-cont-batching');

  const draft = resolveDraft(definition, options.availableModels);
  if (draft) {
    args.push(
      '--model-draft', draft.path,
      '--draft-max', String(definition.draftMax),
      '--draft-p-min', String(definition.draftPMin)
    );
  }

  if (options.useCache) {
    args.push('--slot-save-path', options.cachePath);
  }

  args.push(...options.extraArgs);

  return { args, draft };
}

function resolveDraft(definition: ModelDefinition, availableModels: readonly AvailableModel[]): AvailableModel | null {
  if (!definition.draftModel) {
    return null;
  }

  const draft = availableModels.find((model) => model.id === definition.draftModel);
  if (!draft) {
    logger.warn(
      `Draft model "${definition.draftModel}" for "${definition.id}" is not available, ` +
      'starting without speculative decoding'
    );
    return null;
  }
  return draft;
}
