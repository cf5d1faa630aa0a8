/**
 * Model Registry
 *
 * Resolves logical model ids to GGUF files in the models directory.
 * Every scan builds a fresh snapshot and swaps it in whole, so readers
 * never observe a half-populated map.
 */

import { readdir } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import { createLogger } from '../utils/logger.js';
import { matchesFile, type AvailableModel, type ModelDefinition, type ModelRegistryOptions } from './types.js';

const logger = createLogger('registry');

const GGUF_EXTENSION = /\.gguf$/i;

export class ModelRegistry {
  private readonly definitions: readonly ModelDefinition[];
  private readonly options: ModelRegistryOptions;
  private snapshot: ReadonlyMap<string, AvailableModel> = new Map();

  constructor(definitions: readonly ModelDefinition[], options: ModelRegistryOptions) {
    this.definitions = definitions;
    this.options = options;
  }

  /**
   * Create a registry and run the initial scan.
   */
  static async create(definitions: readonly ModelDefinition[], options: ModelRegistryOptions): Promise<ModelRegistry> {
    const registry = new ModelRegistry(definitions, options);
    await registry.scan();
    return registry;
  }

  /**
   * Match every definition against the models directory.
   *
   * Definitions are visited in declaration order and files in sorted name
   * order. A file belongs to the first definition that matches it; later
   * definitions skip claimed files.
   */
  async scan(): Promise<void> {
    const files = await this.listModelFiles();
    const next = new Map<string, AvailableModel>();
    const claimed = new Map<string, string>();

    for (const definition of this.definitions) {
      let shadowedBy: string | null = null;
      let match: string | null = null;

      for (const file of files) {
        if (!matchesFile(definition, file)) continue;
        const owner = claimed.get(file);
        if (owner !== undefined) {
          shadowedBy ??= owner;
          continue;
        }
        match = file;
        break;
      }

      if (match !== null) {
        claimed.set(match, definition.id);
        next.set(definition.id, {
          id: definition.id,
          definition,
          path: resolve(this.options.modelsDir, match),
        });
      } else if (shadowedBy !== null) {
        logger.warn(`Model "${definition.id}" only matches files already claimed by "${shadowedBy}"`);
      }
    }

    this.snapshot = next;
    logger.debug(`Scan found ${next.size} of ${this.definitions.length} models in ${this.options.modelsDir}`);
  }

  /**
   * Re-scan the models directory.
   */
  refresh(): Promise<void> {
    return this.scan();
  }

  /**
   * Available models in declaration order.
   */
  available(): AvailableModel[] {
    return [...this.snapshot.values()];
  }

  byId(id: string): AvailableModel | null {
    return this.snapshot.get(id) ?? null;
  }

  isAvailable(id: string): boolean {
    return this.snapshot.has(id);
  }

  /**
   * The configured default if available, otherwise the lowest priority
   * number (ties keep declaration order).
   */
  autoSelect(): AvailableModel | null {
    const { defaultModel } = this.options;
    if (defaultModel) {
      const preferred = this.snapshot.get(defaultModel);
      if (preferred) {
        return preferred;
      }
    }

    const candidates = this.available();
    if (candidates.length === 0) {
      return null;
    }

    // Array.prototype.sort is stable, so equal priorities keep their order
    candidates.sort((a, b) => a.definition.priority - b.definition.priority);
    return candidates[0] ?? null;
  }

  /**
   * Prompt cache file for a model.
   */
  cachePath(id: string): string {
    return join(this.options.cacheDir, `${id}.cache`);
  }

  private async listModelFiles(): Promise<string[]> {
    try {
      const entries = await readdir(this.options.modelsDir, { withFileTypes: true });
      return entries
        .filter((entry) => entry.isFile() && GGUF_EXTENSION.test(entry.name))
        .map((entry) => entry.name)
        .sort();
    } catch (error) {
      if (error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'ENOTDIR')) {
        logger.debug(`Models directory ${this.options.modelsDir} does not exist`);
        return [];
      }
      throw error;
    }
  }
}
