/**
 * Zod schemas for the manager configuration file.
 *
 * Defaults that depend on the OS (directories, binary location, Steam
 * logs) come from the Platform passed to createSystemConfigSchema().
 */

import os from 'node:os';
import { join } from 'node:path';
import { z } from 'zod';
import type { Platform } from '../platform/types.js';

// ============= Model definitions =============

export const KvCacheTypeSchema = z.enum(['f32', 'f16', 'bf16', 'q8_0', 'q4_0', 'q4_1', 'iq4_nl', 'q5_0', 'q5_1']);

export type KvCacheType = z.infer<typeof KvCacheTypeSchema>;

function isValidRegex(pattern: string): boolean {
  try {
    new RegExp(pattern, 'i');
    return true;
  } catch {
    return false;
  }
}

export const ModelDefinitionSchema = z
  .object({
    id: z.string().min(1),
    name: z.string().min(1),
    description: z.string().default(''),

    // File matching
    filename: z.string().min(1).optional(),
    filenamePattern: z
      .string()
      .min(1)
      .refine(isValidRegex, 'filenamePattern is not a valid regular expression')
      .optional(),

    // llama-server sizing
    ctxSize: z.number().int().positive().default(8192),
    nGpuLayers: z.number().int().min(0).default(99),
    threads: z.number().int().positive().default(8),
    batchSize: z.number().int().positive().default(4096),
    ubatchSize: z.number().int().positive().default(1024),

    // Memory & performance
    flashAttn: z.boolean().default(true),
    mlock: z.boolean().default(true),
    mmap: z.boolean().default(true),
    contBatching: z.boolean().default(true),
    cacheTypeK: KvCacheTypeSchema.optional(),
    cacheTypeV: KvCacheTypeSchema.optional(),

    // Sampling
    temperature: z.number().min(0).max(2).default(0.6),
    topP: z.number().min(0).max(1).default(0.95),
    topK: z.number().int().min(0).default(40),

    /** Lower wins in auto-selection */
    priority: z.number().int().min(1).max(10).default(5),
    tags: z.array(z.string()).default([]),

    // Speculative decoding
    draftModel: z.string().min(1).optional(),
    draftMax: z.number().int().positive().default(16),
    draftPMin: z.number().min(0).max(1).default(0.75),
  })
  .refine((def) => def.filename !== undefined || def.filenamePattern !== undefined, {
    message: "Either 'filename' or 'filenamePattern' must be set",
  });

export type ModelDefinition = z.infer<typeof ModelDefinitionSchema>;
export type ModelDefinitionInput = z.input<typeof ModelDefinitionSchema>;

// ============= System configuration =============

export function expandHome(path: string, home: string = os.homedir()): string {
  if (path === '~') return home;
  if (path.startsWith('~/') || path.startsWith('~\\')) {
    return join(home, path.slice(2));
  }
  return path;
}

export const DEFAULT_PROCESSES_TO_KILL = ['chrome', 'firefox', 'msedge', 'Discord', 'slack', 'teams'];

export function createSystemConfigSchema(platform: Platform) {
  const path = z.string().min(1).transform((p) => expandHome(p));

  const ServerConfigSchema = z.object({
    host: z.string().min(1).default('127.0.0.1'),
    port: z.number().int().min(1024).max(65535).default(8080),
    llamaServerPath: path.default(platform.llamaServerPath()),
    modelsDir: path.default(platform.defaultModelsDir()),
    cacheDir: path.default(platform.defaultCacheDir()),
    logDir: path.default(platform.defaultLogDir()),
    defaultModel: z.string().min(1).nullable().default(null),
    autoStart: z.boolean().default(false),
  });

  const SteamConfigSchema = z.object({
    enabled: z.boolean().default(true),
    steamLogsDir: path.default(platform.steamLogsDir() ?? join(os.homedir(), '.steam')),
    logFile: z.string().min(1).default('gameprocess_log.txt'),
    stopAiOnGame: z.boolean().default(true),
    saveCacheOnStop: z.boolean().default(true),
    restartAiAfterGame: z.boolean().default(true),
    /** Model to bring back after gaming when none was captured at launch */
    restoreModel: z.string().min(1).nullable().default(null),
    /** Exact process names (case-insensitive, `.exe` optional) killed on game launch */
    processesToKill: z.array(z.string().min(1)).default(DEFAULT_PROCESSES_TO_KILL),
  });

  const OpencodeConfigSchema = z.object({
    configDir: path.default(join(platform.defaultConfigDir(), '..', 'opencode')),
    configFile: z.string().min(1).default('oh-my-opencode.json'),
    localAgentName: z.string().min(1).default('local'),
    cloudAgentName: z.string().min(1).default('cloud'),
  });

  return z
    .object({
      version: z.string().default('2.0.0'),
      server: ServerConfigSchema.default({}),
      steam: SteamConfigSchema.default({}),
      opencode: OpencodeConfigSchema.default({}),
      models: z.array(ModelDefinitionSchema).default([]),
      verbose: z.boolean().default(false),
      autoShutdownOnExit: z.boolean().default(false),
    })
    .superRefine((config, ctx) => {
      const seen = new Set<string>();
      config.models.forEach((model, index) => {
        if (seen.has(model.id)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['models', index, 'id'],
            message: `Duplicate model id "${model.id}"`,
          });
        }
        seen.add(model.id);
      });
    });
}

export type SystemConfigSchema = ReturnType<typeof createSystemConfigSchema>;
export type SystemConfig = z.infer<SystemConfigSchema>;
export type SystemConfigInput = z.input<SystemConfigSchema>;
export type ServerConfig = SystemConfig['server'];
export type SteamConfig = SystemConfig['steam'];
export type OpencodeConfig = SystemConfig['opencode'];
