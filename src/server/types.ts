/**
 * Server supervisor types.
 */

import type { AvailableModel } from '../models/types.js';

/**
 * Lifecycle: stopped → starting → ready → stopping → stopped,
 * with starting → failed → stopped when the server never comes up.
 */
export type ServerState = 'stopped' | 'starting' | 'ready' | 'stopping' | 'failed';

export interface ServerStatus {
  state: ServerState;
  running: boolean;
  healthy: boolean;
  /** Model alias reported by /props (the model id we launched with) */
  model?: string;
  /** llama.cpp build identifier */
  build?: string;
  error?: string;
}

export interface StartOptions {
  /** Detach, log to file and wait for /health (default true) */
  background?: boolean;
  /** Persist prompt-cache slots (default false) */
  useCache?: boolean;
  /** Slot directory used when useCache is set */
  cachePath?: string;
  extraArgs?: string[];
  /** Models a draft model id may resolve against */
  availableModels?: readonly AvailableModel[];
  /** Overrides the definition's context size for this run */
  ctxSize?: number;
  /** Readiness bound for background starts */
  readyTimeoutMs?: number;
}

export type ChatRole = 'system' | 'user' | 'assistant';

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

export interface GenerateOptions {
  temperature?: number;
  maxTokens?: number;
  stream?: boolean;
}

export interface GenerationResult {
  content: string;
}

export interface SupervisorSettings {
  host: string;
  port: number;
  llamaServerPath: string;
  cacheDir: string;
  logDir: string;
  /** Stop the server (cache preserved) from shutdown() */
  autoShutdownOnExit: boolean;
}

export interface SupervisorTimeouts {
  healthProbeMs: number;
  healthPollIntervalMs: number;
  statusMs: number;
  readyMs: number;
  generationMs: number;
  gracefulStopMs: number;
  forcedStopMs: number;
}
