/**
 * Game Orchestrator
 *
 * Policy between the activity monitor and the process supervisor:
 * - first game launch: remember the model, stop the server (cache kept),
 *   kill configured resource hogs and route the coding agent to the cloud
 * - last game exit: bring the model back and route the agent home
 */

import { join } from 'node:path';
import type { SystemConfig } from '../config/schema.js';
import { errorLogFields } from '../errors.js';
import type { ModelRegistry } from '../models/registry.js';
import type { AvailableModel } from '../models/types.js';
import type { ProcessTable } from '../platform/types.js';
import type { ProcessSupervisor } from '../server/supervisor.js';
import { formatElapsed } from '../utils/duration.js';
import { createLogger } from '../utils/logger.js';
import { TIMEOUTS } from '../utils/timeout.js';
import { ActivityMonitor } from './activity-monitor.js';
import { setDefaultAgent } from './agent-config.js';
import type { GameSession } from './types.js';

const logger = createLogger('orchestrator');

export type ServerControl = Pick<ProcessSupervisor, 'isRunning' | 'status' | 'start' | 'stop' | 'waitForReady'>;

export type ModelCatalog = Pick<ModelRegistry, 'refresh' | 'byId' | 'autoSelect' | 'available' | 'cachePath'>;

export type AgentRoute = 'local' | 'cloud';

export interface OrchestratorDependencies {
  config: Pick<SystemConfig, 'server' | 'steam' | 'opencode'>;
  supervisor: ServerControl;
  registry: ModelCatalog;
  processes: ProcessTable;
  logPath: string;
  /** Follow the log with fs.watch (default true) */
  watch?: boolean;
}

export function normalizeProcessName(name: string): string {
  return name.trim().toLowerCase().replace(/\.exe$/, '');
}

export class Orchestrator {
  readonly monitor: ActivityMonitor;
  private readonly deps: OrchestratorDependencies;
  private lastModelId: string | null = null;

  constructor(deps: OrchestratorDependencies) {
    this.deps = deps;
    this.monitor = new ActivityMonitor(
      { logPath: deps.logPath, processes: deps.processes, watch: deps.watch },
      {
        onLaunch: (session) => this.handleLaunch(session),
        onExit: (session, remaining) => this.handleExit(session, remaining),
      }
    );
  }

  /** Model captured at the last launch, pending restore */
  getLastModelId(): string | null {
    return this.lastModelId;
  }

  /**
   * Follow the activity log until `signal` aborts.
   */
  async run(signal: AbortSignal): Promise<void> {
    await this.monitor.start();
    logger.info(`Watching for games in ${this.deps.logPath}`);

    await new Promise<void>((resolve) => {
      if (signal.aborted) {
        resolve();
        return;
      }
      signal.addEventListener('abort', () => resolve(), { once: true });
    });

    this.monitor.stop();
  }

  // ═══════════════════════════════════════════════════════════════════
  // LAUNCH
  // ═══════════════════════════════════════════════════════════════════

  async handleLaunch(session: GameSession): Promise<void> {
    const { steam, server } = this.deps.config;
    if (!steam.stopAiOnGame) {
      return;
    }

    const { supervisor } = this.deps;
    if (!(await supervisor.isRunning())) {
      logger.debug(`${session.name} started, AI already stopped`);
      return;
    }

    const status = await supervisor.status();
    this.lastModelId = status.model ?? server.defaultModel;
    logger.info(`Stopping AI for ${session.name} (model: ${this.lastModelId ?? 'unknown'})`);

    if (!(await supervisor.stop(steam.saveCacheOnStop))) {
      logger.warn('AI server did not stop cleanly');
    }

    await this.killResourceHogs();
    await this.routeAgent('cloud');
  }

  /**
   * SIGKILL every process whose name is on the allow-list. Failures are
   * logged at debug and skipped. Tracked games are never touched.
   */
  async killResourceHogs(): Promise<number> {
    const wanted = new Set(this.deps.config.steam.processesToKill.map(normalizeProcessName));
    if (wanted.size === 0) {
      return 0;
    }

    let procs;
    try {
      procs = await this.deps.processes.list();
    } catch (error) {
      logger.debug('Could not list processes', errorLogFields(error));
      return 0;
    }

    let killed = 0;
    for (const proc of procs) {
      if (!wanted.has(normalizeProcessName(proc.name))) continue;
      if (proc.pid === process.pid || this.monitor.hasSession(proc.pid)) continue;

      try {
        if (this.deps.processes.signal(proc.pid, 'SIGKILL')) {
          killed++;
          logger.info(`  Killed ${proc.name} (PID ${proc.pid})`);
        }
      } catch (error) {
        logger.debug(`Could not kill ${proc.name} (PID ${proc.pid})`, errorLogFields(error));
      }
    }
    return killed;
  }

  // ═══════════════════════════════════════════════════════════════════
  // EXIT
  // ═══════════════════════════════════════════════════════════════════

  async handleExit(session: GameSession, remaining: number): Promise<void> {
    if (!this.deps.config.steam.restartAiAfterGame) {
      return;
    }
    if (remaining > 0) {
      logger.info(`${session.name} closed, ${remaining} game(s) still running`);
      return;
    }

    logger.info(`All games closed after ${formatElapsed(session.startedAt)}, restoring AI`);
    await this.restore();
  }

  /**
   * Restart the server with the captured model (or the configured
   * fallbacks) and route the agent back to it. Returns true on success.
   */
  async restore(): Promise<boolean> {
    const { supervisor, registry } = this.deps;

    await registry.refresh();
    const model = this.resolveRestoreModel();
    if (!model) {
      logger.warn('No model available to restore');
      return false;
    }

    const started = await supervisor.start(model.definition, model.path, {
      background: true,
      useCache: true,
      cachePath: registry.cachePath(model.id),
      availableModels: registry.available(),
    });
    if (!started) {
      logger.error(`Failed to restore ${model.definition.name}`);
      return false;
    }

    if (await supervisor.waitForReady(TIMEOUTS.READY)) {
      logger.info(`AI restored: ${model.definition.name}`);
    } else {
      logger.warn(`${model.definition.name} started but is not answering health checks yet`);
    }

    this.lastModelId = null;
    await this.routeAgent('local');
    return true;
  }

  /**
   * Captured model, then `steam.restoreModel`, then `server.defaultModel`,
   * then the registry's own pick. Only available models qualify.
   */
  resolveRestoreModel(): AvailableModel | null {
    const { registry, config } = this.deps;
    const candidates = [this.lastModelId, config.steam.restoreModel, config.server.defaultModel];

    for (const id of candidates) {
      if (!id) continue;
      const model = registry.byId(id);
      if (model) {
        return model;
      }
      logger.debug(`Model "${id}" is not available`);
    }
    return registry.autoSelect();
  }

  // ═══════════════════════════════════════════════════════════════════
  // AGENT ROUTING
  // ═══════════════════════════════════════════════════════════════════

  async routeAgent(route: AgentRoute): Promise<boolean> {
    const { opencode } = this.deps.config;
    const path = join(opencode.configDir, opencode.configFile);
    const agent = route === 'local' ? opencode.localAgentName : opencode.cloudAgentName;

    try {
      const changed = await setDefaultAgent(path, agent);
      if (changed) {
        logger.info(`Coding agent switched to ${agent}`);
      }
      return changed;
    } catch (error) {
      logger.warn(`Could not switch coding agent to ${agent}`, errorLogFields(error));
      return false;
    }
  }
}
