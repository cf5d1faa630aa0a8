/**
 * Process Supervisor
 *
 * Owns the llama-server process end to end: start with health-gated
 * readiness, status, graceful/forced stop and pass-through generation.
 * The lifecycle state lives in memory; the PID file only exists so a new
 * manager process can find a server started by a previous one.
 */

import { existsSync } from 'node:fs';
import { mkdir } from 'node:fs/promises';
import { basename, join } from 'node:path';
import { ConfigurationError, ProcessError, ServerNotRunningError, StaleStateError, asError, errorLogFields } from '../errors.js';
import { estimateVramGb, type ModelDefinition } from '../models/types.js';
import type { ProcessTable } from '../platform/types.js';
import { createLogger } from '../utils/logger.js';
import { sleep, TIMEOUTS } from '../utils/timeout.js';
import { LlamaServerApi } from './api.js';
import { buildServerArgs } from './args.js';
import { spawnServer, type ServerLauncher } from './launcher.js';
import { PidFile } from './pid-file.js';
import type {
  ChatMessage,
  GenerateOptions,
  GenerationResult,
  ServerState,
  ServerStatus,
  StartOptions,
  SupervisorSettings,
  SupervisorTimeouts,
} from './types.js';

const logger = createLogger('supervisor');

const DEFAULT_TIMEOUTS: SupervisorTimeouts = {
  healthProbeMs: TIMEOUTS.HEALTH_PROBE,
  healthPollIntervalMs: TIMEOUTS.HEALTH_POLL_INTERVAL,
  statusMs: TIMEOUTS.STATUS,
  readyMs: TIMEOUTS.READY,
  generationMs: TIMEOUTS.GENERATION,
  gracefulStopMs: TIMEOUTS.GRACEFUL_STOP,
  forcedStopMs: TIMEOUTS.FORCED_STOP,
};

// Linux truncates `comm` to 15 characters
const COMM_MAX_LENGTH = 15;

export interface SupervisorDependencies {
  processes: ProcessTable;
  launcher?: ServerLauncher;
  timeouts?: Partial<SupervisorTimeouts>;
}

function normalizeProcessName(name: string): string {
  return name.toLowerCase().replace(/\.exe$/, '');
}

export class ProcessSupervisor {
  readonly pidFile: PidFile;
  private readonly settings: SupervisorSettings;
  private readonly processes: ProcessTable;
  private readonly launcher: ServerLauncher;
  private readonly timeouts: SupervisorTimeouts;
  private readonly api: LlamaServerApi;
  private readonly serverBinaryName: string;
  private state: ServerState = 'stopped';
  private currentModelId: string | null = null;

  constructor(settings: SupervisorSettings, deps: SupervisorDependencies) {
    this.settings = settings;
    this.processes = deps.processes;
    this.launcher = deps.launcher ?? spawnServer;
    this.timeouts = { ...DEFAULT_TIMEOUTS, ...deps.timeouts };
    this.api = new LlamaServerApi(settings.host, settings.port);
    this.pidFile = new PidFile(join(settings.cacheDir, 'server.pid'));
    this.serverBinaryName = normalizeProcessName(basename(settings.llamaServerPath));
  }

  getState(): ServerState {
    return this.state;
  }

  /** Model id of the last successful start by this supervisor */
  getCurrentModelId(): string | null {
    return this.currentModelId;
  }

  // ═══════════════════════════════════════════════════════════════════
  // STATE
  // ═══════════════════════════════════════════════════════════════════

  /**
   * Align the in-memory state with the PID record and a health probe.
   */
  async reconcile(): Promise<ServerState> {
    const pid = await this.trackedPid();
    if (pid === null) {
      const healthy = await this.probeHealth(this.timeouts.healthProbeMs);
      this.setState(healthy ? 'ready' : 'stopped');
    } else {
      const healthy = await this.probeHealth(this.timeouts.healthProbeMs);
      this.setState(healthy ? 'ready' : 'starting');
    }
    return this.state;
  }

  /**
   * True if the PID record names a live llama-server, or, failing that,
   * something answers on /health (a server started outside this manager).
   */
  async isRunning(): Promise<boolean> {
    if ((await this.trackedPid()) !== null) {
      return true;
    }
    return this.probeHealth(this.timeouts.healthProbeMs);
  }

  /**
   * The PID from the record if it still names our server. A record that
   * points at a dead or foreign process is deleted.
   */
  private async trackedPid(): Promise<number | null> {
    const pid = await this.pidFile.read();
    if (pid === null) {
      return null;
    }

    const proc = await this.processes.get(pid);
    if (proc && this.isServerProcess(proc.name)) {
      return pid;
    }

    const stale = new StaleStateError(pid, proc ? `process is "${proc.name}"` : 'process is gone');
    logger.warn(`${stale.message}, removing record`);
    await this.pidFile.clear();
    if (this.state === 'ready') {
      this.setState('stopped');
      this.currentModelId = null;
    }
    return null;
  }

  private isServerProcess(name: string): boolean {
    const normalized = normalizeProcessName(name);
    if (!normalized) return false;
    if (normalized.includes(this.serverBinaryName)) return true;
    return normalized.length >= COMM_MAX_LENGTH && this.serverBinaryName.startsWith(normalized);
  }

  private setState(next: ServerState): void {
    if (next !== this.state) {
      logger.debug(`State ${this.state} → ${next}`);
      this.state = next;
    }
  }

  // ═══════════════════════════════════════════════════════════════════
  // START
  // ═══════════════════════════════════════════════════════════════════

  /**
   * Start the server for a model. Returns false (and logs) on failure.
   * A running server makes this a successful no-op.
   */
  async start(definition: ModelDefinition, modelPath: string, options: StartOptions = {}): Promise<boolean> {
    if (await this.isRunning()) {
      logger.warn('Server is already running');
      return true;
    }

    if (!existsSync(modelPath)) {
      const error = new ConfigurationError(`Model file not found: ${modelPath}`);
      logger.error(error.message);
      return false;
    }

    const background = options.background ?? true;
    const useCache = options.useCache ?? false;
    const cachePath = options.cachePath ?? join(this.settings.cacheDir, 'slots');

    const { args, draft } = buildServerArgs(definition, modelPath, {
      host: this.settings.host,
      port: this.settings.port,
      useCache,
      cachePath,
      extraArgs: options.extraArgs ?? [],
      availableModels: options.availableModels ?? [],
      ctxSize: options.ctxSize,
    });

    const logFile = join(this.settings.logDir, `llama-server-${definition.id}.log`);

    logger.info(
      `Starting ${definition.name} (~${estimateVramGb(definition)} GB VRAM` +
      `${draft ? `, draft ${draft.id}` : ''})`
    );
    this.setState('starting');

    let pid: number;
    try {
      if (useCache) {
        await mkdir(cachePath, { recursive: true });
      }
      pid = await this.launcher({
        command: this.settings.llamaServerPath,
        args,
        background,
        logFile,
      });
    } catch (error) {
      logger.error('Failed to start server', errorLogFields(error));
      this.setState('failed');
      this.setState('stopped');
      return false;
    }

    try {
      await this.pidFile.write(pid);
    } catch (error) {
      // An unrecorded server would be invisible to the next start
      logger.error(`Could not record PID ${pid}, tearing the server down`, errorLogFields(error));
      await this.abandon(pid);
      return false;
    }

    this.currentModelId = definition.id;

    if (!background) {
      // Not health-gated: state stays `starting` until a probe sees it answer
      logger.info(`Server started in foreground (PID ${pid})`);
      return true;
    }

    logger.debug(`Server spawned (PID ${pid}), output in ${logFile}`);

    const readyTimeoutMs = options.readyTimeoutMs ?? this.timeouts.readyMs;
    if (await this.waitForReady(readyTimeoutMs)) {
      logger.info(`Server ready on ${this.api.baseUrl} (PID ${pid})`);
      return true;
    }

    logger.error(`Server did not become healthy within ${readyTimeoutMs}ms, tearing it down`);
    await this.abandon(pid);
    this.currentModelId = null;
    return false;
  }

  /**
   * Tear down a server whose start failed and drop its record.
   */
  private async abandon(pid: number): Promise<void> {
    this.setState('failed');
    try {
      await this.terminate(pid, true);
    } catch (error) {
      logger.error(`Could not tear down server (PID ${pid})`, errorLogFields(error));
    }
    try {
      await this.pidFile.clear();
    } catch (error) {
      logger.error('Could not remove PID record', errorLogFields(error));
    }
    this.setState('stopped');
  }

  /**
   * Poll /health until it answers 200 or `timeoutMs` elapses.
   */
  async waitForReady(timeoutMs: number = this.timeouts.readyMs): Promise<boolean> {
    const deadline = Date.now() + timeoutMs;

    while (Date.now() < deadline) {
      const probeMs = Math.min(this.timeouts.healthProbeMs, Math.max(1, deadline - Date.now()));
      if (await this.probeHealth(probeMs)) {
        if (this.state === 'starting') {
          this.setState('ready');
        }
        return true;
      }
      await sleep(this.timeouts.healthPollIntervalMs);
    }

    return false;
  }

  private async probeHealth(timeoutMs: number): Promise<boolean> {
    try {
      return (await this.api.health(timeoutMs)) === 200;
    } catch {
      // Connection refused while the server is still loading
      return false;
    }
  }

  // ═══════════════════════════════════════════════════════════════════
  // STOP
  // ═══════════════════════════════════════════════════════════════════

  /**
   * Stop the server. With `saveCache` false the whole process tree goes;
   * with true only the server itself is signalled so it can persist its
   * cache. Never throws.
   */
  async stop(saveCache: boolean = false): Promise<boolean> {
    const previous = this.state;

    try {
      const pid = await this.trackedPid();

      if (pid === null) {
        const owner = await this.processes.findListener(this.settings.port);
        if (owner === null) {
          this.setState('stopped');
          return true;
        }
        logger.info(`No PID record, stopping process ${owner} listening on port ${this.settings.port}`);
        this.setState('stopping');
        await this.terminate(owner, !saveCache);
      } else {
        logger.info(`Stopping server (PID ${pid}${saveCache ? ', preserving cache' : ''})`);
        this.setState('stopping');
        await this.terminate(pid, !saveCache);
        await this.pidFile.clear();
      }

      this.currentModelId = null;
      this.setState('stopped');
      return true;
    } catch (error) {
      logger.error('Error stopping server', errorLogFields(error));
      this.setState(previous);
      return false;
    }
  }

  /**
   * SIGTERM the target (and its descendants when asked), wait out the
   * grace period, then SIGKILL whatever is left.
   */
  private async terminate(pid: number, includeDescendants: boolean): Promise<void> {
    const descendants = includeDescendants ? await this.processes.descendants(pid) : [];
    const targets = [...descendants.map((proc) => proc.pid), pid];

    for (const target of targets) {
      this.processes.signal(target, 'SIGTERM');
    }

    const survivors = await this.waitForAll(targets, this.timeouts.gracefulStopMs);
    if (survivors.length === 0) {
      return;
    }

    logger.warn(`Escalating to SIGKILL for PID ${survivors.join(', ')}`);
    for (const target of survivors) {
      this.processes.signal(target, 'SIGKILL');
    }

    const remaining = await this.waitForAll(survivors, this.timeouts.forcedStopMs);
    if (remaining.length > 0) {
      throw new ProcessError(`PID ${remaining.join(', ')} survived SIGKILL`, pid);
    }
  }

  private async waitForAll(pids: number[], timeoutMs: number): Promise<number[]> {
    const exited = await Promise.all(pids.map((pid) => this.processes.waitForExit(pid, { timeoutMs })));
    return pids.filter((_, index) => !exited[index]);
  }

  /**
   * Teardown hook: stop a server this manager started, cache preserved,
   * when auto-shutdown is enabled.
   */
  async shutdown(): Promise<boolean> {
    if (!this.settings.autoShutdownOnExit) {
      return false;
    }
    if ((await this.trackedPid()) === null) {
      return false;
    }
    logger.info('Auto-shutting down server...');
    return this.stop(true);
  }

  // ═══════════════════════════════════════════════════════════════════
  // STATUS & GENERATION
  // ═══════════════════════════════════════════════════════════════════

  async status(): Promise<ServerStatus> {
    let code: number;
    try {
      code = await this.api.health(this.timeouts.statusMs);
    } catch (error) {
      const running = (await this.trackedPid()) !== null;
      return { state: this.state, running, healthy: false, error: asError(error).message };
    }

    const healthy = code === 200;
    const status: ServerStatus = { state: this.state, running: true, healthy };

    if (healthy) {
      if (this.state === 'starting') {
        this.setState('ready');
      }
      try {
        const props = await this.api.props(this.timeouts.statusMs);
        status.model = props.model;
        status.build = props.build;
      } catch (error) {
        logger.debug('/props unavailable', errorLogFields(error));
      }
      status.model ??= this.currentModelId ?? undefined;
    }

    status.state = this.state;
    return status;
  }

  /**
   * Chat completion against the running server. Unlike the lifecycle
   * operations this one throws: ServerNotRunningError up front,
   * TransientNetworkError for HTTP failures.
   */
  async generate(messages: ChatMessage[], options: GenerateOptions = {}): Promise<GenerationResult> {
    if (!(await this.isRunning())) {
      throw new ServerNotRunningError();
    }

    return this.api.chatCompletion(
      messages,
      {
        temperature: options.temperature ?? 0.7,
        maxTokens: options.maxTokens ?? 1024,
        stream: options.stream ?? false,
      },
      this.timeouts.generationMs
    );
  }
}
