export interface GameSession {
  pid: number;
  /** Process name at verification time */
  name: string;
  startedAt: Date;
}

/**
 * Callbacks the activity monitor drives. Both run on the monitor's serial
 * queue, one at a time, and may be async; a thrown error is logged and
 * does not stop the monitor.
 */
export interface ActivityHooks {
  onLaunch(session: GameSession): Promise<void> | void;
  /** `remaining` is the number of sessions still active after this one ended */
  onExit(session: GameSession, remaining: number): Promise<void> | void;
}
