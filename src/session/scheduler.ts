/**
 * Fleet scheduler — one watcher per class inside its active window.
 *
 * The registry is the single source of truth for "is class X being watched".
 * Registration is a synchronous check-then-set, so within the event loop no
 * second watcher can ever be started for a registered class. Watchers remove
 * themselves when they return.
 */

import { logger } from '../logger.js';
import { isWithinClassWindow } from '../schedule/time-window.js';
import type { Clock } from './clock.js';
import type { ClassSchedule, ScheduleMap, WatcherExitReason } from '../types/index.js';

/** Runs one class watcher to completion. Must resolve, not reject, for expected exits. */
export type WatcherRunner = (schedule: ClassSchedule, signal: AbortSignal) => Promise<WatcherExitReason>;

export interface FleetSchedulerOptions {
  clock: Clock;
  tickIntervalMs: number;
  joinTimeoutMs: number;
}

interface ActiveSession {
  schedule: ClassSchedule;
  done: Promise<void>;
}

export class FleetScheduler {
  private readonly sessions = new Map<string, ActiveSession>();
  /** Classes that failed this run; never restarted. */
  private readonly retired = new Set<string>();

  constructor(
    private readonly schedules: ScheduleMap,
    private readonly runWatcher: WatcherRunner,
    private readonly options: FleetSchedulerOptions,
  ) {}

  isActive(className: string): boolean {
    return this.sessions.has(className);
  }

  isRetired(className: string): boolean {
    return this.retired.has(className);
  }

  activeClassNames(): string[] {
    return [...this.sessions.keys()];
  }

  /**
   * Start a watcher for `schedule` unless one is registered (or the class
   * retired). Returns true if a new watcher was started.
   */
  startSession(schedule: ClassSchedule, signal: AbortSignal): boolean {
    const name = schedule.name;
    if (this.sessions.has(name) || this.retired.has(name)) return false;

    const entry: ActiveSession = {
      schedule,
      done: Promise.resolve(),
    };
    this.sessions.set(name, entry);

    entry.done = Promise.resolve()
      .then(() => this.runWatcher(schedule, signal))
      .then((reason) => {
        if (reason === 'unavailable' || reason === 'failed') {
          this.retired.add(name);
          logger.warn(`FleetScheduler: "${name}" stopped (${reason}) — skipping for the rest of this run`);
        } else {
          logger.info(`FleetScheduler: "${name}" finished (${reason})`);
        }
      })
      .catch((err) => {
        this.retired.add(name);
        logger.error(`FleetScheduler: watcher for "${name}" crashed:`, err);
      })
      .finally(() => {
        if (this.sessions.get(name) === entry) {
          this.sessions.delete(name);
        }
      });

    logger.info(`FleetScheduler: started watcher for "${name}"`);
    return true;
  }

  /** Start watchers for every class in its window. Returns the names started. */
  tick(signal: AbortSignal): string[] {
    const now = this.options.clock.now();
    const started: string[] = [];
    for (const schedule of this.schedules.values()) {
      if (!isWithinClassWindow(schedule, now)) continue;
      if (this.startSession(schedule, signal)) {
        started.push(schedule.name);
      }
    }
    return started;
  }

  /** Tick until `signal` aborts, then join watchers (bounded). */
  async run(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      this.tick(signal);
      await this.options.clock.sleep(this.options.tickIntervalMs, signal);
    }

    logger.info('FleetScheduler: shutdown requested, waiting for sessions to close...');
    const allClosed = await this.join();
    if (allClosed) {
      logger.info('FleetScheduler: all sessions closed');
    } else {
      logger.warn(`FleetScheduler: still running after join timeout: ${this.activeClassNames().join(', ')}`);
    }
  }

  /**
   * Wait for every registered watcher, at most `joinTimeoutMs`.
   * Returns false if some watcher was still running at the deadline.
   */
  async join(): Promise<boolean> {
    const pending = [...this.sessions.values()].map(s => s.done);
    if (pending.length === 0) return true;

    const deadline = new AbortController();
    const settled = Promise.allSettled(pending).then(() => true);
    const timedOut = this.options.clock
      .sleep(this.options.joinTimeoutMs, deadline.signal)
      .then(() => false);

    try {
      return await Promise.race([settled, timedOut]);
    } finally {
      deadline.abort();
    }
  }
}
