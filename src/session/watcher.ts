/**
 * Per-class session watcher.
 *
 * Owns one page session for its lifetime: answers a prompt that is already
 * open on entry, then polls for content/location changes until the class
 * window ends, shutdown is requested, or the session becomes unusable.
 * Detection and decision are strictly sequential — a running fallback wait
 * blocks the next poll, and ends with the class window at the latest.
 */

import { logger as rootLogger } from '../logger.js';
import type { Logger } from '../logger.js';
import { SessionUnavailableError } from '../errors.js';
import { classEndDate, hasClassEnded, formatTimeOfDay } from '../schedule/time-window.js';
import { ChangeDetector } from './change-detector.js';
import { QuestionDecisionPipeline } from './decision-pipeline.js';
import type { DecisionAction } from './decision-pipeline.js';
import { FallbackMediator } from './fallback-mediator.js';
import type { Clock } from './clock.js';
import type {
  AnswerOracle,
  ClassSchedule,
  FallbackChannel,
  OperatorNotifier,
  PageSession,
  PageSessionProvider,
  QuestionSnapshot,
  SessionState,
  WatcherExitReason,
} from '../types/index.js';

export interface SessionWatcherDeps {
  pages: PageSessionProvider;
  oracle: AnswerOracle;
  notifier: OperatorNotifier;
  /** Both null when no fallback recipient is configured. */
  channel: FallbackChannel | null;
  fallbackRecipient: string | null;
  clock: Clock;
  pollIntervalMs: number;
  fallbackPollIntervalMs: number;
  fallbackMaxWaitMs: number;
}

export class SessionWatcher {
  private readonly log: Logger;
  private readonly state: SessionState;
  private readonly pipeline: QuestionDecisionPipeline;
  private readonly mediator: FallbackMediator | null;

  constructor(
    private readonly schedule: ClassSchedule,
    private readonly deps: SessionWatcherDeps,
  ) {
    this.log = rootLogger.scoped(schedule.name);
    this.state = {
      schedule,
      fingerprint: '',
      location: '',
      lastCommittedQuestion: null,
    };
    this.pipeline = new QuestionDecisionPipeline(this.state, deps.oracle, this.log);
    this.mediator = deps.channel && deps.fallbackRecipient
      ? new FallbackMediator(
        deps.channel,
        deps.fallbackRecipient,
        {
          pollIntervalMs: deps.fallbackPollIntervalMs,
          maxWaitMs: deps.fallbackMaxWaitMs,
          clock: deps.clock,
        },
        this.log,
      )
      : null;
  }

  /** Read-only view of this watcher's session state. */
  get session(): Readonly<SessionState> { return this.state; }

  async run(signal: AbortSignal): Promise<WatcherExitReason> {
    this.log.info('Starting session');

    let page: PageSession;
    try {
      page = await this.deps.pages.open(this.schedule);
    } catch (err) {
      if (err instanceof SessionUnavailableError) {
        this.log.error(`Session unavailable: ${err.message}`);
        return 'unavailable';
      }
      this.log.error('Failed to open session:', err);
      return 'failed';
    }

    try {
      return await this.watch(page, signal);
    } catch (err) {
      this.log.error('Session error — stopping watcher:', err);
      return 'failed';
    } finally {
      try {
        await page.close();
      } catch (err) {
        this.log.warn('Failed to close session:', err);
      }
      this.log.info('Session closed');
    }
  }

  private async watch(page: PageSession, signal: AbortSignal): Promise<WatcherExitReason> {
    const { clock, pollIntervalMs } = this.deps;

    this.state.fingerprint = await page.fingerprint();
    this.state.location = await page.currentLocation();
    const detector = new ChangeDetector(this.state.fingerprint, this.state.location);

    // A prompt may already be open when the watcher starts
    const initial = await page.readQuestion();
    if (initial) {
      await this.handleQuestion(page, initial, signal);
    }

    let rereadQuestion = false;

    while (!signal.aborted) {
      if (this.classEnded()) return 'ended';

      await clock.sleep(pollIntervalMs, signal);
      if (signal.aborted) break;
      if (this.classEnded()) return 'ended';

      const navigated = detector.observeLocation(await page.currentLocation());
      if (navigated) {
        this.log.debug(`Location changed: ${detector.location}`);
        this.pipeline.forget();
      }
      const changed = detector.observe(await page.fingerprint());
      this.state.fingerprint = detector.fingerprint;
      this.state.location = detector.location;
      const retry: boolean = rereadQuestion;
      rereadQuestion = false;
      if (!navigated && !changed && !retry) continue;

      const snapshot = await page.readQuestion();
      if (!snapshot) {
        // Prompt closed — the same question reopening later is a new prompt.
        // An unreadable prompt looks the same, so read once more next tick.
        this.pipeline.forget();
        rereadQuestion = !retry;
        continue;
      }
      await this.handleQuestion(page, snapshot, signal);
    }

    return 'shutdown';
  }

  private classEnded(): boolean {
    if (!hasClassEnded(this.schedule, this.deps.clock.now())) return false;
    const end = this.schedule.endTime;
    this.log.info(`Class ended at ${end === null ? '?' : formatTimeOfDay(end)}`);
    return true;
  }

  private async handleQuestion(page: PageSession, snapshot: QuestionSnapshot, signal: AbortSignal): Promise<void> {
    const action: DecisionAction = await this.pipeline.decide(snapshot);

    switch (action.kind) {
      case 'skip':
        return;

      case 'error':
        await this.deps.notifier.notify({
          kind: 'oracle_error',
          className: this.schedule.name,
          question: snapshot.question,
          option: null,
          rationale: action.decision.rationale,
        });
        return;

      case 'commit':
        await this.commit(page, action.option);
        return;

      case 'await_fallback': {
        // The oracle's pick stays selected until a human reply overrides it
        await this.commit(page, action.option);
        await this.deps.notifier.notify({
          kind: 'low_confidence',
          className: this.schedule.name,
          question: snapshot.question,
          option: action.option,
          rationale: action.decision.rationale,
        });
        if (!this.mediator) {
          this.log.warn('No fallback recipient configured — keeping low-confidence answer');
          return;
        }
        const outcome = await this.mediator.run(
          page,
          this.schedule.name,
          snapshot,
          signal,
          classEndDate(this.schedule, this.deps.clock.now()),
        );
        this.log.info(
          `Fallback ended: ${outcome.state} (${outcome.reason}), ${outcome.overrides.length} override(s)`,
        );
        return;
      }

      default: {
        const unhandled: never = action;
        throw new Error(`Unhandled decision action: ${JSON.stringify(unhandled)}`);
      }
    }
  }

  private async commit(page: PageSession, option: number): Promise<void> {
    this.log.info(`Selecting option ${option}...`);
    if (!(await page.applyChoice(option))) {
      this.log.warn(`Failed to select option ${option}`);
    }
  }
}
