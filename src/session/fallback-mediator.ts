/**
 * Human-in-the-loop fallback for low-confidence answers.
 *
 * State machine:
 *
 *   idle → message_sent → listening ⇄ overridden
 *                            ↓
 *                  aborted | timed_out
 *
 * While listening, every iteration first checks whether the prompt changed
 * under us (closed, rotated, navigated) and only then looks at the channel.
 * A valid reply clears the current selection and applies the human's choice,
 * then returns to listening — the human may change their mind until the
 * prompt goes away. The prompt's own lifetime is the normal timeout; an
 * optional hard ceiling, or the end of the class, ends the wait as timed_out.
 */

import type { Logger } from '../logger.js';
import type { Clock } from './clock.js';
import type {
  FallbackChannel,
  InboundMessage,
  PageSession,
  QuestionSnapshot,
} from '../types/index.js';

export type FallbackState = 'idle' | 'message_sent' | 'listening' | 'overridden' | 'aborted' | 'timed_out';

export type FallbackAbortReason = 'send_failed' | 'channel_error' | 'content_changed' | 'shutdown';

export interface FallbackOutcome {
  state: 'aborted' | 'timed_out';
  reason: FallbackAbortReason | 'timed_out';
  /** Options applied on behalf of the human, in order. */
  overrides: number[];
  /** Newest message id considered when the wait ended. */
  watermark: number;
  /** Every state entered, starting with 'idle'. */
  history: FallbackState[];
}

// ── Listening transition ───────────────────────────────────────────────────

export interface ListeningObservation {
  shutdown: boolean;
  contentChanged: boolean;
  timedOut: boolean;
  /** Newest inbound message, or null when none was read this iteration. */
  reply: InboundMessage | null;
}

export type ListeningStep =
  | { kind: 'abort'; reason: 'shutdown' | 'content_changed' }
  | { kind: 'timeout' }
  | { kind: 'override'; option: number; watermark: number }
  | { kind: 'invalid_reply'; text: string; watermark: number }
  | { kind: 'wait' };

/** A reply selects option n when its trimmed body is exactly an integer in [1, optionCount]. */
export function parseReplyOption(text: string, optionCount: number): number | null {
  const trimmed = text.trim();
  if (!/^\d+$/.test(trimmed)) return null;
  const n = parseInt(trimmed, 10);
  return n >= 1 && n <= optionCount ? n : null;
}

/**
 * Pure transition for one listening iteration.
 * Precedence: shutdown, prompt change, time ceiling, then the reply.
 * Replies at or below the watermark are never acted on.
 */
export function nextListeningStep(
  observation: ListeningObservation,
  watermark: number,
  optionCount: number,
): ListeningStep {
  if (observation.shutdown) return { kind: 'abort', reason: 'shutdown' };
  if (observation.contentChanged) return { kind: 'abort', reason: 'content_changed' };
  if (observation.timedOut) return { kind: 'timeout' };

  const reply = observation.reply;
  if (!reply || reply.id <= watermark) return { kind: 'wait' };

  const option = parseReplyOption(reply.text, optionCount);
  if (option === null) {
    return { kind: 'invalid_reply', text: reply.text, watermark: reply.id };
  }
  return { kind: 'override', option, watermark: reply.id };
}

// ── Prompt formatting ──────────────────────────────────────────────────────

export function formatFallbackPrompt(className: string, snapshot: QuestionSnapshot): string {
  const lines = [
    `Poll help! (${className})`,
    `Q: ${snapshot.question}`,
    ...snapshot.options.map((opt, i) => `${i + 1}. ${opt}`),
    `Reply with 1-${snapshot.options.length}`,
  ];
  return lines.join('\n');
}

// ── Mediator ───────────────────────────────────────────────────────────────

export interface FallbackMediatorOptions {
  pollIntervalMs: number;
  /** 0 = no ceiling. */
  maxWaitMs: number;
  clock: Clock;
}

export class FallbackMediator {
  constructor(
    private readonly channel: FallbackChannel,
    private readonly recipient: string,
    private readonly options: FallbackMediatorOptions,
    private readonly log: Logger,
  ) {}

  async run(
    session: PageSession,
    className: string,
    snapshot: QuestionSnapshot,
    signal: AbortSignal,
    /** End of the class window; listening stops there as timed_out. */
    endsAt: Date | null = null,
  ): Promise<FallbackOutcome> {
    const history: FallbackState[] = ['idle'];
    const overrides: number[] = [];
    let watermark = 0;

    const finish = (state: FallbackOutcome['state'], reason: FallbackOutcome['reason']): FallbackOutcome => {
      history.push(state);
      return { state, reason, overrides, watermark, history };
    };

    // idle → message_sent
    let sent = false;
    try {
      sent = await this.channel.send(this.recipient, formatFallbackPrompt(className, snapshot));
    } catch (err) {
      this.log.warn('Fallback: send failed:', err);
    }
    if (!sent) {
      this.log.warn(`Fallback: could not message ${this.recipient} — keeping baseline answer`);
      return finish('aborted', 'send_failed');
    }
    history.push('message_sent');
    this.log.info(`Fallback: asked ${this.recipient} for an override`);

    try {
      const latest = await this.channel.latest(this.recipient);
      watermark = latest?.id ?? 0;
    } catch (err) {
      this.log.warn('Fallback: could not read channel watermark:', err);
      return finish('aborted', 'channel_error');
    }

    let baselineFingerprint = await session.fingerprint();
    const baselineLocation = await session.currentLocation();

    // message_sent → listening
    history.push('listening');
    const startedAt = this.options.clock.now().getTime();
    this.log.info(`Fallback: waiting for replies from ${this.recipient} until the prompt changes...`);

    for (;;) {
      const shutdown = signal.aborted;
      let contentChanged = false;
      let timedOut = false;
      let reply: InboundMessage | null = null;

      if (!shutdown) {
        const fingerprint = await session.fingerprint();
        const location = await session.currentLocation();
        if (!baselineFingerprint) {
          baselineFingerprint = fingerprint;
        }
        contentChanged =
          (fingerprint !== '' && fingerprint !== baselineFingerprint) ||
          (location !== '' && baselineLocation !== '' && location !== baselineLocation);

        const now = this.options.clock.now().getTime();
        timedOut =
          (this.options.maxWaitMs > 0 && now - startedAt >= this.options.maxWaitMs) ||
          (endsAt !== null && now >= endsAt.getTime());

        if (!contentChanged && !timedOut) {
          try {
            reply = await this.channel.latest(this.recipient);
          } catch (err) {
            this.log.warn('Fallback: channel poll failed:', err);
            return finish('aborted', 'channel_error');
          }
        }
      }

      const step = nextListeningStep({ shutdown, contentChanged, timedOut, reply }, watermark, snapshot.options.length);

      switch (step.kind) {
        case 'abort':
          this.log.info(
            step.reason === 'shutdown'
              ? 'Fallback: shutdown requested — stopping listener'
              : 'Fallback: prompt changed — stopping listener',
          );
          return finish('aborted', step.reason);

        case 'timeout':
          this.log.info(
            endsAt !== null && this.options.clock.now().getTime() >= endsAt.getTime()
              ? 'Fallback: class ended before a usable reply'
              : `Fallback: no usable reply within ${this.options.maxWaitMs / 1000}s`,
          );
          return finish('timed_out', 'timed_out');

        case 'invalid_reply':
          watermark = step.watermark;
          this.log.warn(`Fallback: ignoring reply "${step.text}" (expected 1-${snapshot.options.length})`);
          break;

        case 'override': {
          watermark = step.watermark;
          this.log.info(`Fallback: ${this.recipient} chose option ${step.option}`);
          await session.clearChoice();
          if (await session.applyChoice(step.option)) {
            overrides.push(step.option);
            history.push('overridden', 'listening');
            this.log.info(`Fallback: changed answer to option ${step.option}`);
            // Our own click may alter the fingerprint. Re-baseline only while the
            // page still shows the same question; it may have rotated meanwhile.
            const refreshed = await session.fingerprint();
            const current = await session.readQuestion();
            if (!current || current.question !== snapshot.question) {
              this.log.info('Fallback: prompt changed while applying the reply — stopping listener');
              return finish('aborted', 'content_changed');
            }
            if (refreshed) baselineFingerprint = refreshed;
          } else {
            this.log.warn(`Fallback: failed to apply option ${step.option}`);
          }
          break;
        }

        case 'wait':
          break;
      }

      await this.options.clock.sleep(this.options.pollIntervalMs, signal);
    }
  }
}
