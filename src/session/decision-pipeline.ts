/**
 * Question decision pipeline — maps a displayed prompt to a commit action.
 * Consults the oracle at most once per question text and applies the
 * confidence policy:
 *
 *   error          → notify only, nothing committed, no fallback
 *   high / medium  → commit
 *   low            → commit as provisional baseline, then await fallback
 */

import type { Logger } from '../logger.js';
import type { AnswerOracle, OracleDecision, QuestionSnapshot, SessionState } from '../types/index.js';

export type DecisionAction =
  | { kind: 'skip'; reason: 'no_question' | 'duplicate' }
  | { kind: 'commit'; option: number; decision: Extract<OracleDecision, { status: 'answered' }> }
  | { kind: 'await_fallback'; option: number; decision: Extract<OracleDecision, { status: 'low_confidence' }> }
  | { kind: 'error'; decision: Extract<OracleDecision, { status: 'error' }> };

export class QuestionDecisionPipeline {
  constructor(
    private readonly state: SessionState,
    private readonly oracle: AnswerOracle,
    private readonly log: Logger,
  ) {}

  get lastCommittedQuestion(): string | null { return this.state.lastCommittedQuestion; }

  /** Drop dedup state (navigation, or the prompt disappeared). */
  forget(): void {
    this.state.lastCommittedQuestion = null;
  }

  async decide(snapshot: QuestionSnapshot | null): Promise<DecisionAction> {
    if (!snapshot || snapshot.options.length === 0) {
      return { kind: 'skip', reason: 'no_question' };
    }
    if (snapshot.question === this.state.lastCommittedQuestion) {
      return { kind: 'skip', reason: 'duplicate' };
    }

    // Recorded before the oracle answers so a change event for the same text
    // arriving during a fallback wait can never re-trigger it.
    this.state.lastCommittedQuestion = snapshot.question;

    this.log.info(`Asking oracle: "${snapshot.question}" (${snapshot.options.length} options)`);
    const decision = await this.oracle.ask(snapshot.question, snapshot.options);

    switch (decision.status) {
      case 'error':
        this.log.warn(`Oracle error: ${decision.rationale}`);
        if (decision.raw) this.log.debug(`Oracle raw response: ${decision.raw.slice(0, 500)}`);
        return { kind: 'error', decision };
      case 'answered':
        this.log.info(`Oracle: option ${decision.option} (${decision.confidence} confidence, ${decision.questionType})`);
        return { kind: 'commit', option: decision.option, decision };
      case 'low_confidence':
        this.log.info(
          `Oracle: option ${decision.option} (low confidence, ${decision.questionType}) — ${decision.rationale.slice(0, 100)}`,
        );
        return { kind: 'await_fallback', option: decision.option, decision };
      default: {
        const unhandled: never = decision;
        throw new Error(`Unhandled oracle decision: ${JSON.stringify(unhandled)}`);
      }
    }
  }
}
