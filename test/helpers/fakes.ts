/**
 * In-process stand-ins for the page, oracle, channel and notifier, plus a
 * virtual clock whose sleep advances time instead of waiting.
 */

import type { Clock } from '../../src/session/clock.js';
import type { ToolCaller } from '../../src/mcp/tool-result.js';
import type {
  AnswerOracle,
  ClassSchedule,
  FallbackChannel,
  InboundMessage,
  OperatorNotice,
  OperatorNotifier,
  OracleDecision,
  PageSession,
  PageSessionProvider,
  QuestionSnapshot,
} from '../../src/types/index.js';

// ── Clock ───────────────────────────────────────────────────────────────────

export class FakeClock implements Clock {
  private ms: number;
  sleeps = 0;

  constructor(start: Date) {
    this.ms = start.getTime();
  }

  now(): Date {
    return new Date(this.ms);
  }

  advance(ms: number): void {
    this.ms += ms;
  }

  async sleep(ms: number, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) return;
    this.sleeps++;
    this.ms += ms;
    await new Promise<void>(resolve => setImmediate(resolve));
  }
}

/** Local-time date on a fixed day. */
export function at(hours: number, minutes: number, seconds = 0): Date {
  return new Date(2026, 9, 19, hours, minutes, seconds);
}

export function schedule(name: string, start: number | null, end: number | null): ClassSchedule {
  return { name, connection: { section: name.toLowerCase() }, startTime: start, endTime: end };
}

// ── Page session ────────────────────────────────────────────────────────────

export class FakePageSession implements PageSession {
  fingerprintValue = 'fp-1';
  location = 'https://polls.example.test/room';
  question: QuestionSnapshot | null = null;
  /** Override the plain values when set. */
  fingerprintFn: (() => string) | null = null;
  locationFn: (() => string) | null = null;
  /** Options currently selected on the page. */
  readonly applied = new Set<number>();
  readonly calls: string[] = [];
  closed = false;
  applyResult = true;
  failOnRead: Error | null = null;

  async fingerprint(): Promise<string> {
    return this.fingerprintFn ? this.fingerprintFn() : this.fingerprintValue;
  }

  async currentLocation(): Promise<string> {
    return this.locationFn ? this.locationFn() : this.location;
  }

  async readQuestion(): Promise<QuestionSnapshot | null> {
    if (this.failOnRead) throw this.failOnRead;
    return this.question;
  }

  async applyChoice(option: number): Promise<boolean> {
    this.calls.push(`apply:${option}`);
    if (this.applyResult) this.applied.add(option);
    return this.applyResult;
  }

  async clearChoice(): Promise<boolean> {
    this.calls.push('clear');
    const had = this.applied.size > 0;
    this.applied.clear();
    return had;
  }

  async close(): Promise<void> {
    this.calls.push('close');
    this.closed = true;
  }

  applyCalls(): string[] {
    return this.calls.filter(c => c.startsWith('apply:'));
  }
}

export class FakePageProvider implements PageSessionProvider {
  readonly opened: string[] = [];

  constructor(private readonly factory: (schedule: ClassSchedule) => PageSession) {}

  async open(schedule: ClassSchedule): Promise<PageSession> {
    this.opened.push(schedule.name);
    return this.factory(schedule);
  }
}

// ── Oracle ──────────────────────────────────────────────────────────────────

export class FakeOracle implements AnswerOracle {
  readonly asked: Array<{ question: string; options: readonly string[] }> = [];

  constructor(private readonly answer: (question: string, options: readonly string[]) => OracleDecision) {}

  async ask(question: string, options: readonly string[]): Promise<OracleDecision> {
    this.asked.push({ question, options });
    return this.answer(question, options);
  }
}

export function answered(option: number, confidence: 'high' | 'medium' = 'medium'): OracleDecision {
  return { status: 'answered', option, confidence, rationale: 'test rationale', questionType: 'factual' };
}

export function lowConfidence(option: number): OracleDecision {
  return { status: 'low_confidence', option, confidence: 'low', rationale: 'needs the slide', questionType: 'requires_context' };
}

export function oracleError(rationale = 'Invalid option number: 9'): OracleDecision {
  return { status: 'error', rationale, raw: '' };
}

// ── Channel ─────────────────────────────────────────────────────────────────

export class FakeChannel implements FallbackChannel {
  /** Pass a page's `calls` array to interleave sends with page actions. */
  constructor(private readonly journal: string[] = []) {}

  readonly sent: Array<{ recipient: string; text: string }> = [];
  /** Newest last. */
  readonly inbox: InboundMessage[] = [];
  latestCalls = 0;
  sendResult = true;
  /** Runs before each latest() read; receives the 1-based call number. */
  beforeLatest: ((call: number) => void) | null = null;
  failLatest: Error | null = null;

  async send(recipient: string, text: string): Promise<boolean> {
    this.sent.push({ recipient, text });
    this.journal.push(`send:${recipient}`);
    return this.sendResult;
  }

  async latest(_recipient: string): Promise<InboundMessage | null> {
    this.latestCalls++;
    this.beforeLatest?.(this.latestCalls);
    if (this.failLatest) throw this.failLatest;
    return this.inbox.length > 0 ? this.inbox[this.inbox.length - 1] : null;
  }
}

// ── MCP ─────────────────────────────────────────────────────────────────────

export function textResult(text: string, isError = false) {
  return { content: [{ type: 'text', text }], isError };
}

/** Scripted MCP servers: each tool answers from a handler, a fixed result, or throws. */
export class FakeToolCaller implements ToolCaller {
  readonly calls: Array<{ name: string; args: Record<string, unknown> }> = [];
  readonly handlers = new Map<string, (call: number) => unknown>();
  readonly results = new Map<string, unknown>();
  readonly failures = new Map<string, Error>();
  connected = new Set(['page', 'messages']);

  async callTool(prefixedName: string, args: Record<string, unknown>): Promise<unknown> {
    this.calls.push({ name: prefixedName, args });
    const failure = this.failures.get(prefixedName);
    if (failure) throw failure;
    const handler = this.handlers.get(prefixedName);
    if (handler) return handler(this.calls.filter(c => c.name === prefixedName).length);
    return this.results.get(prefixedName) ?? textResult('');
  }

  isConnected(serverName: string): boolean {
    return this.connected.has(serverName);
  }
}

// ── Notifier ────────────────────────────────────────────────────────────────

export class RecordingNotifier implements OperatorNotifier {
  readonly notices: OperatorNotice[] = [];

  async notify(notice: OperatorNotice): Promise<void> {
    this.notices.push(notice);
  }
}

export const silentLog = {
  info(): void {},
  warn(): void {},
  error(): void {},
  debug(): void {},
};
