// Schedule

/** Seconds since local midnight. */
export type TimeOfDay = number;

export interface ClassSchedule {
  /** Unique key from the schedule file. */
  name: string;
  /** Opaque to the engine — forwarded to the page session provider as-is. */
  connection: Readonly<Record<string, unknown>>;
  /** null = always active. */
  startTime: TimeOfDay | null;
  /** null = never auto-ends. */
  endTime: TimeOfDay | null;
}

export type ScheduleMap = ReadonlyMap<string, ClassSchedule>;

export interface ScheduleStore {
  /** Throws ConfigError when the backing store is missing or malformed. */
  loadSchedules(): ScheduleMap;
}

// Questions

/** Two snapshots are the same question iff their question text is equal. */
export interface QuestionSnapshot {
  question: string;
  /** Option k (1-indexed) is options[k - 1]. */
  options: readonly string[];
}


// Oracle

export type Confidence = 'high' | 'medium' | 'low';

export type OracleDecision =
  | {
      status: 'answered';
      /** 1-indexed, within [1, options.length]. */
      option: number;
      confidence: 'high' | 'medium';
      rationale: string;
      questionType: string;
    }
  | {
      status: 'low_confidence';
      option: number;
      confidence: 'low';
      rationale: string;
      questionType: string;
    }
  | {
      status: 'error';
      rationale: string;
      raw: string;
    };

export interface AnswerOracle {
  /** Never throws: malformed output and transport failures come back as status 'error'. */
  ask(question: string, options: readonly string[]): Promise<OracleDecision>;
}

// Page session

export interface PageSession {
  /** Opaque digest of the displayed content. Empty on a transient read failure. */
  fingerprint(): Promise<string>;
  currentLocation(): Promise<string>;
  readQuestion(): Promise<QuestionSnapshot | null>;
  applyChoice(option: number): Promise<boolean>;
  /** Returns true if any selection was cleared. */
  clearChoice(): Promise<boolean>;
  close(): Promise<void>;
}

export interface PageSessionProvider {
  /** Throws SessionUnavailableError when no authenticated session exists for the class. */
  open(schedule: ClassSchedule): Promise<PageSession>;
}

// Fallback channel

export interface InboundMessage {
  text: string;
  /** Monotonically increasing per channel. */
  id: number;
}

export interface FallbackChannel {
  send(recipient: string, text: string): Promise<boolean>;
  /** Newest inbound message from the recipient. Throws ChannelError when the poll fails. */
  latest(recipient: string): Promise<InboundMessage | null>;
}

// Operator notifications

export type OperatorNoticeKind = 'low_confidence' | 'oracle_error';

export interface OperatorNotice {
  kind: OperatorNoticeKind;
  className: string;
  question: string;
  /** Option committed as baseline (low confidence only). */
  option: number | null;
  rationale: string;
}

export interface OperatorNotifier {
  notify(notice: OperatorNotice): Promise<void>;
}

// Session state

/** One per class with an active watcher. Private to that watcher. */
export interface SessionState {
  readonly schedule: ClassSchedule;
  fingerprint: string;
  location: string;
  /** Question text of the last prompt the oracle was consulted for. */
  lastCommittedQuestion: string | null;
}

export type WatcherExitReason = 'ended' | 'shutdown' | 'unavailable' | 'failed';
