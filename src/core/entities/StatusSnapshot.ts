import { JobState, isActiveState, isSuccessState, isTerminalState } from './JobState.js';

/**
 * A diagnostic message attached to a job (severity as reported, e.g. ERROR, WARN, INFO)
 */
export interface DiagnosticMessage {
  severity: string;
  text: string;
}

export interface StatusSnapshotFields {
  identifier: string;
  state: JobState;
  progressFraction: number;
  eventCount: number;
  resultCount: number;
  scanCount: number;
  runDurationSeconds: number;
  ttlSeconds: number;
  isDone: boolean;
  isFailed: boolean;
  isPaused: boolean;
  messages: DiagnosticMessage[];
}

/**
 * One point-in-time read of a job's status.
 *
 * The isDone/isFailed/isPaused flags come straight from the response and may
 * disagree with `state` for a poll or two; both are kept.
 */
export class StatusSnapshot {
  readonly identifier: string;
  readonly state: JobState;
  readonly progressFraction: number;
  readonly eventCount: number;
  readonly resultCount: number;
  readonly scanCount: number;
  readonly runDurationSeconds: number;
  readonly ttlSeconds: number;
  readonly isDone: boolean;
  readonly isFailed: boolean;
  readonly isPaused: boolean;
  readonly messages: ReadonlyArray<Readonly<DiagnosticMessage>>;

  constructor(fields: StatusSnapshotFields) {
    this.identifier = fields.identifier;
    this.state = fields.state;
    this.progressFraction = fields.progressFraction;
    this.eventCount = fields.eventCount;
    this.resultCount = fields.resultCount;
    this.scanCount = fields.scanCount;
    this.runDurationSeconds = fields.runDurationSeconds;
    this.ttlSeconds = fields.ttlSeconds;
    this.isDone = fields.isDone;
    this.isFailed = fields.isFailed;
    this.isPaused = fields.isPaused;
    this.messages = Object.freeze(fields.messages.map((m) => Object.freeze({ ...m })));
    Object.freeze(this);
  }

  get progressPercent(): number {
    return this.progressFraction * 100;
  }

  get isActive(): boolean {
    return isActiveState(this.state);
  }

  get isTerminal(): boolean {
    return isTerminalState(this.state);
  }

  get isSuccess(): boolean {
    return isSuccessState(this.state);
  }

  /**
   * First diagnostic text of a failed job
   */
  get errorMessage(): string | undefined {
    if (!this.isFailed || this.messages.length === 0) {
      return undefined;
    }
    return this.messages[0].text;
  }

  toJSON() {
    return {
      identifier: this.identifier,
      state: this.state,
      progressPercent: this.progressPercent,
      eventCount: this.eventCount,
      resultCount: this.resultCount,
      scanCount: this.scanCount,
      runDurationSeconds: this.runDurationSeconds,
      ttlSeconds: this.ttlSeconds,
      isDone: this.isDone,
      isFailed: this.isFailed,
      isPaused: this.isPaused,
      messages: this.messages.map((m) => ({ ...m })),
      errorMessage: this.errorMessage,
    };
  }

  toString(): string {
    return `StatusSnapshot(${this.identifier}, ${this.state}, ${this.progressPercent.toFixed(1)}%, results=${this.resultCount})`;
  }
}
