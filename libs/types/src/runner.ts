// Outcomes of fanned-out per-object tasks

export type TaskFailureKind = 'TIMEOUT' | 'TRANSPORT_ERROR' | 'DOMAIN_ERROR' | 'UNEXPECTED_ERROR';

export type TaskFailure =
  | { kind: 'TIMEOUT'; timeoutMs: number; message: string }
  | { kind: 'TRANSPORT_ERROR'; message: string }
  | { kind: 'DOMAIN_ERROR'; code: string; message: string }
  | { kind: 'UNEXPECTED_ERROR'; message: string };

export type TaskOutcome<R> =
  | { status: 'success'; value: R }
  | { status: 'failure'; failure: TaskFailure };

export interface TaskResult<T, R> {
  item: T;
  /** Position of the item in the submitted collection */
  index: number;
  outcome: TaskOutcome<R>;
  durationMs: number;
}

export interface RunSummary<T, R> {
  /** Results in completion order */
  results: TaskResult<T, R>[];
  succeeded: number;
  failed: number;
}

export interface ImportSummary {
  section: string;
  created: number;
  updated: number;
  failed: number;
  skipped: number;
}
