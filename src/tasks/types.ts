/**
 * @fileoverview Task lifecycle types: states, requests, handles and events.
 *
 * @module tasks/types
 */

import type { CaptureMode, CommandInvocation, OutputStream } from '../process/types';

// ─── Task State ────────────────────────────────────────────────────────────

/**
 * Lifecycle of one tracked invocation.
 *
 * `queued → starting → running → completed | failed | cancelled`, with
 * `starting → failed` when the executable cannot be started and
 * `queued | starting → cancelled` when cancelled early.
 */
export type TaskState = 'queued' | 'starting' | 'running' | 'completed' | 'failed' | 'cancelled';

export type TerminalTaskState = 'completed' | 'failed' | 'cancelled';

export const TERMINAL_TASK_STATES: readonly TerminalTaskState[] = ['completed', 'failed', 'cancelled'];

/**
 * Valid state transitions.
 */
export const VALID_TRANSITIONS: Record<TaskState, readonly TaskState[]> = {
  'queued':    ['starting', 'cancelled'],
  'starting':  ['running', 'failed', 'cancelled'],
  'running':   ['completed', 'failed', 'cancelled'],
  'completed': [],  // Terminal
  'failed':    [],  // Terminal
  'cancelled': [],  // Terminal
};

/**
 * Check if a task state is terminal (no further transitions possible).
 */
export function isTerminalState(state: TaskState): state is TerminalTaskState {
  return VALID_TRANSITIONS[state].length === 0;
}

/**
 * Check if a state transition is allowed by the transition table.
 */
export function isValidTransition(from: TaskState, to: TaskState): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}

// ─── Requests ──────────────────────────────────────────────────────────────

/**
 * Progress recognised in one line of output.
 */
export interface ProgressMarker {
  /** Message key for the presentation layer to localise. */
  messageKey: string;
  args?: readonly string[];
  /** Overall completion in [0, 1]; omitted when the line carries none. */
  fraction?: number;
}

/**
 * Tool-specific recogniser of progress lines.
 */
export type ProgressParser = (line: string, stream: OutputStream) => ProgressMarker | undefined;

/**
 * What to run and how to interpret it.
 */
export interface TaskRequest {
  /** Human readable name, passed as the first argument of status messages. */
  title: string;
  invocation: CommandInvocation;
  progressParser?: ProgressParser;
  /** `lines` (default) or `records`; whole-output capture has no streaming. */
  captureMode?: Exclude<CaptureMode, 'whole'>;
  mergeOutput?: boolean;
  /** Exit codes counted as success (default `[0]`). */
  successExitCodes?: readonly number[];
}

// ─── Results and Handles ───────────────────────────────────────────────────

export interface TaskResult {
  taskId: string;
  state: TerminalTaskState;
  exitCode: number | null;
  stdout: readonly string[];
  stderr: readonly string[];
  timedOut: boolean;
  durationMs: number;
  /** Set when the task failed. */
  errorMessage?: string;
}

/**
 * Read-only view of a submitted task. The engine keeps the mutable record.
 */
export interface TaskHandle {
  readonly id: string;
  readonly request: TaskRequest;
  /** Current state. */
  state(): TaskState;
  /** Settles once the task is terminal; never rejects. */
  readonly completion: Promise<TaskResult>;
}

// ─── Events ────────────────────────────────────────────────────────────────

interface TaskEventBase {
  taskId: string;
  /** State of the task when the event was emitted. */
  state: TaskState;
  timestamp: number;
}

export interface TaskStatusEvent extends TaskEventBase {
  kind: 'status';
  messageKey: string;
  args: readonly string[];
}

export interface TaskProgressEvent extends TaskEventBase {
  kind: 'progress';
  messageKey: string;
  args: readonly string[];
  fraction: number;
}

export interface TaskOutputEvent extends TaskEventBase {
  kind: 'output';
  stream: OutputStream;
  text: string;
}

export interface TaskErrorEvent extends TaskEventBase {
  kind: 'error';
  message: string;
}

export type TaskEvent = TaskStatusEvent | TaskProgressEvent | TaskOutputEvent | TaskErrorEvent;

export type TaskEventListener = (event: TaskEvent) => void;

// ─── Model Refresh ─────────────────────────────────────────────────────────

/**
 * Observer of model refreshes. Every callback is optional.
 */
export interface ModelListener<TModel> {
  reloadStarted?(): void;
  reloadSucceeded?(model: TModel): void;
  reloadFailed?(error: Error): void;
}
