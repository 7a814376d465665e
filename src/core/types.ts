import type { TaskId } from "../types/brands";
import type { DispatchError } from "./errors";

export type Hex = `0x${string}`;
export type Address = Hex;
export type Height = bigint;
export type Nonce = bigint;

/* ── result envelope ─────────────────────────────────────── */
export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export const ok = <T>(value: T): Result<T, never> => ({ ok: true, value });
export const err = <E>(error: E): Result<never, E> => ({ ok: false, error });

/* ── opaque delegated call ───────────────────────────────── */
export type Action = {
  kind: string; // e.g. 'transfer', 'remark'
  data: unknown; // interpreted by the execution sink only
};

/* ── task ────────────────────────────────────────────────── */
export type Task = {
  readonly action: Action;
  readonly submitter: Address; // authenticated by the host before admission
  readonly nonce: Nonce;
  readonly dueHeight: Height;
};

// persisted form: intra-bucket singly linked list
export type StoredTask = Task & { next: TaskId | null };

export type Bucket = {
  head: TaskId;
  tail: TaskId;
  len: number;
};

/* ── collaborators ───────────────────────────────────────── */
export interface ExecutionSink {
  dispatch(action: Action, asAccount: Address): Result<void, DispatchError>;
}

export type SchedulerEvent =
  | {
      type: "TaskExecutedOk";
      height: Height;
      submitter: Address;
      nonce: Nonce;
      action: Action;
    }
  | {
      type: "TaskExecutedErr";
      height: Height;
      submitter: Address;
      nonce: Nonce;
      action: Action;
      reason: string;
    };

export interface EventLog {
  append(event: SchedulerEvent): void;
}

/* ── per-height batch summary ────────────────────────────── */
export type BatchReport = {
  height: Height;
  dispatched: number;
  succeeded: number;
  failed: number;
  carried: number; // left in the carry-over bucket
};
