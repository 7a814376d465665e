import { decBucket, decStoredTask, encBucket, encStoredTask } from "../codec/rlp";
import type { TaskId } from "../types/brands";
import { CorruptQueueError } from "./errors";
import { taskIdOf } from "./hash";
import { BUCKET_PREFIX, keys, TASK_PREFIX, type KvStore } from "./store";
import type { Bucket, Height, StoredTask, Task } from "./types";

export type PreparedTask = { readonly id: TaskId; readonly record: Uint8Array };

/** Height key reserved for tasks that were due but not yet executed. */
export const CARRY_OVER: Height = 0n;

const strip = ({ action, submitter, nonce, dueHeight }: StoredTask): Task => ({
  action,
  submitter,
  nonce,
  dueHeight,
});

/**
 * Height-keyed buckets of tasks, each a singly linked list of task records
 * (`{ head, tail }` per height, `next` per task). Append, splice and pop are
 * O(1) store operations.
 */
export class TaskQueue {
  constructor(private readonly store: KvStore) {}

  /* ── raw records ───────────────────────────────────────── */

  private bucket(height: Height): Bucket | undefined {
    const raw = this.store.get(keys.bucket(height));
    return raw ? decBucket(raw) : undefined;
  }

  private putBucket(height: Height, bk: Bucket | undefined) {
    if (bk) this.store.set(keys.bucket(height), encBucket(bk));
    else this.store.remove(keys.bucket(height));
  }

  private record(id: TaskId): StoredTask {
    const raw = this.store.get(keys.task(id));
    if (!raw) throw new CorruptQueueError(`dangling task link ${id}`);
    return decStoredTask(raw);
  }

  private putRecord(id: TaskId, t: StoredTask) {
    this.store.set(keys.task(id), encStoredTask(t));
  }

  /* ── mutation ──────────────────────────────────────────── */

  /**
   * Encode a task record without writing anything. Throws `CodecError` for
   * action data that cannot be stored and `CorruptQueueError` when a record
   * for the same (submitter, nonce) already exists.
   */
  prepare(task: Task): PreparedTask {
    const id = taskIdOf(task.submitter, task.nonce);
    if (this.store.get(keys.task(id)))
      throw new CorruptQueueError(`task ${id} is already queued`);
    const { action, submitter, nonce, dueHeight } = task;
    const record = encStoredTask({ action, submitter, nonce, dueHeight, next: null });
    return { id, record };
  }

  /**
   * Append to the tail of the bucket at `into` (the task's due height unless
   * the scheduler files it elsewhere). Callers admit the nonce first.
   */
  enqueue(task: Task, into: Height = task.dueHeight): TaskId {
    return this.insert(this.prepare(task), into);
  }

  /** Write a prepared record and link it after the tail of `into`. */
  insert({ id, record }: PreparedTask, into: Height): TaskId {
    const bk = this.bucket(into);
    const tail = bk ? this.record(bk.tail) : undefined;
    this.store.set(keys.task(id), record);

    if (!bk || !tail) {
      this.putBucket(into, { head: id, tail: id, len: 1 });
      return id;
    }
    this.putRecord(bk.tail, { ...tail, next: id });
    this.putBucket(into, { head: bk.head, tail: id, len: bk.len + 1 });
    return id;
  }

  /**
   * Link the bucket at `height` after the carry-over tail and drop its key.
   * Carry-over tasks stay ahead of the newly due ones.
   */
  spliceDue(height: Height): number {
    if (height === CARRY_OVER) return 0;
    const due = this.bucket(height);
    if (!due) return 0;

    const carry = this.bucket(CARRY_OVER);
    if (carry) {
      const tail = this.record(carry.tail);
      this.putRecord(carry.tail, { ...tail, next: due.head });
      this.putBucket(CARRY_OVER, {
        head: carry.head,
        tail: due.tail,
        len: carry.len + due.len,
      });
    } else {
      this.putBucket(CARRY_OVER, due);
    }
    this.putBucket(height, undefined);
    return due.len;
  }

  /** Remove and return the head of the carry-over bucket; its record is deleted. */
  pop(): Task | undefined {
    const carry = this.bucket(CARRY_OVER);
    if (!carry) return undefined;

    const head = this.record(carry.head);
    this.store.remove(keys.task(carry.head));
    if (head.next === null || carry.len <= 1) {
      this.putBucket(CARRY_OVER, undefined);
    } else {
      this.putBucket(CARRY_OVER, { head: head.next, tail: carry.tail, len: carry.len - 1 });
    }
    return strip(head);
  }

  popFront(limit: number): Task[] {
    const out: Task[] = [];
    while (out.length < limit) {
      const t = this.pop();
      if (!t) break;
      out.push(t);
    }
    return out;
  }

  /** Remove and return every task in the bucket at `height`, in arrival order. */
  drainDue(height: Height): Task[] {
    const tasks = this.walk(height, true);
    this.putBucket(height, undefined);
    return tasks;
  }

  /** Replace the carry-over bucket with `remaining`, in the given order. */
  setCarryOver(remaining: readonly Task[]) {
    this.drainDue(CARRY_OVER);
    for (const t of remaining) this.enqueue(t, CARRY_OVER);
  }

  /* ── reads ─────────────────────────────────────────────── */

  carryOver(): Task[] {
    return this.walk(CARRY_OVER, false);
  }

  tasksAt(height: Height): Task[] {
    return this.walk(height, false);
  }

  length(height: Height): number {
    return this.bucket(height)?.len ?? 0;
  }

  /** Every non-empty bucket, carry-over first, then ascending height. */
  pending(): { height: Height; tasks: Task[] }[] {
    const heights: Height[] = [];
    for (const [k] of this.store.entries())
      if (k.startsWith(BUCKET_PREFIX)) heights.push(BigInt(k.slice(BUCKET_PREFIX.length)));
    return heights
      .sort((a, b) => (a < b ? -1 : a > b ? 1 : 0))
      .map((height) => ({ height, tasks: this.tasksAt(height) }));
  }

  /** Number of persisted task records across all buckets. */
  get size(): number {
    let n = 0;
    for (const [k] of this.store.entries()) if (k.startsWith(TASK_PREFIX)) n++;
    return n;
  }

  private walk(height: Height, remove: boolean): Task[] {
    const bk = this.bucket(height);
    if (!bk) return [];
    const out: Task[] = [];
    let cursor: TaskId | null = bk.head;
    while (cursor !== null && out.length < bk.len) {
      const t = this.record(cursor);
      if (remove) this.store.remove(keys.task(cursor));
      out.push(strip(t));
      cursor = t.next;
    }
    return out;
  }
}
