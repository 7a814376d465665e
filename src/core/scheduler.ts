import { decUint, encUint } from "../codec/rlp";
import { makeLogger, type ILogger } from "../logging";
import type { TaskId } from "../types/brands";
import {
  ConfigError,
  InvalidHeightError,
  toDispatchError,
  type DispatchError,
  type InvalidNonceError,
} from "./errors";
import { NonceLedger } from "./nonce";
import { CARRY_OVER, TaskQueue } from "./queue";
import { keys, type KvStore } from "./store";
import {
  err,
  ok,
  type Action,
  type Address,
  type BatchReport,
  type EventLog,
  type ExecutionSink,
  type Height,
  type Nonce,
  type Result,
  type SchedulerEvent,
  type Task,
} from "./types";

export type SchedulerOptions = {
  store: KvStore;
  sink: ExecutionSink;
  events: EventLog;
  maxTasksPerHeight: number;
  logger?: ILogger;
};

/**
 * Admits delegated tasks behind the nonce guard and, once per height, runs a
 * bounded batch: splice the due bucket behind the carry-over bucket, pop at
 * most `maxTasksPerHeight` tasks, dispatch each as its submitter. Whatever is
 * not popped stays in the carry-over bucket for the next height.
 *
 * The scheduler is the only writer of the nonce counters and the queue.
 */
export class Scheduler {
  readonly nonces: NonceLedger;
  readonly queue: TaskQueue;
  readonly maxTasksPerHeight: number;
  private readonly store: KvStore;
  private readonly sink: ExecutionSink;
  private readonly events: EventLog;
  private readonly log: ILogger;

  constructor(opts: SchedulerOptions) {
    if (!Number.isSafeInteger(opts.maxTasksPerHeight) || opts.maxTasksPerHeight < 1)
      throw new ConfigError(
        `maxTasksPerHeight must be a positive integer, got ${opts.maxTasksPerHeight}`,
      );
    this.store = opts.store;
    this.sink = opts.sink;
    this.events = opts.events;
    this.maxTasksPerHeight = opts.maxTasksPerHeight;
    this.log = opts.logger ?? makeLogger("silent");
    this.nonces = new NonceLedger(opts.store);
    this.queue = new TaskQueue(opts.store);
  }

  expectedNonce(account: Address): Nonce {
    return this.nonces.expectedNonce(account);
  }

  /** Height of the last executed batch, if any. */
  lastHeight(): Height | undefined {
    const raw = this.store.get(keys.lastHeight);
    return raw ? decUint(raw) : undefined;
  }

  /**
   * Admit a task. Nothing is written on `InvalidNonceError` or when the
   * action data cannot be encoded (`CodecError`). A task due at or
   * before the last executed height goes straight to the carry-over bucket.
   */
  scheduleTask(
    action: Action,
    submitter: Address,
    nonce: Nonce,
    dueHeight: Height,
  ): Result<TaskId, InvalidNonceError> {
    if (dueHeight < 0n) throw new InvalidHeightError(`negative due height ${dueHeight}`);

    const checked = this.nonces.check(submitter, nonce);
    if (!checked.ok) {
      this.log.debug(
        { submitter, expected: checked.error.expected, presented: nonce },
        "task rejected",
      );
      return checked;
    }

    // encode first: the nonce bump is the only write that can follow
    const task: Task = { action, submitter, nonce, dueHeight };
    const prepared = this.queue.prepare(task);
    const admitted = this.nonces.admit(submitter, nonce);
    if (!admitted.ok) return admitted;

    const last = this.lastHeight();
    const into = last !== undefined && dueHeight <= last ? CARRY_OVER : dueHeight;
    const id = this.queue.insert(prepared, into);
    this.log.debug({ id, submitter, nonce, dueHeight, into }, "task scheduled");
    return ok(id);
  }

  /**
   * Execute the batch for `height`. Meant to be called exactly once per
   * height by the host's finalisation hook; a second call for the same height
   * only sees whatever is left in the carry-over bucket.
   */
  run(height: Height): BatchReport {
    if (height <= CARRY_OVER) throw new InvalidHeightError(`cannot run height ${height}`);

    this.queue.spliceDue(height);
    // bucket `height` is gone: anything scheduled for it from now on is late
    this.store.set(keys.lastHeight, encUint(height));

    let succeeded = 0;
    let failed = 0;
    for (let i = 0; i < this.maxTasksPerHeight; i++) {
      const task = this.queue.pop();
      if (!task) break;
      const event = this.dispatch(task, height);
      this.events.append(event);
      if (event.type === "TaskExecutedOk") succeeded++;
      else failed++;
    }

    const report: BatchReport = {
      height,
      dispatched: succeeded + failed,
      succeeded,
      failed,
      carried: this.queue.length(CARRY_OVER),
    };
    if (report.dispatched > 0 || report.carried > 0) this.log.info(report, "batch executed");
    return report;
  }

  private dispatch(task: Task, height: Height): SchedulerEvent {
    const { action, submitter, nonce } = task;
    let outcome: Result<void, DispatchError>;
    try {
      outcome = this.sink.dispatch(action, submitter);
    } catch (e) {
      outcome = err(toDispatchError(e));
    }

    if (outcome.ok) return { type: "TaskExecutedOk", height, submitter, nonce, action };

    this.log.warn(
      { height, submitter, nonce, kind: action.kind, reason: outcome.error.message },
      "task failed",
    );
    return {
      type: "TaskExecutedErr",
      height,
      submitter,
      nonce,
      action,
      reason: outcome.error.message,
    };
  }
}
