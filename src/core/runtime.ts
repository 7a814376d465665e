import { loadConfig, type SchedulerConfig } from "../config";
import { decodeInbox } from "../infra/decodeInbox";
import { makeLogger, type ILogger, type LogLevel } from "../logging";
import { parseScheduleRequest } from "../schema";
import type { TaskId } from "../types/brands";
import type { InvalidNonceError } from "./errors";
import { MemoryEventLog } from "./events";
import { eventsRoot, stateRoot } from "./hash";
import { Scheduler } from "./scheduler";
import { MemoryKv, type KvStore } from "./store";
import type {
  BatchReport,
  ExecutionSink,
  Height,
  Hex,
  Result,
  SchedulerEvent,
} from "./types";

export type HeightFrame = {
  height: Height;
  report: BatchReport;
  events: SchedulerEvent[];
  eventsRoot: Hex;
  stateRoot: Hex;
};

export type RuntimeOptions = {
  sink: ExecutionSink | ((store: KvStore) => ExecutionSink);
  store?: KvStore;
  maxTasksPerHeight?: number;
  logLevel?: LogLevel;
  logger?: ILogger;
};

/* ──────────── runtime shell: one replica's height loop ──────────── */
export class Runtime {
  readonly store: KvStore;
  readonly events = new MemoryEventLog();
  readonly scheduler: Scheduler;
  readonly sink: ExecutionSink;
  private height: Height;
  private log: ILogger;

  constructor(opts: RuntimeOptions) {
    // environment is only consulted for options the caller left out
    let cfg: SchedulerConfig | undefined;
    const config = () => (cfg ??= loadConfig());
    this.log = opts.logger ?? makeLogger(opts.logLevel ?? config().logLevel);
    this.store = opts.store ?? new MemoryKv();
    this.sink = typeof opts.sink === "function" ? opts.sink(this.store) : opts.sink;
    this.scheduler = new Scheduler({
      store: this.store,
      sink: this.sink,
      events: this.events,
      maxTasksPerHeight: opts.maxTasksPerHeight ?? config().maxTasksPerHeight,
      logger: this.log,
    });
    this.height = this.scheduler.lastHeight() ?? 0n;
  }

  get currentHeight(): Height {
    return this.height;
  }

  /** Accepts a plain request object or its RLP wire form. */
  submit(request: unknown): Result<TaskId, InvalidNonceError> {
    const task =
      request instanceof Uint8Array ? decodeInbox(request) : parseScheduleRequest(request);
    return this.scheduler.scheduleTask(task.action, task.submitter, task.nonce, task.dueHeight);
  }

  /** Advance one height and run its batch. */
  tick(): HeightFrame {
    const height = this.height + 1n;
    const mark = this.events.length;
    const report = this.scheduler.run(height);
    this.height = height;

    const events = this.events.since(mark);
    const frame: HeightFrame = {
      height,
      report,
      events,
      eventsRoot: eventsRoot(events),
      stateRoot: stateRoot(this.store),
    };
    this.log.debug({ height, root: frame.stateRoot }, "height committed");
    return frame;
  }
}
