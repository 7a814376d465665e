import { DispatchError } from "../../src/core/errors";
import { MemoryEventLog } from "../../src/core/events";
import { Scheduler } from "../../src/core/scheduler";
import { MemoryKv } from "../../src/core/store";
import {
  err,
  ok,
  type Action,
  type Address,
  type ExecutionSink,
  type Result,
  type Task,
} from "../../src/core/types";
import { makeLogger } from "../../src/logging";

export const ALICE: Address = "0x00000000000000000000000000000000000000a1";
export const BOB: Address = "0x00000000000000000000000000000000000000b2";
export const CAROL: Address = "0x00000000000000000000000000000000000000c3";

export const call = (label: string, kind = "remark"): Action => ({
  kind,
  data: { label },
});

export const labelOf = (action: Action): string => {
  const d = action.data;
  if (typeof d === "object" && d !== null && "label" in d && typeof d.label === "string")
    return d.label;
  return "?";
};

export const mkTask = (
  label: string,
  nonce: bigint,
  dueHeight: bigint,
  submitter: Address = ALICE,
): Task => ({ action: call(label), submitter, nonce, dueHeight });

/** Succeeds for everything except kind 'fail' (returns an error) and 'throw'. */
export class RecordingSink implements ExecutionSink {
  readonly calls: { action: Action; as: Address }[] = [];

  dispatch(action: Action, asAccount: Address): Result<void, DispatchError> {
    this.calls.push({ action, as: asAccount });
    if (action.kind === "fail") return err(new DispatchError("boom"));
    if (action.kind === "throw") throw new Error("sink crashed");
    return ok(undefined);
  }

  get labels() {
    return this.calls.map((c) => labelOf(c.action));
  }
}

export const makeScheduler = (maxTasksPerHeight = 2) => {
  const store = new MemoryKv();
  const sink = new RecordingSink();
  const events = new MemoryEventLog();
  const scheduler = new Scheduler({
    store,
    sink,
    events,
    maxTasksPerHeight,
    logger: makeLogger("silent"),
  });
  return { store, sink, events, scheduler };
};
