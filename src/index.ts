export * from "./core/types";
export * from "./core/errors";
export { MemoryKv, keys, type KvStore } from "./core/store";
export { NonceLedger } from "./core/nonce";
export { CARRY_OVER, TaskQueue } from "./core/queue";
export { Scheduler, type SchedulerOptions } from "./core/scheduler";
export { MemoryEventLog } from "./core/events";
export { Runtime, type HeightFrame, type RuntimeOptions } from "./core/runtime";
export { eventsRoot, merkle, stateRoot, taskIdOf } from "./core/hash";
export {
  decPayload,
  encPayload,
  decEvent,
  decScheduleRequest,
  encEvent,
  encScheduleRequest,
} from "./codec/rlp";
export { decodeInbox } from "./infra/decodeInbox";
export { parseScheduleRequest, scheduleRequestSchema } from "./schema";
export { loadConfig, type SchedulerConfig } from "./config";
export { makeLogger, type ILogger, type LogLevel } from "./logging";
export { Ledger } from "./model/ledger";
export type { TaskId } from "./types/brands";
