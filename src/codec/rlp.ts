// RLP encode/decode helpers for everything the scheduler persists.

import * as rlp from "rlp";
import type { NestedUint8Array } from "rlp";
import { bytesToHex, hexToBytes } from "@noble/hashes/utils";
import { CodecError } from "../core/errors";
import { asTaskId, type TaskId } from "../types/brands";
import type {
  Action,
  Address,
  Bucket,
  SchedulerEvent,
  StoredTask,
  Task,
} from "../core/types";

type Decoded = Uint8Array | NestedUint8Array;

/* — helpers — */
const utf8 = (s: string) => Uint8Array.from(Buffer.from(s, "utf8"));
const str = (b: Uint8Array) => Buffer.from(b).toString("utf8");
const bufToBn = (b: Uint8Array): bigint =>
  b.length === 0 ? 0n : BigInt("0x" + bytesToHex(b));
const address = (b: Uint8Array): Address => `0x${str(b).slice(2)}`;

const list = (d: Decoded, len: number, what: string): Decoded[] => {
  if (d instanceof Uint8Array || d.length !== len)
    throw new CodecError(`malformed ${what}`);
  return d;
};

const bytes = (d: Decoded, what: string): Uint8Array => {
  if (!(d instanceof Uint8Array)) throw new CodecError(`malformed ${what}`);
  return d;
};

const decodeRaw = (b: Uint8Array, what: string): Decoded => {
  try {
    return rlp.decode(b);
  } catch (e) {
    throw new CodecError(`cannot decode ${what}`, { cause: e });
  }
};

const taskIdBytes = (id: TaskId) => hexToBytes(id.slice(2));
const taskIdOfBytes = (b: Uint8Array, what: string): TaskId => {
  if (b.length !== 32) throw new CodecError(`malformed ${what}`);
  return asTaskId(`0x${bytesToHex(b)}`);
};

/* — opaque payloads: tagged values that decode to what was encoded — */
const T = {
  undef: "u",
  nul: "n",
  bool: "b",
  num: "f",
  big: "i",
  str: "s",
  bytes: "y",
  arr: "a",
  obj: "o",
} as const;

const byKey = ([a]: [string, unknown], [b]: [string, unknown]) =>
  a < b ? -1 : a > b ? 1 : 0;

const isPlainObject = (v: object) => {
  const proto = Object.getPrototypeOf(v);
  return proto === Object.prototype || proto === null;
};

const encValue = (v: unknown, path: Set<object>): rlp.Input => {
  switch (typeof v) {
    case "undefined":
      return [utf8(T.undef), new Uint8Array()];
    case "boolean":
      return [utf8(T.bool), v ? 1 : 0];
    case "number": {
      const b = Buffer.alloc(8);
      b.writeDoubleBE(v);
      return [utf8(T.num), Uint8Array.from(b)];
    }
    case "bigint":
      return [utf8(T.big), [v < 0n ? 1 : 0, v < 0n ? -v : v]];
    case "string":
      return [utf8(T.str), utf8(v)];
    case "object": {
      if (v === null) return [utf8(T.nul), new Uint8Array()];
      if (v instanceof Uint8Array) return [utf8(T.bytes), Uint8Array.from(v)];
      if (path.has(v)) throw new CodecError("cyclic action data");
      path.add(v);
      try {
        if (Array.isArray(v)) return [utf8(T.arr), Array.from(v, (x) => encValue(x, path))];
        if (!isPlainObject(v))
          throw new CodecError(`unsupported action data: ${v.constructor?.name ?? "object"}`);
        return [
          utf8(T.obj),
          Object.entries(v)
            .sort(byKey)
            .map(([k, x]) => [utf8(k), encValue(x, path)]),
        ];
      } finally {
        path.delete(v);
      }
    }
    default:
      throw new CodecError(`unsupported action data: ${typeof v}`);
  }
};

const decValue = (d: Decoded): unknown => {
  const [tag, body] = list(d, 2, "action value");
  switch (str(bytes(tag, "value tag"))) {
    case T.undef:
      return undefined;
    case T.nul:
      return null;
    case T.bool:
      return bufToBn(bytes(body, "boolean")) === 1n;
    case T.num: {
      const b = bytes(body, "number");
      if (b.length !== 8) throw new CodecError("malformed number");
      return Buffer.from(b).readDoubleBE(0);
    }
    case T.big: {
      const [sign, mag] = list(body, 2, "bigint");
      const n = bufToBn(bytes(mag, "bigint"));
      return bufToBn(bytes(sign, "bigint sign")) === 1n ? -n : n;
    }
    case T.str:
      return str(bytes(body, "string"));
    case T.bytes:
      return Uint8Array.from(bytes(body, "bytes"));
    case T.arr:
      if (body instanceof Uint8Array) throw new CodecError("malformed array");
      return body.map(decValue);
    case T.obj:
      if (body instanceof Uint8Array) throw new CodecError("malformed object");
      return Object.fromEntries(
        body.map((entry) => {
          const [k, x] = list(entry, 2, "object entry");
          return [str(bytes(k, "object key")), decValue(x)];
        }),
      );
    default:
      throw new CodecError("unknown value tag");
  }
};

/** Deterministic byte form of an opaque payload; rejects what cannot round-trip. */
export const encPayload = (v: unknown): Uint8Array => {
  try {
    return rlp.encode(encValue(v, new Set()));
  } catch (e) {
    if (e instanceof CodecError) throw e;
    throw new CodecError("cannot encode action data", { cause: e });
  }
};

export const decPayload = (b: Uint8Array): unknown => decValue(decodeRaw(b, "payload"));

/* — unsigned integers (nonce counters, balances, heights) — */
export const encUint = (n: bigint): Uint8Array => rlp.encode(n);
export const decUint = (b: Uint8Array): bigint =>
  bufToBn(bytes(decodeRaw(b, "integer"), "integer"));

/* — action — */
const encAction = (a: Action): rlp.Input => [utf8(a.kind), encPayload(a.data)];
const decAction = (d: Decoded): Action => {
  const [kind, data] = list(d, 2, "action");
  return {
    kind: str(bytes(kind, "action kind")),
    data: decPayload(bytes(data, "action data")),
  };
};

/* — task — */
const encTaskFields = (t: Task): rlp.Input[] => [
  utf8(t.submitter),
  t.nonce,
  t.dueHeight,
  encAction(t.action),
];

export const encTaskKey = (submitter: Address, nonce: bigint): Uint8Array =>
  rlp.encode([utf8(submitter), nonce]);

export const encStoredTask = (t: StoredTask): Uint8Array =>
  rlp.encode([...encTaskFields(t), t.next ? taskIdBytes(t.next) : new Uint8Array()]);

export const decStoredTask = (b: Uint8Array): StoredTask => {
  const [submitter, nonce, dueHeight, action, next] = list(
    decodeRaw(b, "task"),
    5,
    "task",
  );
  const nextBytes = bytes(next, "task link");
  return {
    action: decAction(action),
    submitter: address(bytes(submitter, "task submitter")),
    nonce: bufToBn(bytes(nonce, "task nonce")),
    dueHeight: bufToBn(bytes(dueHeight, "task height")),
    next: nextBytes.length === 0 ? null : taskIdOfBytes(nextBytes, "task link"),
  };
};

/* — bucket — */
export const encBucket = (bk: Bucket): Uint8Array =>
  rlp.encode([taskIdBytes(bk.head), taskIdBytes(bk.tail), bk.len]);

export const decBucket = (b: Uint8Array): Bucket => {
  const [head, tail, len] = list(decodeRaw(b, "bucket"), 3, "bucket");
  return {
    head: taskIdOfBytes(bytes(head, "bucket head"), "bucket head"),
    tail: taskIdOfBytes(bytes(tail, "bucket tail"), "bucket tail"),
    len: Number(bufToBn(bytes(len, "bucket length"))),
  };
};

/* — event — */
export const encEvent = (e: SchedulerEvent): Uint8Array =>
  rlp.encode([
    utf8(e.type),
    e.height,
    utf8(e.submitter),
    e.nonce,
    encAction(e.action),
    utf8(e.type === "TaskExecutedErr" ? e.reason : ""),
  ]);

export const decEvent = (b: Uint8Array): SchedulerEvent => {
  const [type, height, submitter, nonce, action, reason] = list(
    decodeRaw(b, "event"),
    6,
    "event",
  );
  const common = {
    height: bufToBn(bytes(height, "event height")),
    submitter: address(bytes(submitter, "event submitter")),
    nonce: bufToBn(bytes(nonce, "event nonce")),
    action: decAction(action),
  };
  const kind = str(bytes(type, "event type"));
  if (kind === "TaskExecutedOk") return { type: kind, ...common };
  if (kind === "TaskExecutedErr")
    return { type: kind, ...common, reason: str(bytes(reason, "event reason")) };
  throw new CodecError(`unknown event type ${kind}`);
};

/* — inbound schedule request — */
export type ScheduleRequest = Task;

export const encScheduleRequest = (t: ScheduleRequest): Uint8Array =>
  rlp.encode(encTaskFields(t));

export const decScheduleRequest = (b: Uint8Array): ScheduleRequest => {
  const [submitter, nonce, dueHeight, action] = list(
    decodeRaw(b, "schedule request"),
    4,
    "schedule request",
  );
  return {
    action: decAction(action),
    submitter: address(bytes(submitter, "request submitter")),
    nonce: bufToBn(bytes(nonce, "request nonce")),
    dueHeight: bufToBn(bytes(dueHeight, "request height")),
  };
};
