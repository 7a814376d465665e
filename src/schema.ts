import * as v from "valibot";
import type { Address, Task } from "./core/types";

export const addressSchema = v.pipe(
  v.string(),
  v.regex(/^0x[0-9a-fA-F]{40}$/, "expected a 20-byte hex address"),
  v.toLowerCase(),
  v.transform((s): Address => `0x${s.slice(2)}`),
);

// bigint, safe integer, or decimal string
export const uintSchema = v.pipe(
  v.union([
    v.bigint(),
    v.pipe(v.number(), v.safeInteger()),
    v.pipe(v.string(), v.digits()),
  ]),
  v.transform((x) => BigInt(x)),
  v.minValue(0n, "expected a non-negative integer"),
);

export const actionSchema = v.object({
  kind: v.pipe(v.string(), v.minLength(1)),
  data: v.unknown(),
});

export const scheduleRequestSchema = v.object({
  action: actionSchema,
  submitter: addressSchema,
  nonce: uintSchema,
  dueHeight: uintSchema,
});

export type ScheduleRequestInput = v.InferInput<typeof scheduleRequestSchema>;

export const parseScheduleRequest = (input: unknown): Task => {
  const req = v.parse(scheduleRequestSchema, input);
  return {
    action: { kind: req.action.kind, data: req.action.data },
    submitter: req.submitter,
    nonce: req.nonce,
    dueHeight: req.dueHeight,
  };
};
