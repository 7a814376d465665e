import { decScheduleRequest } from "../codec/rlp";
import type { Task } from "../core/types";
import { parseScheduleRequest } from "../schema";

/**
 * Wire form of `scheduleTask`: RLP([submitter, nonce, dueHeight, [kind, json]]).
 * The host has already checked the submitter's signature.
 */
export const decodeInbox = (payload: Uint8Array): Task =>
  parseScheduleRequest(decScheduleRequest(payload));
