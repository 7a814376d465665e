import { keccak_256 } from "@noble/hashes/sha3";
import { bytesToHex, concatBytes, utf8ToBytes } from "@noble/hashes/utils";
import { encEvent, encTaskKey } from "../codec/rlp";
import { asTaskId, type TaskId } from "../types/brands";
import type { KvStore } from "./store";
import type { Address, Hex, Nonce, SchedulerEvent } from "./types";

export const toHex = (b: Uint8Array): Hex => `0x${bytesToHex(b)}`;

const EMPTY_ROOT = keccak_256(new Uint8Array());

/* ── Merkle helper ───────────────────────────────────────── */
export const merkle = (leaves: Uint8Array[]): Uint8Array => {
  if (leaves.length === 0) return EMPTY_ROOT;
  if (leaves.length === 1) return leaves[0];
  const next: Uint8Array[] = [];
  for (let i = 0; i < leaves.length; i += 2) {
    const left = leaves[i];
    const right = i + 1 < leaves.length ? leaves[i + 1] : left;
    next.push(keccak_256(concatBytes(left, right)));
  }
  return merkle(next);
};

/* ── task identity: one id per (submitter, nonce) ────────── */
export const taskIdOf = (submitter: Address, nonce: Nonce): TaskId =>
  asTaskId(toHex(keccak_256(encTaskKey(submitter, nonce))));

/* ── commitment over the whole store ─────────────────────── */
export const stateRoot = (store: KvStore): Hex => {
  // Sort entries by key to ensure deterministic ordering
  const leaves = [...store.entries()]
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([k, v]) => keccak_256(concatBytes(keccak_256(utf8ToBytes(k)), v)));
  return toHex(merkle(leaves));
};

/* ── commitment over an ordered event sequence ───────────── */
export const eventsRoot = (events: readonly SchedulerEvent[]): Hex =>
  toHex(merkle(events.map((e) => keccak_256(encEvent(e)))));
