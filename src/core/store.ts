import type { Address, Height } from "./types";
import type { TaskId } from "../types/brands";

/**
 * Minimal persistent map the scheduler writes through. Values are RLP bytes.
 * `entries` is only used for introspection and state commitments.
 */
export interface KvStore {
  get(key: string): Uint8Array | undefined;
  set(key: string, value: Uint8Array): void;
  remove(key: string): void;
  entries(): Iterable<[string, Uint8Array]>;
}

export class MemoryKv implements KvStore {
  private readonly data = new Map<string, Uint8Array>();

  get(key: string) {
    return this.data.get(key);
  }

  set(key: string, value: Uint8Array) {
    this.data.set(key, value);
  }

  remove(key: string) {
    this.data.delete(key);
  }

  entries() {
    return this.data.entries();
  }

  get size() {
    return this.data.size;
  }
}

/* ── key layout ──────────────────────────────────────────── */
export const keys = {
  nonce: (account: Address) => `nonce:${account}`,
  task: (id: TaskId) => `task:${id}`,
  bucket: (height: Height) => `bucket:${height}`,
  balance: (account: Address) => `balance:${account}`,
  lastHeight: "meta:lastHeight",
} as const;

export const BUCKET_PREFIX = "bucket:";
export const TASK_PREFIX = "task:";
