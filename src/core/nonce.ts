import { decUint, encUint } from "../codec/rlp";
import { InvalidNonceError } from "./errors";
import { keys, type KvStore } from "./store";
import { err, ok, type Address, type Nonce, type Result } from "./types";

/**
 * Per-account replay guard. A submission is admitted iff it presents the
 * account's current counter; admission bumps the counter by exactly one.
 * There is no buffering of future nonces.
 */
export class NonceLedger {
  constructor(private readonly store: KvStore) {}

  expectedNonce(account: Address): Nonce {
    const raw = this.store.get(keys.nonce(account));
    return raw ? decUint(raw) : 0n;
  }

  /** Read-only form of `admit`. */
  check(account: Address, presented: Nonce): Result<Nonce, InvalidNonceError> {
    const expected = this.expectedNonce(account);
    if (presented !== expected)
      return err(new InvalidNonceError(account, expected, presented));
    return ok(expected);
  }

  admit(account: Address, presented: Nonce): Result<void, InvalidNonceError> {
    const checked = this.check(account, presented);
    if (!checked.ok) return checked;
    this.store.set(keys.nonce(account), encUint(checked.value + 1n));
    return ok(undefined);
  }
}
