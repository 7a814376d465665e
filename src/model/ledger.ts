import * as v from "valibot";
import { decUint, encUint } from "../codec/rlp";
import { DispatchError } from "../core/errors";
import { keys, type KvStore } from "../core/store";
import { err, ok, type Action, type Address, type ExecutionSink, type Result } from "../core/types";
import { addressSchema, uintSchema } from "../schema";

const transferSchema = v.object({ to: addressSchema, amount: uintSchema });
const remarkSchema = v.object({ text: v.string() });

export type Remark = { from: Address; text: string };

/* ──────────── domain logic: balances + remarks ──────────── */
export class Ledger implements ExecutionSink {
  readonly remarks: Remark[] = [];

  constructor(private readonly store: KvStore) {}

  balanceOf(account: Address): bigint {
    const raw = this.store.get(keys.balance(account));
    return raw ? decUint(raw) : 0n;
  }

  credit(account: Address, amount: bigint) {
    this.store.set(keys.balance(account), encUint(this.balanceOf(account) + amount));
  }

  dispatch(action: Action, asAccount: Address): Result<void, DispatchError> {
    switch (action.kind) {
      case "transfer": {
        const parsed = v.safeParse(transferSchema, action.data);
        if (!parsed.success) return err(new DispatchError("malformed transfer"));
        const { to, amount } = parsed.output;
        const from = this.balanceOf(asAccount);
        if (from < amount) return err(new DispatchError("insufficient balance"));
        this.store.set(keys.balance(asAccount), encUint(from - amount));
        this.credit(to, amount);
        return ok(undefined);
      }
      case "remark": {
        const parsed = v.safeParse(remarkSchema, action.data);
        if (!parsed.success) return err(new DispatchError("malformed remark"));
        this.remarks.push({ from: asAccount, text: parsed.output.text });
        return ok(undefined);
      }
      default:
        return err(new DispatchError(`unknown action kind ${action.kind}`));
    }
  }
}
