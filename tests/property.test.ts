import { describe, it, expect } from "vitest";
import fc from "fast-check";
import { eventsRoot, stateRoot } from "../src/core/hash";
import { ALICE, BOB, CAROL, call, labelOf, makeScheduler } from "./helpers/task";

const ACCOUNTS = [ALICE, BOB, CAROL];

const submission = fc.record({
  account: fc.integer({ min: 0, max: 2 }),
  dueHeight: fc.bigInt({ min: 1n, max: 6n }),
  fails: fc.boolean(),
});

/** Schedule every submission with the right nonce; label = arrival index. */
const scheduleAll = (
  scheduler: ReturnType<typeof makeScheduler>["scheduler"],
  subs: { account: number; dueHeight: bigint; fails: boolean }[],
) =>
  subs.map((s, i) => {
    const who = ACCOUNTS[s.account];
    const res = scheduler.scheduleTask(
      call(String(i), s.fails ? "fail" : "remark"),
      who,
      scheduler.expectedNonce(who),
      s.dueHeight,
    );
    expect(res.ok).toBe(true);
    return { ...s, index: i };
  });

describe("Scheduler properties", () => {
  it("nonces count admissions and never readmit", () => {
    fc.assert(
      fc.property(fc.array(fc.integer({ min: 0, max: 2 }), { maxLength: 30 }), (picks) => {
        const { scheduler } = makeScheduler();
        for (const p of picks) {
          const who = ACCOUNTS[p];
          expect(scheduler.scheduleTask(call("x"), who, scheduler.expectedNonce(who), 1n).ok).toBe(true);
        }
        ACCOUNTS.forEach((who, i) => {
          const n = BigInt(picks.filter((p) => p === i).length);
          expect(scheduler.expectedNonce(who)).toBe(n);
          for (let k = 0n; k < n; k++)
            expect(scheduler.scheduleTask(call("x"), who, k, 1n).ok).toBe(false);
        });
      }),
      { numRuns: 50 },
    );
  });

  it("respects the cap, keeps oldest-due-first order and runs each task once", () => {
    fc.assert(
      fc.property(
        fc.array(submission, { maxLength: 25 }),
        fc.integer({ min: 1, max: 4 }),
        (subs, cap) => {
          const { scheduler, sink, events } = makeScheduler(cap);
          const scheduled = scheduleAll(scheduler, subs);

          const lastHeight = 6n + BigInt(Math.ceil(subs.length / cap)) + 1n;
          for (let h = 1n; h <= lastHeight; h++) {
            const before = sink.calls.length;
            const report = scheduler.run(h);
            expect(sink.calls.length - before).toBe(report.dispatched);
            expect(report.dispatched).toBeLessThanOrEqual(cap);
          }

          const expected = [...scheduled]
            .sort((a, b) =>
              a.dueHeight !== b.dueHeight ? (a.dueHeight < b.dueHeight ? -1 : 1) : a.index - b.index,
            )
            .map((s) => String(s.index));
          expect(sink.labels).toEqual(expected);

          const ids = events.events.map((e) => `${e.submitter}:${e.nonce}`);
          expect(new Set(ids).size).toBe(subs.length);
          expect(events.events.filter((e) => e.type === "TaskExecutedErr")).toHaveLength(
            subs.filter((s) => s.fails).length,
          );
          expect(scheduler.queue.size).toBe(0);
          expect(scheduler.queue.pending()).toEqual([]);
        },
      ),
      { numRuns: 50 },
    );
  });

  it("never dispatches a task before its due height", () => {
    fc.assert(
      fc.property(fc.array(submission, { maxLength: 20 }), (subs) => {
        const { scheduler, events } = makeScheduler(3);
        const scheduled = scheduleAll(scheduler, subs);
        for (let h = 1n; h <= 20n; h++) scheduler.run(h);
        for (const e of events.events) {
          const s = scheduled[Number(labelOf(e.action))];
          expect(e.height >= s.dueHeight).toBe(true);
        }
      }),
      { numRuns: 50 },
    );
  });

  it("replicas fed the same inputs agree on state and events", () => {
    fc.assert(
      fc.property(fc.array(submission, { maxLength: 20 }), (subs) => {
        const a = makeScheduler(2);
        const b = makeScheduler(2);
        scheduleAll(a.scheduler, subs);
        scheduleAll(b.scheduler, subs);
        for (let h = 1n; h <= 8n; h++) {
          a.scheduler.run(h);
          b.scheduler.run(h);
          expect(stateRoot(a.store)).toBe(stateRoot(b.store));
        }
        expect(eventsRoot(a.events.events)).toBe(eventsRoot(b.events.events));
      }),
      { numRuns: 25 },
    );
  });
});
