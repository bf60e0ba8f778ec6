import { describe, it, expect } from "vitest";
import { ManualClock, SystemClock } from "../src/clock.js";
import { domainErrorCode, errorKindOf } from "../src/errors.js";
import { SerialRegion } from "../src/serial-region.js";
import { atomically, UndoJournal } from "../src/undo-journal.js";
import { PostCommitReporter } from "../src/post-commit.js";
import type { PostCommitFailure } from "../src/post-commit.js";
import { LendingError } from "../src/types.js";

describe("errorKindOf", () => {
  it.each([
    ["NOT_MEMBER", "authorization"],
    ["NO_SUCH_LOAN", "not_found"],
    ["REENTRANT_CALL", "state_conflict"],
    ["INSUFFICIENT_POOL", "value"],
  ] as const)("maps %s to %s", (code, kind) => {
    expect(errorKindOf(code)).toBe(kind);
  });

  it("returns undefined for foreign codes", () => {
    expect(errorKindOf("CONCURRENCY_CONFLICT")).toBeUndefined();
  });

  it("reads codes off any error", () => {
    expect(domainErrorCode(new LendingError("UNAVAILABLE", "x"))).toBe("UNAVAILABLE");
    expect(domainErrorCode(new Error("plain"))).toBeUndefined();
    expect(domainErrorCode("NOT_MEMBER")).toBeUndefined();
  });
});

describe("clocks", () => {
  it("moves a manual clock only on request", () => {
    const clock = new ManualClock(100);
    expect(clock.now()).toBe(100);
    expect(clock.advance(5)).toBe(105);
    clock.set(7);
    expect(clock.now()).toBe(7);
  });

  it("reads whole seconds from the system clock", () => {
    const now = new SystemClock().now();
    expect(Number.isInteger(now)).toBe(true);
    expect(Math.abs(now - Date.now() / 1000)).toBeLessThan(2);
  });
});

describe("SerialRegion", () => {
  it("rejects re-entry on the same key and releases on exit", () => {
    const region = new SerialRegion();
    expect(() => region.run("k", () => region.run("k", () => 1))).toThrow(/already in progress/);
    expect(region.isHeld("k")).toBe(false);
    expect(region.run("k", () => region.run("other", () => 2))).toBe(2);
  });

  it("releases the key when the body throws", () => {
    const region = new SerialRegion();
    expect(() =>
      region.run("k", () => {
        throw new Error("boom");
      }),
    ).toThrow("boom");
    expect(region.isHeld("k")).toBe(false);
  });
});

describe("UndoJournal", () => {
  it("undoes newest first", () => {
    const log: string[] = [];
    const journal = new UndoJournal();
    journal.record(() => log.push("first"));
    journal.record(() => log.push("second"));
    journal.rollback();
    expect(log).toEqual(["second", "first"]);
    expect(journal.size).toBe(0);
  });

  it("atomically rolls back and rethrows", () => {
    const state = { n: 0 };
    expect(() =>
      atomically((journal) => {
        state.n = 1;
        journal.record(() => {
          state.n = 0;
        });
        throw new Error("late failure");
      }),
    ).toThrow("late failure");
    expect(state.n).toBe(0);
    expect(atomically(() => "ok")).toBe("ok");
  });
});

describe("PostCommitReporter", () => {
  it("keeps failures when no handler is set", () => {
    const reporter = new PostCommitReporter();
    const error = new Error("listener down");
    reporter.guard("borrow", "loan:alice:1", () => {
      throw error;
    });
    reporter.guard("borrow", "loan:bob:1", () => undefined);

    expect(reporter.failures()).toEqual([{ operation: "borrow", key: "loan:alice:1", error }]);
  });

  it("hands failures to the handler instead of keeping them", () => {
    const seen: PostCommitFailure[] = [];
    const reporter = new PostCommitReporter((failure) => seen.push(failure));
    reporter.guard("extend", "loan:alice:1", () => {
      throw new Error("listener down");
    });

    expect(seen.map((f) => f.operation)).toEqual(["extend"]);
    expect(reporter.failures()).toEqual([]);
  });

  it("keeps both errors when the handler throws", () => {
    const handlerError = new Error("log sink closed");
    const reporter = new PostCommitReporter(() => {
      throw handlerError;
    });
    const error = new Error("listener down");

    expect(() =>
      reporter.guard("return", "loan:alice:1", () => {
        throw error;
      }),
    ).not.toThrow();
    expect(reporter.failures()).toEqual([
      { operation: "return", key: "loan:alice:1", error },
      { operation: "report", key: "loan:alice:1", error: handlerError },
    ]);
  });
});
