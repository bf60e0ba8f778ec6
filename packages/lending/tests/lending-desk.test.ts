/**
 * Tests for the lending desk's audit trail and admin surface.
 */

import { describe, it, expect } from "vitest";
import { CIRCULATE_EVENTS } from "@circulate/event-store";
import { ALICE, BOB, BRANCH, codeOf, eur, setup, STEWARD, T0 } from "./helpers.js";

describe("LendingDesk", () => {
  describe("audit trail", () => {
    it("records setup changes in their streams", () => {
      const { events } = setup();
      expect(events.read("item:1").map((e) => e.event.type)).toEqual([
        CIRCULATE_EVENTS.ITEM_CREATED,
        CIRCULATE_EVENTS.UNITS_MINTED,
      ]);
      expect(events.read("membership")[0]?.event.payload).toEqual({
        account: ALICE,
        tier: null,
        grantedBy: STEWARD,
      });
    });

    it("writes a loan's lifecycle to its stream", () => {
      const { desk, clock, events } = setup();
      desk.borrow(ALICE, 1);
      clock.advance(10);
      desk.returnItem(ALICE, 1);

      const stream = events.read("loan:alice:1");
      expect(stream.map((e) => e.event.type)).toEqual([
        CIRCULATE_EVENTS.LOAN_OPENED,
        CIRCULATE_EVENTS.LOAN_RETURNED,
        CIRCULATE_EVENTS.DEPOSIT_RELEASED,
      ]);

      const [opened, returned, released] = stream;
      expect(opened?.event.payload).toEqual({
        borrower: ALICE,
        itemId: 1,
        custodian: BRANCH,
        openedAt: T0,
        dueDate: T0 + 1_000,
        deposit: "5.00",
        currency: "EUR",
      });
      expect(returned?.event.metadata.timestamp).toBe("1970-01-12T13:46:50.000Z");
      expect(returned?.event.metadata.source).toBe("lending");
      expect(released?.event.metadata.source).toBe("escrow");
      expect(released?.event.metadata.causationId).toBe(returned?.event.metadata.eventId);
      expect(released?.event.metadata.correlationId).toBe(returned?.event.metadata.correlationId);
      expect(returned?.event.metadata.causationId).toBeUndefined();
      expect(events.verifyIntegrity().valid).toBe(true);
    });

    it("records forfeiture with the pool balance", () => {
      const { desk, clock, events } = setup();
      desk.borrow(ALICE, 1);
      clock.set(T0 + 5_000);
      desk.returnItem(ALICE, 1);

      const last = events.read("loan:alice:1").at(-1);
      expect(last?.event.type).toBe(CIRCULATE_EVENTS.DEPOSIT_FORFEITED);
      expect(last?.event.payload).toMatchObject({ amount: "5.00", poolBalance: "5.00" });
    });

    it("records extensions", () => {
      const { desk, events } = setup();
      desk.borrow(ALICE, 1);
      desk.requestExtension(ALICE, 1);
      expect(events.read("loan:alice:1").at(-1)?.event.payload).toEqual({
        borrower: ALICE,
        itemId: 1,
        previousDueDate: T0 + 1_000,
        dueDate: T0 + 1_500,
        extensionsUsed: 1,
      });
    });

    it("records nothing for a rejected operation", () => {
      const { desk, events } = setup();
      const before = events.globalPosition();
      codeOf(() => desk.borrow(BOB, 1));
      codeOf(() => desk.updatePolicy(ALICE, { setting: "gracePeriod", value: 1 }));
      expect(events.globalPosition()).toBe(before);
    });

    it("records policy changes with old and new values", () => {
      const { desk, events } = setup();
      desk.updatePolicy(STEWARD, { setting: "depositAmount", value: eur("6.00") });
      desk.updatePolicy(STEWARD, { setting: "maxExtensions", value: 0 });
      expect(events.read("policy").map((e) => e.event.payload)).toEqual([
        { setting: "depositAmount", oldValue: "5.00", newValue: "6.00", changedBy: STEWARD },
        { setting: "maxExtensions", oldValue: 2, newValue: 0, changedBy: STEWARD },
      ]);
    });
  });

  describe("administration", () => {
    it("lets a granted curator edit and pause items", () => {
      const { desk, events } = setup();
      expect(codeOf(() => desk.setPaused("cur", 1, true))).toBe("NOT_CURATOR");
      expect(desk.grantCurator(STEWARD, "cur")).toBe(true);
      expect(desk.grantCurator(STEWARD, "cur")).toBe(false);

      desk.updateMetadata("cur", 1, { license: "CC-BY-4.0" });
      desk.setPaused("cur", 1, true);

      expect(desk.getItem(1)?.paused).toBe(true);
      expect(desk.getItem(1)?.metadata.license).toBe("CC-BY-4.0");
      expect(events.read("item:1").at(-2)?.event.payload).toEqual({
        itemId: 1,
        fields: ["license"],
        updatedBy: "cur",
      });
      expect(events.read("policy").map((e) => e.event.type)).toEqual([CIRCULATE_EVENTS.CURATOR_CHANGED]);

      expect(desk.revokeCurator(STEWARD, "cur")).toBe(true);
      expect(codeOf(() => desk.setPaused("cur", 1, false))).toBe("NOT_CURATOR");
    });

    it("mints to the custodian by default", () => {
      const { desk } = setup();
      expect(desk.mint(STEWARD, 1, 3)).toBe(5);
      expect(desk.availableUnits(1)).toBe(5);
    });

    it("needs a recipient when no custodian is set", () => {
      const { desk } = setup({}, undefined);
      expect(codeOf(() => desk.mint(STEWARD, 1, 1))).toBe("BRANCH_UNSET");
      expect(desk.availableUnits(1)).toBe(0);
    });

    it("revokes membership without touching open loans", () => {
      const { desk, events } = setup();
      desk.borrow(ALICE, 1);
      expect(desk.revokeMembership(STEWARD, ALICE)).toBe(true);
      expect(desk.revokeMembership(STEWARD, ALICE)).toBe(false);
      expect(desk.isMember(ALICE)).toBe(false);
      expect(desk.returnItem(ALICE, 1).late).toBe(false);
      expect(events.read("membership")).toHaveLength(2);
    });

    it("hands stewardship over and can renounce it", () => {
      const { desk } = setup();
      desk.transferStewardship(STEWARD, "heir");
      expect(codeOf(() => desk.createItem(STEWARD, { title: "x", author: "", contentPointer: "p", license: "", contributors: [] }))).toBe(
        "NOT_STEWARD",
      );
      desk.renounceStewardship("heir");
      expect(desk.policySnapshot().steward).toBeNull();
      expect(codeOf(() => desk.setCustodian("heir", "annex"))).toBe("STEWARD_RENOUNCED");
      expect(codeOf(() => desk.withdrawPool("heir", "heir", eur("1.00")))).toBe("NOT_STEWARD");
    });
  });

  describe("forfeiture pool", () => {
    it("lets the steward withdraw forfeited deposits", () => {
      const { desk, clock, funds, events } = setup();
      desk.borrow(ALICE, 1);
      clock.set(T0 + 5_000);
      desk.returnItem(ALICE, 1);

      const withdrawal = desk.withdrawPool(STEWARD, "treasurer", eur("2.00"));

      expect(withdrawal.poolBalance).toEqual(eur("3.00"));
      expect(funds.inner.balanceOf("treasurer")).toEqual(eur("2.00"));
      expect(events.read("escrow")[0]?.event.payload).toEqual({
        to: "treasurer",
        amount: "2.00",
        currency: "EUR",
        poolBalance: "3.00",
        withdrawnBy: STEWARD,
      });
    });

    it("refuses more than the pool holds", () => {
      const { desk } = setup();
      expect(codeOf(() => desk.withdrawPool(STEWARD, "treasurer", eur("0.01")))).toBe("INSUFFICIENT_POOL");
    });

    it("keeps the pool when the payout fails", () => {
      const { desk, clock, funds, events } = setup();
      desk.borrow(ALICE, 1);
      clock.set(T0 + 5_000);
      desk.returnItem(ALICE, 1);
      funds.failPayOut = true;

      expect(codeOf(() => desk.withdrawPool(STEWARD, "treasurer", eur("5.00")))).toBe("payout rail offline");
      expect(desk.poolBalance()).toEqual(eur("5.00"));
      expect(events.streamExists("escrow")).toBe(false);
    });
  });

  it("snapshots the whole desk", () => {
    const { desk } = setup();
    desk.borrow(ALICE, 1);
    const snap = desk.snapshot();
    expect(snap.takenAt).toBe(T0);
    expect(snap.items).toHaveLength(1);
    expect(snap.items[0]).toMatchObject({ availableUnits: 1, totalUnits: 2 });
    expect(snap.loans.map((l) => l.borrower)).toEqual([ALICE]);
    expect(snap.escrow.totalEscrowed).toEqual(eur("5.00"));
    expect(snap.members).toBe(1);
    expect(snap.eventCount).toBe(4);
  });
});
