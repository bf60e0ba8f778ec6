/**
 * Property tests for the loan state machine.
 *
 * Random sequences of borrow / return / extend / clock moves must keep:
 * - at most one loan per key, and dueDate 0 exactly when there is none
 * - units conserved between the branch and borrowers
 * - value conserved between wallets, escrow and the pool
 * - the event log intact
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import { parseAmount } from "@circulate/escrow";
import { domainErrorCode } from "../src/errors.js";
import { ALICE, BOB, BRANCH, eur, setup, STEWARD } from "./helpers.js";

const BORROWERS = [ALICE, BOB, "carol"] as const;

const opArb = fc.oneof(
  fc.record({
    kind: fc.constant("borrow" as const),
    who: fc.constantFrom(...BORROWERS),
    cents: fc.integer({ min: 400, max: 900 }),
  }),
  fc.record({ kind: fc.constant("return" as const), who: fc.constantFrom(...BORROWERS) }),
  fc.record({ kind: fc.constant("extend" as const), who: fc.constantFrom(...BORROWERS) }),
  fc.record({ kind: fc.constant("wait" as const), seconds: fc.integer({ min: 0, max: 800 }) }),
);

const cents = (amount: string): bigint => parseAmount(amount, 2);

describe("loan state machine", () => {
  it("preserves its invariants under random operation sequences", () => {
    fc.assert(
      fc.property(fc.array(opArb, { maxLength: 60 }), (ops) => {
        const { desk, clock, funds, inventory, events } = setup();
        desk.grantMembership(STEWARD, BOB);
        desk.grantMembership(STEWARD, "carol");
        funds.inner.fund(BOB, eur("50.00"));
        funds.inner.fund("carol", eur("50.00"));
        const totalValue = 150_00n;

        for (const op of ops) {
          try {
            if (op.kind === "borrow") {
              desk.borrow(op.who, 1, eur((op.cents / 100).toFixed(2)));
            } else if (op.kind === "return") {
              desk.returnItem(op.who, 1);
            } else if (op.kind === "extend") {
              desk.requestExtension(op.who, 1);
            } else {
              clock.advance(op.seconds);
            }
          } catch (err) {
            expect(domainErrorCode(err)).toBeDefined();
          }

          const loans = desk.listLoans();
          for (const who of BORROWERS) {
            const loan = desk.getLoan(who, 1);
            expect(desk.loanDueDate(who, 1)).toBe(loan?.dueDate ?? 0);
            expect(inventory.balanceOf(who, 1)).toBe(loan === undefined ? 0 : 1);
          }
          expect(inventory.balanceOf(BRANCH, 1) + loans.length).toBe(2);

          const wallets = BORROWERS.reduce((sum, who) => sum + cents(funds.inner.balanceOf(who).amount), 0n);
          const escrowed = cents(desk.totalEscrowed().amount);
          const pooled = cents(desk.poolBalance().amount);
          expect(cents(funds.inner.engineBalance().amount)).toBe(escrowed + pooled);
          expect(wallets + escrowed + pooled).toBe(totalValue);
        }

        expect(events.verifyIntegrity().valid).toBe(true);
      }),
      { numRuns: 200 },
    );
  });
});
