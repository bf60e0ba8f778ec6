/**
 * Tests for loan lifecycle routes.
 */

import { describe, it, expect, beforeEach } from "vitest";
import type { TestApp } from "../setup.js";
import { ALICE, BOB, BRANCH, createTestApp, jsonRequest, seed, T0 } from "../setup.js";

const EUR = (amount: string) => ({ amount, currency: "EUR", decimals: 2 });

describe("loan routes", () => {
  let t: TestApp;

  beforeEach(async () => {
    t = createTestApp();
    await seed(t.app);
  });

  const borrow = (body: unknown = { itemId: 1 }, as: string = ALICE) =>
    t.app.request(jsonRequest("/api/v1/loans/borrow", "POST", body, as));

  const errorCode = async (res: Response) =>
    ((await res.json()) as { error: { code: string } }).error.code;

  // ─── Borrow ──────────────────────────────────────────────────────

  it("opens a loan against the policy deposit", async () => {
    const res = await borrow();

    expect(res.status).toBe(201);
    const expectedLoan = {
      borrower: ALICE,
      itemId: 1,
      custodian: BRANCH,
      openedAt: T0,
      dueDate: T0 + 1000,
      deposit: EUR("5.00"),
      extensionsUsed: 0,
    };
    expect(await res.json()).toEqual({
      data: { loan: expectedLoan, dueDate: T0 + 1000 },
    });

    const wallet = await t.app.request(jsonRequest(`/api/v1/wallets/${ALICE}`, "GET", undefined, ALICE));
    expect(await wallet.json()).toEqual({ data: { account: ALICE, balance: EUR("45.00") } });

    const item = await t.app.request(jsonRequest("/api/v1/items/1", "GET", undefined, ALICE));
    expect(((await item.json()) as { data: { availableUnits: number } }).data.availableUnits).toBe(1);
  });

  it("accepts a deposit above the policy amount", async () => {
    const res = await borrow({ itemId: 1, deposit: "7.50" });

    expect(res.status).toBe(201);
    const body = (await res.json()) as { data: { loan: { deposit: unknown } } };
    expect(body.data.loan.deposit).toEqual(EUR("7.50"));
  });

  it("reports a whole-number deposit in the currency scale", async () => {
    const res = await borrow({ itemId: 1, deposit: "6" });

    const body = (await res.json()) as { data: { loan: { deposit: unknown } } };
    expect(body.data.loan.deposit).toEqual(EUR("6.00"));
    expect(t.service.desk.escrowedFor(ALICE, 1)).toEqual(EUR("6.00"));
  });

  it("answers 201 when an audit subscriber fails after the loan opened", async () => {
    t.service.store.subscribe(`loan:${ALICE}:1`, () => {
      throw new Error("audit listener down");
    });

    const res = await borrow();

    expect(res.status).toBe(201);
    expect(t.service.wallet(ALICE)).toEqual(EUR("45.00"));
    expect(t.service.desk.postCommitFailures().map((f) => f.key)).toEqual([`loan:${ALICE}:1`]);
    expect(await errorCode(await borrow())).toBe("ACTIVE_LOAN_EXISTS");
  });

  it("rejects a non-member with 403", async () => {
    const res = await borrow({ itemId: 1 }, BOB);

    expect(res.status).toBe(403);
    expect(await errorCode(res)).toBe("NOT_MEMBER");
  });

  it("rejects an unknown item with 404", async () => {
    const res = await borrow({ itemId: 9 });

    expect(res.status).toBe(404);
    expect(await errorCode(res)).toBe("NO_SUCH_ITEM");
  });

  it("rejects a second loan of the same item with 409", async () => {
    await borrow();
    const res = await borrow();

    expect(res.status).toBe(409);
    expect(await errorCode(res)).toBe("ACTIVE_LOAN_EXISTS");
  });

  it("rejects a short deposit with 422", async () => {
    const res = await borrow({ itemId: 1, deposit: "4.99" });

    expect(res.status).toBe(422);
    expect(await errorCode(res)).toBe("DEPOSIT_TOO_LOW");
  });

  it("rejects a malformed body with 400", async () => {
    const res = await borrow({ itemId: "first" });

    expect(res.status).toBe(400);
    expect(await errorCode(res)).toBe("VALIDATION_ERROR");
  });

  it("rejects an unauthenticated caller with 401", async () => {
    const res = await t.app.request(jsonRequest("/api/v1/loans/borrow", "POST", { itemId: 1 }));

    expect(res.status).toBe(401);
  });

  // ─── Return ──────────────────────────────────────────────────────

  it("refunds the deposit when returned by the due date", async () => {
    await borrow();
    t.clock.advance(1000);

    const res = await t.app.request(jsonRequest("/api/v1/loans/return", "POST", { itemId: 1 }, ALICE));

    expect(res.status).toBe(200);
    const body = (await res.json()) as { data: { late: boolean; returnedAt: number; deposit: unknown } };
    expect(body.data.late).toBe(false);
    expect(body.data.returnedAt).toBe(T0 + 1000);
    expect(body.data.deposit).toEqual(EUR("5.00"));

    const wallet = await t.app.request(jsonRequest(`/api/v1/wallets/${ALICE}`, "GET", undefined, ALICE));
    expect(await wallet.json()).toEqual({ data: { account: ALICE, balance: EUR("50.00") } });
  });

  it("forfeits the deposit into the pool after the grace period", async () => {
    await borrow();
    t.clock.advance(1101);

    const res = await t.app.request(jsonRequest("/api/v1/loans/return", "POST", { itemId: 1 }, ALICE));
    expect(((await res.json()) as { data: { late: boolean } }).data.late).toBe(true);

    const pool = await t.app.request(jsonRequest("/api/v1/pool", "GET", undefined, ALICE));
    expect(await pool.json()).toEqual({
      data: { poolBalance: EUR("5.00"), totalEscrowed: EUR("0.00") },
    });
  });

  it("rejects a return without a loan with 404", async () => {
    const res = await t.app.request(jsonRequest("/api/v1/loans/return", "POST", { itemId: 1 }, ALICE));

    expect(res.status).toBe(404);
    expect(await errorCode(res)).toBe("NO_SUCH_LOAN");
  });

  // ─── Extend ──────────────────────────────────────────────────────

  it("extends up to the policy limit", async () => {
    await borrow();
    const extend = () =>
      t.app.request(jsonRequest("/api/v1/loans/extend", "POST", { itemId: 1 }, ALICE));

    const first = await extend();
    expect(first.status).toBe(200);
    const body = (await first.json()) as {
      data: { previousDueDate: number; dueDate: number; extensionsUsed: number };
    };
    expect(body.data.previousDueDate).toBe(T0 + 1000);
    expect(body.data.dueDate).toBe(T0 + 1500);
    expect(body.data.extensionsUsed).toBe(1);

    expect((await extend()).status).toBe(200);
    const third = await extend();
    expect(third.status).toBe(409);
    expect(await errorCode(third)).toBe("MAX_EXTENSIONS_REACHED");
  });

  it("refuses to extend a loan past its due date", async () => {
    await borrow();
    t.clock.advance(1001);

    const res = await t.app.request(jsonRequest("/api/v1/loans/extend", "POST", { itemId: 1 }, ALICE));

    expect(res.status).toBe(409);
    expect(await errorCode(res)).toBe("NO_ACTIVE_LOAN");
  });

  // ─── Queries ─────────────────────────────────────────────────────

  it("lists open and overdue loans", async () => {
    await borrow();

    const all = await t.app.request(jsonRequest("/api/v1/loans", "GET", undefined, ALICE));
    expect(((await all.json()) as { data: unknown[] }).data).toHaveLength(1);

    const overdueNow = await t.app.request(jsonRequest("/api/v1/loans?overdue=true", "GET", undefined, ALICE));
    expect(((await overdueNow.json()) as { data: unknown[] }).data).toHaveLength(0);

    t.clock.advance(1101);
    const overdueLater = await t.app.request(jsonRequest("/api/v1/loans?overdue=true", "GET", undefined, ALICE));
    expect(((await overdueLater.json()) as { data: unknown[] }).data).toHaveLength(1);

    const bobs = await t.app.request(jsonRequest(`/api/v1/loans?borrower=${BOB}`, "GET", undefined, ALICE));
    expect(((await bobs.json()) as { data: unknown[] }).data).toHaveLength(0);
  });

  it("gets a single loan or 404", async () => {
    await borrow();

    const found = await t.app.request(jsonRequest(`/api/v1/loans/${ALICE}/1`, "GET", undefined, ALICE));
    expect(found.status).toBe(200);
    expect(((await found.json()) as { data: { dueDate: number } }).data.dueDate).toBe(T0 + 1000);

    const missing = await t.app.request(jsonRequest(`/api/v1/loans/${BOB}/1`, "GET", undefined, ALICE));
    expect(missing.status).toBe(404);
    expect(await errorCode(missing)).toBe("NOT_FOUND");

    const invalid = await t.app.request(jsonRequest(`/api/v1/loans/${ALICE}/first`, "GET", undefined, ALICE));
    expect(invalid.status).toBe(400);
  });
});
