/**
 * Loan lifecycle routes. The caller is always the borrower.
 *
 * POST /api/v1/loans/borrow              — Borrow one unit against a deposit
 * POST /api/v1/loans/return              — Return a borrowed unit
 * POST /api/v1/loans/extend              — Postpone the due date
 * GET  /api/v1/loans                     — List open loans
 * GET  /api/v1/loans/:borrower/:itemId   — Get a single loan
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import {
  BorrowSchema,
  ItemIdSchema,
  ListLoansQuerySchema,
  LoanActionSchema,
} from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";
import { createErrorEnvelope } from "../types/error.js";

export function createLoanRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/borrow", validateBody(BorrowSchema), (c) => {
    const service = c.get("service");
    const body = c.get("validatedBody");
    const deposit = body.deposit === undefined ? undefined : service.money(body.deposit);

    const result = service.desk.borrow(c.get("auth").accountId, body.itemId, deposit);
    return c.json({ data: result }, 201);
  });

  routes.post("/return", validateBody(LoanActionSchema), (c) => {
    const service = c.get("service");
    const body = c.get("validatedBody");

    const result = service.desk.returnItem(c.get("auth").accountId, body.itemId);
    return c.json({ data: result });
  });

  routes.post("/extend", validateBody(LoanActionSchema), (c) => {
    const service = c.get("service");
    const body = c.get("validatedBody");

    const result = service.desk.requestExtension(c.get("auth").accountId, body.itemId);
    return c.json({ data: result });
  });

  routes.get("/", (c) => {
    const service = c.get("service");

    const queryResult = ListLoansQuerySchema.safeParse(c.req.query());
    if (!queryResult.success) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Invalid query parameters"),
        400,
      );
    }

    const { borrower, itemId, overdue } = queryResult.data;
    const loans = overdue === "true"
      ? service.desk.overdueLoans().filter(
          (loan) =>
            (borrower === undefined || loan.borrower === borrower) &&
            (itemId === undefined || loan.itemId === itemId),
        )
      : service.desk.listLoans({ borrower, itemId });

    return c.json({ data: loans });
  });

  routes.get("/:borrower/:itemId", (c) => {
    const service = c.get("service");
    const borrower = c.req.param("borrower");
    const itemId = ItemIdSchema.safeParse(c.req.param("itemId"));
    if (!itemId.success) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Item id must be a positive integer"),
        400,
      );
    }

    const loan = service.desk.getLoan(borrower, itemId.data);
    if (loan === undefined) {
      return c.json(
        createErrorEnvelope("NOT_FOUND", `No open loan for '${borrower}' on item ${itemId.data}`),
        404,
      );
    }

    return c.json({ data: loan });
  });

  return routes;
}
