/**
 * Escrow and wallet routes.
 *
 * GET  /api/v1/pool                      — Forfeiture pool and escrowed total
 * POST /api/v1/pool/withdraw             — Pay out of the pool (steward)
 * GET  /api/v1/wallets/:account          — Wallet balance of an account
 * POST /api/v1/wallets/:account/fund     — Credit a wallet (steward)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { FundWalletSchema, WithdrawPoolSchema } from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";

export function createPoolRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => {
    const service = c.get("service");
    return c.json({
      data: {
        poolBalance: service.desk.poolBalance(),
        totalEscrowed: service.desk.totalEscrowed(),
      },
    });
  });

  routes.post("/withdraw", validateBody(WithdrawPoolSchema), (c) => {
    const service = c.get("service");
    const body = c.get("validatedBody");
    const withdrawal = service.desk.withdrawPool(
      c.get("auth").accountId,
      body.to,
      service.money(body.amount),
    );
    return c.json({ data: withdrawal });
  });

  return routes;
}

export function createWalletRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/:account", (c) => {
    const service = c.get("service");
    const account = c.req.param("account");
    return c.json({ data: { account, balance: service.wallet(account) } });
  });

  routes.post("/:account/fund", validateBody(FundWalletSchema), (c) => {
    const service = c.get("service");
    const account = c.req.param("account");
    const balance = service.fundWallet(
      c.get("auth").accountId,
      account,
      c.get("validatedBody").amount,
    );
    return c.json({ data: { account, balance } });
  });

  return routes;
}
