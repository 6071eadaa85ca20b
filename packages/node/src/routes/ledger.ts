/**
 * Ledger mutation routes.
 *
 * POST /api/v1/ledger/deposit          — wrap native units
 * POST /api/v1/ledger/withdraw         — unwrap to native units
 * POST /api/v1/ledger/transfer         — move tokens
 * POST /api/v1/ledger/approve          — set an allowance
 * POST /api/v1/ledger/permit           — set an allowance from a signed Permit
 * POST /api/v1/ledger/transfer-from    — spend an allowance
 * POST /api/v1/ledger/delegate         — choose a voting delegate
 * POST /api/v1/ledger/delegate-by-sig  — delegate from a signed Delegation
 * GET  /api/v1/ledger/snapshot         — full state snapshot
 *
 * The caller of each mutation is named in the body; every response is
 * the receipt of the committed operation.
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import {
  ApproveSchema,
  DelegateBySigSchema,
  DelegateSchema,
  DepositSchema,
  PermitSchema,
  TransferFromSchema,
  TransferSchema,
  WithdrawSchema,
} from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";

export function createLedgerRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/deposit", validateBody(DepositSchema), async (c) => {
    const body = c.get("validatedBody");
    const receipt = await c.get("service").deposit(body.account, body.amount);
    return c.json({ data: receipt });
  });

  routes.post("/withdraw", validateBody(WithdrawSchema), async (c) => {
    const body = c.get("validatedBody");
    const receipt = await c.get("service").withdraw(body.account, body.amount);
    return c.json({ data: receipt });
  });

  routes.post("/transfer", validateBody(TransferSchema), async (c) => {
    const body = c.get("validatedBody");
    const receipt = await c.get("service").transfer(body.from, body.to, body.amount);
    return c.json({ data: receipt });
  });

  routes.post("/approve", validateBody(ApproveSchema), async (c) => {
    const body = c.get("validatedBody");
    const receipt = await c.get("service").approve(body.owner, body.spender, body.amount);
    return c.json({ data: receipt });
  });

  routes.post("/permit", validateBody(PermitSchema), async (c) => {
    const body = c.get("validatedBody");
    const receipt = await c
      .get("service")
      .permit(body.owner, body.spender, body.value, body.deadline, body.signature);
    return c.json({ data: receipt });
  });

  routes.post("/transfer-from", validateBody(TransferFromSchema), async (c) => {
    const body = c.get("validatedBody");
    const receipt = await c
      .get("service")
      .transferFrom(body.spender, body.from, body.to, body.amount);
    return c.json({ data: receipt });
  });

  routes.post("/delegate", validateBody(DelegateSchema), async (c) => {
    const body = c.get("validatedBody");
    const receipt = await c.get("service").delegate(body.account, body.delegatee);
    return c.json({ data: receipt });
  });

  routes.post("/delegate-by-sig", validateBody(DelegateBySigSchema), async (c) => {
    const body = c.get("validatedBody");
    const receipt = await c
      .get("service")
      .delegateBySig(body.delegatee, body.nonce, body.expiry, body.signature);
    return c.json({ data: receipt });
  });

  routes.get("/snapshot", async (c) => {
    const snapshot = await c.get("service").snapshot();
    return c.json({ data: snapshot });
  });

  return routes;
}
