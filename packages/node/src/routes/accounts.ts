/**
 * Account read routes.
 *
 * GET /api/v1/accounts/:address                       — balances, nonce, delegate, votes
 * GET /api/v1/accounts/:address/allowances/:spender   — allowance
 * GET /api/v1/accounts/:address/votes?at=             — votes now or at a sequence point
 * GET /api/v1/accounts/:address/checkpoints           — checkpoint series
 */

import { Hono } from "hono";
import type { Context } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { AddressSchema, VotesQuerySchema } from "../types/dto.js";
import { createErrorEnvelope } from "../types/error.js";
import { formatZodErrors } from "../middleware/validate.js";

function invalidAddress(c: Context<AppEnv>, value: string): Response {
  return c.json(
    createErrorEnvelope("VALIDATION_ERROR", `"${value}" is not a 20-byte hex address`),
    400,
  );
}

export function createAccountRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  // Every route here is keyed by an address
  routes.use("/:address/*", async (c, next) => {
    const address = c.req.param("address");
    if (!AddressSchema.safeParse(address).success) {
      return invalidAddress(c, address);
    }
    return next();
  });

  routes.get("/:address", async (c) => {
    const address = c.req.param("address");
    if (!AddressSchema.safeParse(address).success) {
      return invalidAddress(c, address);
    }
    const account = await c.get("service").account(address);
    return c.json({ data: account });
  });

  routes.get("/:address/allowances/:spender", async (c) => {
    const owner = c.req.param("address");
    const spender = c.req.param("spender");
    if (!AddressSchema.safeParse(spender).success) {
      return invalidAddress(c, spender);
    }
    const allowance = await c.get("service").allowance(owner, spender);
    return c.json({ data: { owner, spender, allowance } });
  });

  routes.get("/:address/votes", async (c) => {
    const queryResult = VotesQuerySchema.safeParse(c.req.query());
    if (!queryResult.success) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Invalid query parameters", {
          issues: formatZodErrors(queryResult.error),
        }),
        400,
      );
    }

    const account = c.req.param("address");
    const at = queryResult.data.at;
    const votes = await c.get("service").votes(account, at);
    return c.json({
      data: { account, votes, at: at === undefined ? null : at.toString() },
    });
  });

  routes.get("/:address/checkpoints", async (c) => {
    const account = c.req.param("address");
    const checkpoints = await c.get("service").checkpoints(account);
    return c.json({ data: checkpoints });
  });

  return routes;
}
