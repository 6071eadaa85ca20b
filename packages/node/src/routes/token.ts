/**
 * Token metadata route.
 *
 * GET /api/v1/token — name, symbol, decimals, supply, clock, signing domain
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";

export function createTokenRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", async (c) => {
    const token = await c.get("service").token();
    return c.json({ data: token });
  });

  return routes;
}
