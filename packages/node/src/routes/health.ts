/**
 * Health check routes.
 *
 * GET /health — Liveness probe (always 200 if server is running)
 * GET /ready  — Readiness probe (ledger invariants + event chain integrity)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";

interface SubsystemStatus {
  readonly status: "ok" | "down";
  readonly detail?: string | undefined;
}

export function createHealthRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    return c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
    });
  });

  routes.get("/ready", async (c) => {
    const service = c.get("service");
    const { invariants, integrity, pendingRequests } = await service.checkHealth();

    const ledger: SubsystemStatus = invariants.ok
      ? { status: "ok" }
      : {
          status: "down",
          detail: `totalSupply=${invariants.totalSupply.toString()}, sumOfBalances=${invariants.sumOfBalances.toString()}, voteMismatches=${String(invariants.voteMismatches.length)}`,
        };

    const eventStore: SubsystemStatus = integrity.valid
      ? { status: "ok" }
      : {
          status: "down",
          detail: `lastVerifiedPosition=${String(integrity.lastVerifiedPosition)}, errors=${String(integrity.errors.length)}`,
        };

    const ready = service.isReady() && invariants.ok && integrity.valid;

    return c.json(
      {
        status: ready ? "ready" : "not_ready",
        blockNumber: service.clock.blockNumber().toString(),
        pendingRequests,
        subsystems: { ledger, eventStore },
        timestamp: new Date().toISOString(),
      },
      ready ? 200 : 503,
    );
  });

  return routes;
}
