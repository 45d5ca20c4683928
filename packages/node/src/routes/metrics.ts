/**
 * Share-price metrics.
 *
 * GET /api/v1/metrics/share-price?from=<unix seconds>
 *   — summary (return, TVL change, APR in bps) and the samples it covers
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { SharePriceQuerySchema } from "../types/dto.js";
import { parseQuery } from "../middleware/validate.js";
import { sampleView, summaryView } from "../types/views.js";

export function createMetricsRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/share-price", (c) => {
    const { history } = c.get("service");
    const { from } = parseQuery(c, SharePriceQuerySchema);
    const summary = history.summary({ from });

    return c.json({
      data: {
        summary: summary === undefined ? null : summaryView(summary),
        samples: history.samples(from).map(sampleView),
      },
    });
  });

  return routes;
}
