/**
 * Journal routes.
 *
 * GET /api/v1/events              — All events in global order (cursor pagination)
 * GET /api/v1/events?streamId=..  — One stream, e.g. redeem:USDC:alice
 *   (also ?type= and ?correlationId=, the events of one operation)
 * GET /api/v1/events/integrity    — Verify the journal's hash chain
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { paginate } from "../types/pagination.js";
import { ListEventsQuerySchema } from "../types/dto.js";
import { parseQuery } from "../middleware/validate.js";
import { eventView } from "../types/views.js";

export function createEventRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => {
    const service = c.get("service");
    const query = parseQuery(c, ListEventsQuerySchema);

    const events =
      query.streamId === undefined
        ? service.readEvents({
            correlationId: query.correlationId,
            types: query.type === undefined ? undefined : [query.type],
          })
        : service.readStreamEvents(query.streamId).filter(
            (e) =>
              (query.type === undefined || e.event.type === query.type) &&
              (query.correlationId === undefined || e.event.metadata.correlationId === query.correlationId),
          );

    const result = paginate(
      events,
      { cursor: query.cursor, limit: query.limit },
      (e) => e.globalPosition,
      "globalPosition",
    );

    return c.json({ data: result.data.map(eventView), pagination: result.pagination });
  });

  routes.get("/integrity", (c) => {
    const result = c.get("service").verifyJournal();
    return c.json({ data: result }, result.valid ? 200 : 500);
  });

  return routes;
}
