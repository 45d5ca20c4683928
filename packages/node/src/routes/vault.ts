/**
 * Vault routes.
 *
 * POST /api/v1/deposits                            — Deposit an asset, mint shares
 * POST /api/v1/total-assets                        — Report a new valuation (valuation role)
 * GET  /api/v1/totals                              — Totals and share accounting
 * GET  /api/v1/fees                                — Fee configuration and pending accrual
 * PUT  /api/v1/fees                                — Replace the fee rates (admin role)
 * POST /api/v1/fees/settle                         — Settle accrued fees (operator role)
 * POST /api/v1/custody/credits                     — Fund a holder (admin role)
 * POST /api/v1/pause                               — Pause or unpause (admin role)
 * GET  /api/v1/accounts/:account/balances/:asset   — Share and asset balances
 */

import { Hono } from "hono";
import { formatFeeConfig } from "@sluice/fees";
import type { AppEnv } from "../types/api-contract.js";
import {
  CreditSchema,
  DepositSchema,
  PauseSchema,
  ReportTotalAssetsSchema,
  UpdateFeesSchema,
} from "../types/dto.js";
import { parseBody } from "../middleware/validate.js";
import { accountingView, settlementView, totalsView } from "../types/views.js";

export function createVaultRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/deposits", async (c) => {
    const { controller } = c.get("service");
    const caller = c.get("caller");
    const body = await parseBody(c, DepositSchema);
    const owner = body.owner ?? caller;
    const receiver = body.receiver ?? owner;

    const shares = controller.deposit(body.asset, body.amount, receiver, owner, caller);

    return c.json(
      {
        data: {
          asset: body.asset,
          amount: body.amount.toString(),
          receiver,
          shares: shares.toString(),
          totals: totalsView(controller.totals()),
        },
      },
      201,
    );
  });

  routes.post("/total-assets", async (c) => {
    const { controller } = c.get("service");
    const body = await parseBody(c, ReportTotalAssetsSchema);

    const totals = controller.reportTotalAssets(body.totalAssets, c.get("caller"));

    return c.json({ data: totalsView(totals) });
  });

  routes.get("/totals", (c) => {
    const service = c.get("service");

    return c.json({
      data: {
        ...totalsView(service.controller.totals()),
        paused: service.pause.isPaused(),
        accounting: accountingView(service.controller.accounting()),
      },
    });
  });

  routes.get("/fees", (c) => {
    const { controller } = c.get("service");

    return c.json({
      data: {
        ...formatFeeConfig(controller.getFees()),
        accrued: settlementView(controller.previewFees()),
      },
    });
  });

  routes.put("/fees", async (c) => {
    const { controller } = c.get("service");
    const body = await parseBody(c, UpdateFeesSchema);

    const fees = controller.updateFees(body, c.get("caller"));

    return c.json({ data: formatFeeConfig(fees) });
  });

  routes.post("/fees/settle", (c) => {
    const { controller } = c.get("service");

    const settlement = controller.settleFees(c.get("caller"));

    return c.json({ data: settlementView(settlement) });
  });

  routes.post("/custody/credits", async (c) => {
    const service = c.get("service");
    const body = await parseBody(c, CreditSchema);

    const balance = service.credit(c.get("caller"), body.holder, body.asset, body.amount);

    return c.json({ data: { holder: body.holder, asset: body.asset, balance: balance.toString() } });
  });

  routes.post("/pause", async (c) => {
    const service = c.get("service");
    const body = await parseBody(c, PauseSchema);

    const paused = service.setPaused(c.get("caller"), body.paused);

    return c.json({ data: { paused } });
  });

  routes.get("/accounts/:account/balances/:asset", (c) => {
    const service = c.get("service");
    const account = c.req.param("account");
    const asset = c.req.param("asset");
    const { shares, assets } = service.balances(account, asset);

    return c.json({ data: { account, asset, shares: shares.toString(), assets: assets.toString() } });
  });

  return routes;
}
