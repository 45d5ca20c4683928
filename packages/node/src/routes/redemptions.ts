/**
 * Redemption routes.
 *
 * POST /api/v1/redeem-requests                    — Escrow shares into a pending request
 * POST /api/v1/redeem-requests/cancel             — Cancel all or part of a pending request
 * POST /api/v1/fulfillments                       — Fulfill one pending request (operator)
 * POST /api/v1/fulfillments/batch                 — Fulfill many against one snapshot (operator)
 * POST /api/v1/withdrawals                        — Withdraw claimable assets
 * POST /api/v1/redemptions                        — Redeem claimable shares
 * POST /api/v1/operators                          — Approve or revoke a delegate
 * GET  /api/v1/accounts/:account/redeems/:asset   — Pending and claimable records
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import {
  CancelRedeemSchema,
  FulfillBatchSchema,
  FulfillSchema,
  OperatorSchema,
  RedeemSchema,
  RequestRedeemSchema,
  WithdrawSchema,
} from "../types/dto.js";
import { parseBody } from "../middleware/validate.js";
import { claimableView, fulfillResultView, pendingView } from "../types/views.js";

export function createRedemptionRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/redeem-requests", async (c) => {
    const { controller } = c.get("service");
    const caller = c.get("caller");
    const body = await parseBody(c, RequestRedeemSchema);
    const owner = body.owner ?? caller;
    const target = body.controller ?? owner;

    const requestId = controller.requestRedeem(body.asset, body.shares, target, owner, caller);

    return c.json(
      {
        data: {
          requestId: requestId.toString(),
          asset: body.asset,
          controller: target,
          pending: pendingView(controller.getPending(body.asset, target)),
        },
      },
      201,
    );
  });

  routes.post("/redeem-requests/cancel", async (c) => {
    const { controller } = c.get("service");
    const caller = c.get("caller");
    const body = await parseBody(c, CancelRedeemSchema);
    const target = body.controller ?? caller;
    const receiver = body.receiver ?? target;

    const canceled =
      body.shares === undefined
        ? controller.cancelRedeem(body.asset, target, receiver, caller)
        : controller.cancelRedeemPartial(body.asset, body.shares, target, receiver, caller);

    return c.json({
      data: {
        canceledShares: canceled.toString(),
        pending: pendingView(controller.getPending(body.asset, target)),
      },
    });
  });

  routes.post("/fulfillments", async (c) => {
    const { controller } = c.get("service");
    const body = await parseBody(c, FulfillSchema);

    const [result] = controller.fulfillBatch([body], c.get("caller"));

    return c.json({ data: result === undefined ? null : fulfillResultView(result) });
  });

  routes.post("/fulfillments/batch", async (c) => {
    const { controller } = c.get("service");
    const body = await parseBody(c, FulfillBatchSchema);

    const results = controller.fulfillBatch(body.entries, c.get("caller"));

    return c.json({ data: results.map(fulfillResultView) });
  });

  routes.post("/withdrawals", async (c) => {
    const { controller } = c.get("service");
    const caller = c.get("caller");
    const body = await parseBody(c, WithdrawSchema);
    const target = body.controller ?? caller;
    const receiver = body.receiver ?? target;

    const shares = controller.withdraw(body.asset, body.assets, receiver, target, caller);

    return c.json({
      data: {
        assets: body.assets.toString(),
        shares: shares.toString(),
        claimable: claimableView(controller.getClaimable(body.asset, target)),
      },
    });
  });

  routes.post("/redemptions", async (c) => {
    const { controller } = c.get("service");
    const caller = c.get("caller");
    const body = await parseBody(c, RedeemSchema);
    const target = body.controller ?? caller;
    const receiver = body.receiver ?? target;

    const assets = controller.redeem(body.asset, body.shares, receiver, target, caller);

    return c.json({
      data: {
        assets: assets.toString(),
        shares: body.shares.toString(),
        claimable: claimableView(controller.getClaimable(body.asset, target)),
      },
    });
  });

  routes.post("/operators", async (c) => {
    const service = c.get("service");
    const caller = c.get("caller");
    const body = await parseBody(c, OperatorSchema);

    service.setOperator(caller, body.operator, body.approved);

    return c.json({ data: { controller: caller, operator: body.operator, approved: body.approved } });
  });

  routes.get("/accounts/:account/redeems/:asset", (c) => {
    const { controller } = c.get("service");
    const account = c.req.param("account");
    const asset = c.req.param("asset");

    return c.json({
      data: {
        account,
        asset,
        pending: pendingView(controller.getPending(asset, account)),
        claimable: claimableView(controller.getClaimable(asset, account)),
        maxWithdraw: controller.maxWithdraw(asset, account).toString(),
        maxRedeem: controller.maxRedeem(asset, account).toString(),
      },
    });
  });

  return routes;
}
