/**
 * Test helpers for @sluice/node.
 *
 * A test app with every middleware and route, no HTTP server, a manual
 * clock and three accounts holding vault roles.
 */

import { ManualClock } from "@sluice/vault";
import type { FeeRates } from "@sluice/fees";
import { createApp } from "../src/app.js";
import type { AppInstance, CreateAppOptions } from "../src/app.js";
import { ACCOUNT_HEADER } from "../src/middleware/auth.js";

export const T0 = 1_700_000_000;

export interface TestApp extends AppInstance {
  readonly clock: ManualClock;
}

export function createTestApp(
  options: {
    readonly feeRates?: Partial<FeeRates>;
    readonly auth?: CreateAppOptions["auth"];
    readonly logger?: CreateAppOptions["logger"];
  } = {},
): TestApp {
  const clock = new ManualClock(T0);
  const instance = createApp({
    serviceConfig: {
      canonicalAsset: "USDC",
      shareDecimals: 0,
      vaultAccount: "vault",
      feeRecipient: "fee-recipient",
      assetRates: new Map([["EURC", { numerator: 11n, denominator: 10n }]]),
      feeRates: {
        performanceFeeRate: 0n,
        managementFeeRate: 0n,
        withdrawalFeeRate: 100n,
        ...options.feeRates,
      },
      roles: [
        { account: "ops", roles: ["operator", "valuation"] },
        { account: "admin", roles: ["operator", "valuation", "admin"] },
      ],
      clock,
    },
    logger: options.logger,
    auth: options.auth,
  });
  return { ...instance, clock };
}

/**
 * JSON request acting as `account` (omit it to send no X-Account).
 */
export function jsonRequest(
  path: string,
  method: string = "GET",
  body?: unknown,
  account?: string,
): Request {
  const headers: Record<string, string> = { "Content-Type": "application/json" };
  if (account !== undefined) {
    headers[ACCOUNT_HEADER] = account;
  }

  const init: RequestInit = { method, headers };
  if (body !== undefined) {
    init.body = JSON.stringify(body);
  }

  return new Request(`http://localhost${path}`, init);
}

export interface ErrorBody {
  readonly error: { readonly code: string; readonly message: string; readonly details?: Record<string, unknown> };
}

/** Fund `account` with USDC and deposit all of it. */
export async function fundAndDeposit(app: AppInstance["app"], account: string, amount: string): Promise<void> {
  const credit = await app.request(
    jsonRequest("/api/v1/custody/credits", "POST", { holder: account, asset: "USDC", amount }, "admin"),
  );
  if (credit.status !== 200) {
    throw new Error(`credit failed with ${credit.status}`);
  }
  const deposit = await app.request(
    jsonRequest("/api/v1/deposits", "POST", { asset: "USDC", amount }, account),
  );
  if (deposit.status !== 201) {
    throw new Error(`deposit failed with ${deposit.status}`);
  }
}
