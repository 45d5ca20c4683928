/**
 * Shared fixtures for the vault tests: a controller wired to in-memory
 * collaborators, a journal and a share-price history.
 */

import { ConversionEngine } from "@sluice/ledger";
import type { FeeRates } from "@sluice/fees";
import { InMemoryEventStore } from "@sluice/event-store";
import { RedemptionController } from "../src/redemption-controller.js";
import {
  InMemoryAccessGate,
  InMemoryAssetCustody,
  InMemoryShareToken,
  ManualClock,
  PauseSwitch,
  StaticRateProvider,
} from "../src/adapters.js";
import { SharePriceHistory } from "../src/share-price-history.js";
import type { AssetTransfer } from "../src/types.js";

export const T0 = 1_700_000_000;
export const VAULT = "vault";
export const FEES = "fee-recipient";
export const OPERATOR = "operator";
export const VALUER = "valuer";
export const ADMIN = "admin";

export interface VaultFixtureOptions {
  readonly feeRates?: Partial<FeeRates>;
  readonly shareDecimals?: number;
  readonly custody?: (inner: InMemoryAssetCustody) => AssetTransfer;
}

export function createVault(options: VaultFixtureOptions = {}) {
  const clock = new ManualClock(T0);
  const shares = new InMemoryShareToken();
  const custody = new InMemoryAssetCustody(VAULT);
  const access = new InMemoryAccessGate();
  const pause = new PauseSwitch();
  const rates = new StaticRateProvider([["EURC", { numerator: 11n, denominator: 10n }]]);
  const journal = new InMemoryEventStore();
  const history = new SharePriceHistory();

  access.grantRole("operator", OPERATOR);
  access.grantRole("valuation", VALUER);
  access.grantRole("admin", ADMIN);

  let nextId = 0;
  const controller = new RedemptionController({
    conversion: new ConversionEngine({
      canonicalAsset: "USDC",
      shareDecimals: options.shareDecimals ?? 0,
      rates,
    }),
    shares,
    custody: options.custody?.(custody) ?? custody,
    access,
    pause,
    clock,
    vaultAccount: VAULT,
    feeRecipient: FEES,
    feeRates: {
      performanceFeeRate: 0n,
      managementFeeRate: 0n,
      withdrawalFeeRate: 0n,
      ...options.feeRates,
    },
    journal,
    history,
    generateId: () => `id-${++nextId}`,
  });

  return { controller, clock, shares, custody, access, pause, rates, journal, history };
}

export type VaultFixture = ReturnType<typeof createVault>;

/** Credit `amount` of `asset` to `account` and deposit all of it. */
export function deposit(
  fixture: VaultFixture,
  account: string,
  amount: bigint,
  asset = "USDC",
): bigint {
  fixture.custody.credit(account, asset, amount);
  return fixture.controller.deposit(asset, amount, account, account, account);
}

/** Σpending + Σclaimable + circulating == minted − redeemed */
export function conserved(fixture: VaultFixture): boolean {
  const a = fixture.controller.accounting();
  return (
    a.pendingShares + a.claimableShares + a.circulatingSupply === a.totalMinted - a.sharesRedeemed &&
    a.escrowedShares === a.pendingShares
  );
}
