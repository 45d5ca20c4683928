/**
 * VaultService — Composition root for the domain packages.
 *
 * Route handlers delegate to this service; they never import domain
 * packages directly. One service instance backs one vault, wired to the
 * in-memory collaborators, a hash-chained journal and a share-price
 * history.
 */

import pino from "pino";
import type { Logger } from "pino";
import type { AccountId, AssetId } from "@sluice/types";
import { ConversionEngine } from "@sluice/ledger";
import type { FeeRates } from "@sluice/fees";
import { InMemoryEventStore } from "@sluice/event-store";
import type { EventStoreIntegrityResult, ReadAllOptions, StoredEvent } from "@sluice/event-store";
import {
  InMemoryAccessGate,
  InMemoryAssetCustody,
  InMemoryShareToken,
  PauseSwitch,
  RedemptionController,
  SharePriceHistory,
  StaticRateProvider,
  VaultError,
  systemClock,
} from "@sluice/vault";
import type { AssetRate, Clock, VaultRole } from "@sluice/vault";

// =============================================================================
// Configuration
// =============================================================================

export interface VaultServiceConfig {
  readonly canonicalAsset: AssetId;
  readonly shareDecimals: number;
  readonly decimalsOffset?: number | undefined;
  readonly vaultAccount: AccountId;
  readonly feeRecipient: AccountId;
  /** Non-canonical assets and their rates to underlying */
  readonly assetRates?: ReadonlyMap<AssetId, AssetRate> | undefined;
  readonly feeRates: FeeRates;
  /** Vault capabilities per account */
  readonly roles?: readonly { readonly account: AccountId; readonly roles: readonly VaultRole[] }[] | undefined;
  readonly clock?: Clock | undefined;
  readonly logger?: Logger | undefined;
  readonly maxHistorySamples?: number | undefined;
}

// =============================================================================
// Service
// =============================================================================

export class VaultService {
  readonly controller: RedemptionController;
  readonly shares: InMemoryShareToken;
  readonly custody: InMemoryAssetCustody;
  readonly access: InMemoryAccessGate;
  readonly pause: PauseSwitch;
  readonly journal: InMemoryEventStore;
  readonly history: SharePriceHistory;

  private readonly _conversion: ConversionEngine;
  private readonly _logger: Logger;

  constructor(config: VaultServiceConfig) {
    this._logger = config.logger ?? pino({ level: "silent" });

    this.shares = new InMemoryShareToken();
    this.custody = new InMemoryAssetCustody(config.vaultAccount);
    this.access = new InMemoryAccessGate();
    this.pause = new PauseSwitch();
    this.history = new SharePriceHistory({ maxSamples: config.maxHistorySamples });

    // The controller's state is already committed when subscribers run,
    // so a failing subscriber is logged rather than surfaced to the caller.
    const clock = config.clock ?? systemClock;
    this.journal = new InMemoryEventStore({
      now: () => new Date(clock.now() * 1000),
      onSubscriberError: (error, event) => {
        this._logger.error(
          { err: error, type: event.event.type, streamId: event.streamId, globalPosition: event.globalPosition },
          "Journal subscriber failed",
        );
      },
    });
    this.journal.subscribeAll((event) => {
      this._logger.info(
        { type: event.event.type, streamId: event.streamId, globalPosition: event.globalPosition },
        "Journal event",
      );
    });

    for (const { account, roles } of config.roles ?? []) {
      for (const role of roles) {
        this.access.grantRole(role, account);
      }
    }

    this._conversion = new ConversionEngine({
      canonicalAsset: config.canonicalAsset,
      shareDecimals: config.shareDecimals,
      decimalsOffset: config.decimalsOffset,
      rates: new StaticRateProvider(config.assetRates ?? []),
    });

    this.controller = new RedemptionController({
      conversion: this._conversion,
      shares: this.shares,
      custody: this.custody,
      access: this.access,
      pause: this.pause,
      clock,
      vaultAccount: config.vaultAccount,
      feeRecipient: config.feeRecipient,
      feeRates: config.feeRates,
      journal: this.journal,
      history: this.history,
    });
  }

  // ─── Administration ───────────────────────────────────────────────

  /** Fund `holder` with `amount` of `asset` from outside the vault. */
  credit(caller: AccountId, holder: AccountId, asset: AssetId, amount: bigint): bigint {
    this._requireAdmin(caller);
    this._conversion.assertSupported(asset);
    this.custody.credit(holder, asset, amount);
    this._logger.info({ caller, holder, asset, amount: amount.toString() }, "Custody credited");
    return this.custody.balanceOf(holder, asset);
  }

  setPaused(caller: AccountId, paused: boolean): boolean {
    this._requireAdmin(caller);
    if (paused) {
      this.pause.pause();
    } else {
      this.pause.unpause();
    }
    this._logger.warn({ caller, paused }, paused ? "Vault paused" : "Vault unpaused");
    return this.pause.isPaused();
  }

  /** Approve or revoke `operator` as a delegate of the caller. */
  setOperator(caller: AccountId, operator: AccountId, approved: boolean): void {
    this.access.setOperator(caller, operator, approved);
  }

  // ─── Queries ──────────────────────────────────────────────────────

  balances(account: AccountId, asset: AssetId): { readonly shares: bigint; readonly assets: bigint } {
    return { shares: this.shares.balanceOf(account), assets: this.custody.balanceOf(account, asset) };
  }

  readEvents(options?: ReadAllOptions): readonly StoredEvent[] {
    return this.journal.readAll(options);
  }

  readStreamEvents(streamId: string): readonly StoredEvent[] {
    return this.journal.read(streamId);
  }

  verifyJournal(): EventStoreIntegrityResult {
    return this.journal.verifyIntegrity();
  }

  private _requireAdmin(caller: AccountId): void {
    if (!this.access.hasRole("admin", caller)) {
      throw new VaultError("UNAUTHORIZED", `"${caller}" lacks the admin role`);
    }
  }
}
