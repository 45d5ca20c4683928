/**
 * RedemptionController — asynchronous redemption flows over the ledger.
 *
 * Composes:
 * - RedeemLedger (pending / claimable records)
 * - ConversionEngine (share, underlying and asset-unit pricing)
 * - FeeAccrualEngine (management, performance and withdrawal fees)
 * - Collaborators: ShareToken, AssetTransfer, AccessGate, PauseGate, Clock
 *
 * Lifecycle per (account, asset):
 *   Idle → Pending → Claimable → Idle      (request, fulfill, withdraw/redeem)
 *   Idle → Pending → Idle                  (request, cancel)
 * Pending and claimable are independent buckets.
 *
 * Every mutating operation:
 * - runs alone; a nested call from a collaborator fails with REENTRANT_CALL
 * - is all-or-nothing; any failure restores the state it started from
 * - orders its steps: validation → fee settlement → pricing → ledger and
 *   totals → share mint/burn/escrow → asset transfers → journal
 */

import { randomUUID } from "node:crypto";
import type {
  AccountId,
  AssetId,
  ClaimableRedeem,
  DomainEvent,
  EventSource,
  FeeConfig,
  PendingRedeem,
  Totals,
} from "@sluice/types";
import type { ConversionEngine } from "@sluice/ledger";
import { RedeemLedger, assertUint, assertUint256 } from "@sluice/ledger";
import type { FeeRates, FeeSettlement } from "@sluice/fees";
import { FeeAccrualEngine, createFeeConfig, formatFeeConfig } from "@sluice/fees";
import type { EventStore } from "@sluice/event-store";
import type { SharePriceHistory } from "./share-price-history.js";
import type {
  AccessGate,
  AssetTransfer,
  Clock,
  FulfillEntry,
  FulfillResult,
  PauseGate,
  RedemptionControllerConfig,
  ShareToken,
  VaultAccounting,
  VaultRole,
} from "./types.js";
import { VaultError, supportsRollback } from "./types.js";
import type { VaultEventPayloads } from "./events.js";
import { VAULT_STREAM, redeemStreamId } from "./events.js";

/** Request identifier. Requests share one fungible slot per (account, asset). */
export const REQUEST_ID = 0n;

interface Operation {
  readonly caller: AccountId;
  readonly now: number;
  readonly correlationId: string;
  readonly events: { readonly streamId: string; readonly event: DomainEvent }[];
}

export class RedemptionController {
  private readonly _ledger: RedeemLedger;
  private readonly _conversion: ConversionEngine;
  private readonly _feeEngine: FeeAccrualEngine;
  private readonly _shares: ShareToken;
  private readonly _custody: AssetTransfer;
  private readonly _access: AccessGate;
  private readonly _pause: PauseGate;
  private readonly _clock: Clock;
  private readonly _journal: EventStore | undefined;
  private readonly _history: SharePriceHistory | undefined;
  private readonly _generateId: () => string;

  readonly vaultAccount: AccountId;
  readonly feeRecipient: AccountId;

  private _totalAssets: bigint;
  private _fees: FeeConfig;
  private _totalMinted: bigint;
  private _sharesRedeemed = 0n;
  private _entered = false;

  constructor(config: RedemptionControllerConfig) {
    if (config.vaultAccount === config.feeRecipient) {
      throw new VaultError("INVALID_CONFIG", "vaultAccount and feeRecipient must differ");
    }

    this._conversion = config.conversion;
    this._feeEngine = new FeeAccrualEngine(config.conversion);
    this._shares = config.shares;
    this._custody = config.custody;
    this._access = config.access;
    this._pause = config.pause;
    this._clock = config.clock;
    this._journal = config.journal;
    this._history = config.history;
    this._generateId = config.generateId ?? randomUUID;
    this.vaultAccount = config.vaultAccount;
    this.feeRecipient = config.feeRecipient;

    this._ledger = new RedeemLedger({ now: () => this._now() });

    const totalAssets = config.initialTotalAssets ?? 0n;
    assertUint(totalAssets, "initialTotalAssets");
    this._totalAssets = assertUint256(totalAssets, "initialTotalAssets");
    this._totalMinted = this._shares.totalSupply();
    this._fees = createFeeConfig(
      config.feeRates,
      BigInt(this._now()),
      this.totals().shareValue,
    );
  }

  // ───────────────────────────────────────────────────────────────────────
  // Requests
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Escrow `shares` from `owner` into the pending slot of (controller, asset).
   */
  requestRedeem(
    asset: AssetId,
    shares: bigint,
    controller: AccountId,
    owner: AccountId,
    caller: AccountId,
  ): bigint {
    return this._run(caller, (op) => {
      assertUint(shares, "shares");
      this._requireNotPaused();
      this._requireAuthorized(owner, caller);
      this._requireNotEscrow(owner, "owner");
      this._requireNotEscrow(controller, "controller");
      if (shares === 0n) {
        throw new VaultError("NOTHING_TO_REDEEM", "Cannot request a redemption of zero shares");
      }
      this._conversion.assertSupported(asset);
      const balance = this._shares.balanceOf(owner);
      if (balance < shares) {
        throw new VaultError(
          "INSUFFICIENT_BALANCE",
          `"${owner}" holds ${balance.toString()} shares, requested ${shares.toString()}`,
        );
      }

      const pending = this._ledger.increasePending(controller, asset, shares);
      this._shares.transfer(owner, this.vaultAccount, shares);

      this._emit(op, redeemStreamId(asset, controller), "redeem.requested", "redemption", {
        asset,
        controller,
        owner,
        shares: shares.toString(),
        pendingShares: pending.shares.toString(),
      });
      return REQUEST_ID;
    });
  }

  /**
   * Cancel the whole pending amount; escrowed shares go to `receiver`.
   */
  cancelRedeem(
    asset: AssetId,
    controller: AccountId,
    receiver: AccountId,
    caller: AccountId,
  ): bigint {
    return this._run(caller, (op) => {
      this._requireNotPaused();
      this._requireAuthorized(controller, caller);
      const { shares } = this._ledger.getPending(controller, asset);
      if (shares === 0n) {
        throw new VaultError("NO_PENDING_REDEEM", `No pending redemption for "${controller}"/"${asset}"`);
      }
      return this._cancel(op, asset, shares, controller, receiver);
    });
  }

  cancelRedeemPartial(
    asset: AssetId,
    shares: bigint,
    controller: AccountId,
    receiver: AccountId,
    caller: AccountId,
  ): bigint {
    return this._run(caller, (op) => {
      assertUint(shares, "shares");
      this._requireNotPaused();
      this._requireAuthorized(controller, caller);
      if (shares === 0n || this._ledger.getPending(controller, asset).shares === 0n) {
        throw new VaultError("NO_PENDING_REDEEM", `No pending redemption to cancel for "${controller}"/"${asset}"`);
      }
      return this._cancel(op, asset, shares, controller, receiver);
    });
  }

  private _cancel(
    op: Operation,
    asset: AssetId,
    shares: bigint,
    controller: AccountId,
    receiver: AccountId,
  ): bigint {
    this._requireNotEscrow(receiver, "receiver");
    const pending = this._ledger.consumePending(controller, asset, shares);
    this._shares.transfer(this.vaultAccount, receiver, shares);

    this._emit(op, redeemStreamId(asset, controller), "redeem.canceled", "redemption", {
      asset,
      controller,
      receiver,
      shares: shares.toString(),
      pendingShares: pending.shares.toString(),
    });
    return shares;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Fulfillment (operator)
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Price `shares` of the controller's pending slot and make the net
   * amount claimable. Returns the claimable assets.
   */
  fulfillRedeem(asset: AssetId, shares: bigint, controller: AccountId, caller: AccountId): bigint {
    const [result] = this.fulfillBatch([{ asset, shares, controller }], caller);
    return result?.assets ?? 0n;
  }

  /**
   * Fulfill every entry against one totals snapshot taken before the
   * loop. One failing entry fails the whole batch.
   */
  fulfillBatch(entries: readonly FulfillEntry[], caller: AccountId): readonly FulfillResult[] {
    return this._run(caller, (op) => {
      this._requireNotPaused();
      this._requireRole("operator", caller);
      for (const entry of entries) {
        assertUint(entry.shares, "shares");
        if (entry.shares === 0n) {
          throw new VaultError(
            "NOTHING_TO_REDEEM",
            `Cannot fulfill zero shares for "${entry.controller}"/"${entry.asset}"`,
          );
        }
        this._conversion.assertSupported(entry.asset);
      }
      if (entries.length === 0) {
        return [];
      }

      this._settleFees(op);
      const totals = this.totals();
      const fees = this._fees;

      const results = entries.map((entry) => this._fulfillEntry(entry, totals, fees));

      const burned = results.reduce((sum, r) => sum + r.shares, 0n);
      this._shares.burn(this.vaultAccount, burned);

      const feesByAsset = new Map<AssetId, bigint>();
      for (const result of results) {
        feesByAsset.set(result.asset, (feesByAsset.get(result.asset) ?? 0n) + result.fee);
      }
      for (const [asset, fee] of feesByAsset) {
        if (fee > 0n) {
          this._custody.transfer(asset, this.feeRecipient, fee);
        }
      }

      for (const result of results) {
        this._emit(op, redeemStreamId(result.asset, result.controller), "redeem.fulfilled", "redemption", {
          asset: result.asset,
          controller: result.controller,
          shares: result.shares.toString(),
          underlying: result.underlying.toString(),
          assets: result.assets.toString(),
          fee: result.fee.toString(),
          batchSize: results.length,
        });
      }
      return results;
    });
  }

  /**
   * Parallel-array form of fulfillBatch.
   */
  fulfillBatchArrays(
    assets: readonly AssetId[],
    shares: readonly bigint[],
    controllers: readonly AccountId[],
    caller: AccountId,
  ): readonly bigint[] {
    if (assets.length !== shares.length || assets.length !== controllers.length) {
      throw new VaultError(
        "LENGTH_MISMATCH",
        `Batch arrays differ in length: ${assets.length} assets, ${shares.length} shares, ${controllers.length} controllers`,
      );
    }
    const entries: FulfillEntry[] = [];
    assets.forEach((asset, i) => {
      const entryShares = shares[i];
      const controller = controllers[i];
      if (entryShares !== undefined && controller !== undefined) {
        entries.push({ asset, shares: entryShares, controller });
      }
    });
    return this.fulfillBatch(entries, caller).map((r) => r.assets);
  }

  private _fulfillEntry(entry: FulfillEntry, totals: Totals, fees: FeeConfig): FulfillResult {
    const { asset, shares, controller } = entry;

    const underlying = this._conversion.sharesToUnderlying(shares, totals.totalAssets, totals.totalSupply);
    const grossAssets = this._conversion.convertAssetUnits(asset, underlying, "fromUnderlying");
    const fee = this._feeEngine.withdrawalFee(fees, grossAssets);
    const assets = grossAssets - fee;
    if (assets <= 0n) {
      throw new VaultError(
        "NOTHING_TO_WITHDRAW",
        `${shares.toString()} shares of "${controller}" price to nothing in "${asset}" after fees`,
      );
    }
    if (underlying > this._totalAssets) {
      throw new VaultError(
        "INSUFFICIENT_BALANCE",
        `Fulfillment of ${underlying.toString()} exceeds total assets ${this._totalAssets.toString()}`,
      );
    }

    this._ledger.consumePending(controller, asset, shares);
    this._ledger.increaseClaimable(controller, asset, assets, shares);
    this._totalAssets -= underlying;

    return { asset, controller, shares, underlying, grossAssets, fee, assets };
  }

  // ───────────────────────────────────────────────────────────────────────
  // Claims (never paused)
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Withdraw `assets` from the claimable slot. Returns the shares burned.
   */
  withdraw(
    asset: AssetId,
    assets: bigint,
    receiver: AccountId,
    controller: AccountId,
    caller: AccountId,
  ): bigint {
    return this._run(caller, (op) => {
      assertUint(assets, "assets");
      this._requireAuthorized(controller, caller);
      this._requireNotEscrow(receiver, "receiver");
      if (assets === 0n) {
        throw new VaultError("NOTHING_TO_WITHDRAW", "Cannot withdraw zero assets");
      }

      const shares = this._ledger.consumeClaimableByAssets(controller, asset, assets);
      this._sharesRedeemed += shares;
      this._custody.transfer(asset, receiver, assets);

      this._emitWithdrawn(op, asset, controller, receiver, assets, shares, "withdraw");
      return shares;
    });
  }

  /**
   * Redeem `shares` from the claimable slot. Returns the assets paid.
   */
  redeem(
    asset: AssetId,
    shares: bigint,
    receiver: AccountId,
    controller: AccountId,
    caller: AccountId,
  ): bigint {
    return this._run(caller, (op) => {
      assertUint(shares, "shares");
      this._requireAuthorized(controller, caller);
      this._requireNotEscrow(receiver, "receiver");
      if (shares === 0n) {
        throw new VaultError("NOTHING_TO_REDEEM", "Cannot redeem zero shares");
      }

      const assets = this._ledger.consumeClaimableByShares(controller, asset, shares);
      if (assets === 0n) {
        throw new VaultError(
          "NOTHING_TO_WITHDRAW",
          `${shares.toString()} claimable shares of "${controller}" are worth nothing in "${asset}"`,
        );
      }
      this._sharesRedeemed += shares;
      this._custody.transfer(asset, receiver, assets);

      this._emitWithdrawn(op, asset, controller, receiver, assets, shares, "redeem");
      return assets;
    });
  }

  private _emitWithdrawn(
    op: Operation,
    asset: AssetId,
    controller: AccountId,
    receiver: AccountId,
    assets: bigint,
    shares: bigint,
    mode: "withdraw" | "redeem",
  ): void {
    this._emit(op, redeemStreamId(asset, controller), "redeem.withdrawn", "redemption", {
      asset,
      controller,
      receiver,
      assets: assets.toString(),
      shares: shares.toString(),
      mode,
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Deposits and valuation
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Pull `amount` of `asset` from `owner` and mint shares to `receiver`.
   */
  deposit(
    asset: AssetId,
    amount: bigint,
    receiver: AccountId,
    owner: AccountId,
    caller: AccountId,
  ): bigint {
    return this._run(caller, (op) => {
      assertUint(amount, "amount");
      this._requireNotPaused();
      this._requireAuthorized(owner, caller);
      this._requireNotEscrow(owner, "owner");
      this._requireNotEscrow(receiver, "receiver");
      this._conversion.assertSupported(asset);
      if (amount === 0n) {
        throw new VaultError("NOTHING_TO_MINT", "Cannot deposit zero");
      }

      this._settleFees(op);
      const totals = this.totals();
      const underlying = this._conversion.convertAssetUnits(asset, amount, "toUnderlying");
      const shares = this._conversion.underlyingToShares(underlying, totals.totalAssets, totals.totalSupply);
      if (shares === 0n) {
        throw new VaultError(
          "NOTHING_TO_MINT",
          `${amount.toString()} ${asset} is worth less than one share unit`,
        );
      }

      this._totalAssets = assertUint256(this._totalAssets + underlying, "totalAssets");
      this._custody.transferFrom(asset, owner, this.vaultAccount, amount);
      this._shares.mint(receiver, shares);
      this._totalMinted += shares;

      this._emit(op, VAULT_STREAM, "vault.deposited", "vault", {
        asset,
        owner,
        receiver,
        amount: amount.toString(),
        underlying: underlying.toString(),
        shares: shares.toString(),
      });
      return shares;
    });
  }

  /**
   * Replace totalAssets with a new valuation. Fees accrued under the
   * old valuation are settled first.
   */
  reportTotalAssets(totalAssets: bigint, caller: AccountId): Totals {
    return this._run(caller, (op) => {
      assertUint(totalAssets, "totalAssets");
      assertUint256(totalAssets, "totalAssets");
      this._requireRole("valuation", caller);

      this._settleFees(op);
      const previous = this._totalAssets;
      this._totalAssets = totalAssets;

      this._emit(op, VAULT_STREAM, "vault.total_assets_reported", "vault", {
        previous: previous.toString(),
        totalAssets: totalAssets.toString(),
      });
      return this.totals();
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Fees
  // ───────────────────────────────────────────────────────────────────────

  settleFees(caller: AccountId): FeeSettlement {
    return this._run(caller, (op) => {
      this._requireRole("operator", caller);
      return this._settleFees(op);
    });
  }

  /**
   * Replace the fee rates. Accrual under the old rates is settled first.
   */
  updateFees(rates: FeeRates, caller: AccountId): FeeConfig {
    return this._run(caller, (op) => {
      this._requireRole("admin", caller);

      const update = this._feeEngine.update(this._fees, rates, this.totals(), BigInt(op.now));
      this._fees = update.fees;
      this._applySettlement(op, update.settlement);

      this._emit(op, VAULT_STREAM, "fees.updated", "fees", { fees: formatFeeConfig(update.fees) });
      return update.fees;
    });
  }

  private _settleFees(op: Operation): FeeSettlement {
    const settlement = this._feeEngine.settle(this._fees, this.totals(), BigInt(op.now));
    this._fees = settlement.fees;
    this._applySettlement(op, settlement);
    return settlement;
  }

  private _applySettlement(op: Operation, settlement: FeeSettlement): void {
    if (settlement.feeShares > 0n) {
      this._shares.mint(this.feeRecipient, settlement.feeShares);
      this._totalMinted += settlement.feeShares;
    }
    if (settlement.totalFee > 0n) {
      this._emit(op, VAULT_STREAM, "fees.settled", "fees", {
        managementFee: settlement.managementFee.toString(),
        performanceFee: settlement.performanceFee.toString(),
        feeShares: settlement.feeShares.toString(),
        recipient: this.feeRecipient,
        highWaterMark: settlement.fees.highWaterMark.toString(),
      });
    }
  }

  // ───────────────────────────────────────────────────────────────────────
  // Read accessors
  // ───────────────────────────────────────────────────────────────────────

  getPending(asset: AssetId, account: AccountId): PendingRedeem {
    return this._ledger.getPending(account, asset);
  }

  getClaimable(asset: AssetId, account: AccountId): ClaimableRedeem {
    return this._ledger.getClaimable(account, asset);
  }

  maxWithdraw(asset: AssetId, account: AccountId): bigint {
    return this._ledger.getClaimable(account, asset).assets;
  }

  maxRedeem(asset: AssetId, account: AccountId): bigint {
    return this._ledger.getClaimable(account, asset).shares;
  }

  totals(): Totals {
    return this._conversion.toSnapshot(this._totalAssets, this._shares.totalSupply());
  }

  convertToShares(underlying: bigint): bigint {
    const { totalAssets, totalSupply } = this.totals();
    return this._conversion.underlyingToShares(underlying, totalAssets, totalSupply);
  }

  convertToAssets(shares: bigint): bigint {
    const { totalAssets, totalSupply } = this.totals();
    return this._conversion.sharesToUnderlying(shares, totalAssets, totalSupply);
  }

  getFees(): FeeConfig {
    return this._fees;
  }

  /** What settling now would charge, without settling. */
  previewFees(): FeeSettlement {
    return this._feeEngine.settle(this._fees, this.totals(), BigInt(this._now()));
  }

  accounting(): VaultAccounting {
    const ledger = this._ledger.totals();
    const escrowedShares = this._shares.balanceOf(this.vaultAccount);
    return {
      totalMinted: this._totalMinted,
      sharesRedeemed: this._sharesRedeemed,
      pendingShares: ledger.pendingShares,
      claimableShares: ledger.claimableShares,
      claimableAssets: ledger.claimableAssets,
      escrowedShares,
      circulatingSupply: this._shares.totalSupply() - escrowedShares,
    };
  }

  // ───────────────────────────────────────────────────────────────────────
  // Internal
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Run one mutating operation: non-reentrant, restored on failure,
   * journaled and sampled on success.
   */
  private _run<T>(caller: AccountId, body: (op: Operation) => T): T {
    if (this._entered) {
      throw new VaultError("REENTRANT_CALL", "Controller re-entered during an operation");
    }
    this._entered = true;

    try {
      const op: Operation = {
        caller,
        now: this._now(),
        correlationId: this._generateId(),
        events: [],
      };
      const restore = this._checkpoint();
      let result: T;
      try {
        result = body(op);
      } catch (error) {
        restore();
        throw error;
      }
      // A subscriber failing inside the journal commit surfaces here,
      // after the operation and its events are already stored.
      this._commit(op);
      return result;
    } finally {
      this._entered = false;
    }
  }

  private _checkpoint(): () => void {
    const ledger = this._ledger.checkpoint();
    const totalAssets = this._totalAssets;
    const fees = this._fees;
    const totalMinted = this._totalMinted;
    const sharesRedeemed = this._sharesRedeemed;
    const collaborators: (() => void)[] = [];
    for (const collaborator of [this._shares, this._custody]) {
      if (supportsRollback(collaborator)) {
        collaborators.push(collaborator.checkpoint());
      }
    }

    return () => {
      this._ledger.restore(ledger);
      this._totalAssets = totalAssets;
      this._fees = fees;
      this._totalMinted = totalMinted;
      this._sharesRedeemed = sharesRedeemed;
      for (const restoreCollaborator of collaborators) {
        restoreCollaborator();
      }
    };
  }

  private _commit(op: Operation): void {
    if (this._history !== undefined && this._history.accepts(op.now)) {
      const totals = this.totals();
      this._history.record({ timestamp: op.now, ...totals });
    }

    if (this._journal !== undefined && op.events.length > 0) {
      const byStream = new Map<string, DomainEvent[]>();
      for (const { streamId, event } of op.events) {
        const stream = byStream.get(streamId) ?? [];
        stream.push(event);
        byStream.set(streamId, stream);
      }
      this._journal.commit([...byStream].map(([streamId, events]) => ({ streamId, events })));
    }
  }

  private _emit<K extends keyof VaultEventPayloads>(
    op: Operation,
    streamId: string,
    type: K,
    source: EventSource,
    payload: VaultEventPayloads[K],
  ): void {
    op.events.push({
      streamId,
      event: {
        type,
        metadata: {
          eventId: this._generateId(),
          timestamp: new Date(op.now * 1000).toISOString(),
          actor: op.caller,
          correlationId: op.correlationId,
          source,
        },
        payload,
      },
    });
  }

  private _now(): number {
    const now = this._clock.now();
    if (!Number.isSafeInteger(now) || now < 0) {
      throw new VaultError("INVALID_TIMESTAMP", `Clock returned ${now}, expected whole seconds`);
    }
    return now;
  }

  private _requireNotEscrow(account: AccountId, role: "owner" | "controller" | "receiver"): void {
    if (account === this.vaultAccount) {
      throw new VaultError("RESERVED_ACCOUNT", `The escrow account "${account}" cannot be the ${role}`);
    }
  }

  private _requireNotPaused(): void {
    if (this._pause.isPaused()) {
      throw new VaultError("PAUSED", "Vault is paused");
    }
  }

  private _requireAuthorized(controller: AccountId, caller: AccountId): void {
    if (!this._access.isAuthorized(controller, caller)) {
      throw new VaultError("UNAUTHORIZED", `"${caller}" may not act for "${controller}"`);
    }
  }

  private _requireRole(role: VaultRole, caller: AccountId): void {
    if (!this._access.hasRole(role, caller)) {
      throw new VaultError("UNAUTHORIZED", `"${caller}" lacks the ${role} role`);
    }
  }
}
