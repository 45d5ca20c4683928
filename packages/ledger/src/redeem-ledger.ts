/**
 * @sluice/ledger — Redemption ledger.
 *
 * Owns the per-(account, asset) Pending and Claimable records.
 *
 * API surface:
 * - increasePending() / consumePending()
 * - increaseClaimable()
 * - consumeClaimableByAssets() / consumeClaimableByShares() / consumeClaimable()
 * - getPending() / getClaimable() / listPending() / listClaimable() / totals()
 * - checkpoint() / restore() — rollback for multi-step operations
 * - snapshot() / fromSnapshot() — persistence
 *
 * Every operation validates fully before writing: a failed call leaves
 * the ledger untouched. The ledger knows nothing about authorization.
 */

import type {
  AccountId,
  AssetId,
  ClaimableRedeem,
  PendingRedeem,
} from "@sluice/types";
import { isClaimableRedeemView, isPendingRedeemView } from "@sluice/types";
import type {
  ClaimableEntry,
  LedgerCheckpoint,
  LedgerTotals,
  PendingEntry,
  RedeemLedgerSnapshot,
} from "./types.js";
import { LedgerError } from "./types.js";
import {
  MAX_UINT128,
  MAX_UINT192,
  MAX_UINT64,
  assertUint,
  formatUint,
  mulDiv,
  parseUint,
} from "./uint-math.js";

/** Width of PendingRedeem.shares. */
export const PENDING_SHARES_MAX = MAX_UINT192;
/** Width of PendingRedeem.requestTime. */
export const REQUEST_TIME_MAX = MAX_UINT64;
/** Width of ClaimableRedeem.assets. */
export const CLAIMABLE_ASSETS_MAX = MAX_UINT128;
/** Width of ClaimableRedeem.shares. */
export const CLAIMABLE_SHARES_MAX = MAX_UINT128;

const EMPTY_PENDING: PendingRedeem = { shares: 0n, requestTime: 0n };
const EMPTY_CLAIMABLE: ClaimableRedeem = { assets: 0n, shares: 0n };

export interface RedeemLedgerOptions {
  /** Clock for requestTime, in unix seconds. Defaults to wall time. */
  readonly now?: (() => number) | undefined;
}

function recordKey(account: AccountId, asset: AssetId): string {
  return JSON.stringify([account, asset]);
}

export class RedeemLedger {
  private _pending = new Map<string, PendingEntry>();
  private _claimable = new Map<string, ClaimableEntry>();
  private readonly _now: () => number;

  constructor(options?: RedeemLedgerOptions) {
    this._now = options?.now ?? (() => Math.floor(Date.now() / 1000));
  }

  // ─── Pending ─────────────────────────────────────────────────────────

  getPending(account: AccountId, asset: AssetId): PendingRedeem {
    const entry = this._pending.get(recordKey(account, asset));
    if (entry === undefined) {
      return EMPTY_PENDING;
    }
    return { shares: entry.shares, requestTime: entry.requestTime };
  }

  /**
   * Add `amount` to the pending shares and stamp requestTime with now.
   * Throws TOO_MANY_SHARES if the result would exceed uint192.
   */
  increasePending(account: AccountId, asset: AssetId, amount: bigint): PendingRedeem {
    assertUint(amount, "shares");
    const current = this.getPending(account, asset);
    const shares = current.shares + amount;
    if (shares > PENDING_SHARES_MAX) {
      throw new LedgerError(
        "TOO_MANY_SHARES",
        `Pending shares for "${account}"/"${asset}" would exceed uint192`,
      );
    }

    const now = this._now();
    if (!Number.isSafeInteger(now)) {
      throw new LedgerError("INVALID_AMOUNT", `requestTime must be whole seconds, got ${now}`);
    }
    const requestTime = BigInt(now);
    if (requestTime < 0n || requestTime > REQUEST_TIME_MAX) {
      throw new LedgerError("INVALID_AMOUNT", `requestTime out of uint64 range: ${requestTime.toString()}`);
    }

    this._pending.set(recordKey(account, asset), { account, asset, shares, requestTime });
    return { shares, requestTime };
  }

  /**
   * Remove `amount` from the pending shares.
   * Throws INSUFFICIENT_PENDING_SHARES if fewer are recorded.
   * The record is dropped (requestTime back to 0) once it reaches zero.
   */
  consumePending(account: AccountId, asset: AssetId, amount: bigint): PendingRedeem {
    assertUint(amount, "shares");
    const key = recordKey(account, asset);
    const current = this.getPending(account, asset);
    if (amount > current.shares) {
      throw new LedgerError(
        "INSUFFICIENT_PENDING_SHARES",
        `Cannot consume ${amount.toString()} pending shares for "${account}"/"${asset}": only ${current.shares.toString()} recorded`,
      );
    }

    const shares = current.shares - amount;
    if (shares === 0n) {
      this._pending.delete(key);
      return EMPTY_PENDING;
    }

    this._pending.set(key, { account, asset, shares, requestTime: current.requestTime });
    return { shares, requestTime: current.requestTime };
  }

  // ─── Claimable ───────────────────────────────────────────────────────

  getClaimable(account: AccountId, asset: AssetId): ClaimableRedeem {
    const entry = this._claimable.get(recordKey(account, asset));
    if (entry === undefined) {
      return EMPTY_CLAIMABLE;
    }
    return { assets: entry.assets, shares: entry.shares };
  }

  /**
   * Add an (assets, shares) pair. Each field is width-checked on its own.
   */
  increaseClaimable(
    account: AccountId,
    asset: AssetId,
    assets: bigint,
    shares: bigint,
  ): ClaimableRedeem {
    assertUint(assets, "assets");
    assertUint(shares, "shares");
    const current = this.getClaimable(account, asset);

    const nextAssets = current.assets + assets;
    if (nextAssets > CLAIMABLE_ASSETS_MAX) {
      throw new LedgerError(
        "TOO_MANY_ASSETS",
        `Claimable assets for "${account}"/"${asset}" would exceed uint128`,
      );
    }
    const nextShares = current.shares + shares;
    if (nextShares > CLAIMABLE_SHARES_MAX) {
      throw new LedgerError(
        "TOO_MANY_SHARES",
        `Claimable shares for "${account}"/"${asset}" would exceed uint128`,
      );
    }

    return this._writeClaimable(account, asset, nextAssets, nextShares);
  }

  /**
   * Consume `assets` from the claimable record and return the shares burned.
   *
   * Withdrawing everything returns the stored shares exactly. A partial
   * withdrawal burns ceil(assets * shares / storedAssets): never fewer
   * shares than the locked ratio requires.
   */
  consumeClaimableByAssets(account: AccountId, asset: AssetId, assets: bigint): bigint {
    assertUint(assets, "assets");
    const current = this.getClaimable(account, asset);

    if (assets === current.assets) {
      this._writeClaimable(account, asset, 0n, 0n);
      return current.shares;
    }
    if (assets > current.assets) {
      throw new LedgerError(
        "INSUFFICIENT_CLAIMABLE_ASSETS",
        `Cannot withdraw ${assets.toString()} assets for "${account}"/"${asset}": only ${current.assets.toString()} claimable`,
      );
    }

    const shares = mulDiv(assets, current.shares, current.assets, "up");
    this._writeClaimable(account, asset, current.assets - assets, current.shares - shares);
    return shares;
  }

  /**
   * Consume `shares` from the claimable record and return the assets owed.
   *
   * Redeeming everything returns the stored assets exactly. A partial
   * redemption pays floor(shares * storedAssets / storedShares).
   */
  consumeClaimableByShares(account: AccountId, asset: AssetId, shares: bigint): bigint {
    assertUint(shares, "shares");
    const current = this.getClaimable(account, asset);

    if (shares === current.shares) {
      this._writeClaimable(account, asset, 0n, 0n);
      return current.assets;
    }
    if (shares > current.shares) {
      throw new LedgerError(
        "INSUFFICIENT_CLAIMABLE_SHARES",
        `Cannot redeem ${shares.toString()} shares for "${account}"/"${asset}": only ${current.shares.toString()} claimable`,
      );
    }

    const assets = mulDiv(shares, current.assets, current.shares, "down");
    this._writeClaimable(account, asset, current.assets - assets, current.shares - shares);
    return assets;
  }

  /**
   * Decrease both fields by caller-supplied exact amounts.
   */
  consumeClaimable(
    account: AccountId,
    asset: AssetId,
    assets: bigint,
    shares: bigint,
  ): ClaimableRedeem {
    assertUint(assets, "assets");
    assertUint(shares, "shares");
    const current = this.getClaimable(account, asset);

    if (assets > current.assets) {
      throw new LedgerError(
        "INSUFFICIENT_CLAIMABLE_ASSETS",
        `Cannot consume ${assets.toString()} assets for "${account}"/"${asset}": only ${current.assets.toString()} claimable`,
      );
    }
    if (shares > current.shares) {
      throw new LedgerError(
        "INSUFFICIENT_CLAIMABLE_SHARES",
        `Cannot consume ${shares.toString()} shares for "${account}"/"${asset}": only ${current.shares.toString()} claimable`,
      );
    }

    return this._writeClaimable(account, asset, current.assets - assets, current.shares - shares);
  }

  private _writeClaimable(
    account: AccountId,
    asset: AssetId,
    assets: bigint,
    shares: bigint,
  ): ClaimableRedeem {
    const key = recordKey(account, asset);
    if (assets === 0n && shares === 0n) {
      this._claimable.delete(key);
      return EMPTY_CLAIMABLE;
    }
    this._claimable.set(key, { account, asset, assets, shares });
    return { assets, shares };
  }

  // ─── Query Operations ────────────────────────────────────────────────

  listPending(asset?: AssetId): readonly PendingEntry[] {
    const entries = [...this._pending.values()];
    return asset === undefined ? entries : entries.filter((e) => e.asset === asset);
  }

  listClaimable(asset?: AssetId): readonly ClaimableEntry[] {
    const entries = [...this._claimable.values()];
    return asset === undefined ? entries : entries.filter((e) => e.asset === asset);
  }

  /**
   * Sum of pending and claimable records, for one asset or all.
   */
  totals(asset?: AssetId): LedgerTotals {
    let pendingShares = 0n;
    let claimableShares = 0n;
    let claimableAssets = 0n;

    for (const entry of this.listPending(asset)) {
      pendingShares += entry.shares;
    }
    for (const entry of this.listClaimable(asset)) {
      claimableShares += entry.shares;
      claimableAssets += entry.assets;
    }

    return { pendingShares, claimableShares, claimableAssets };
  }

  // ─── Rollback ────────────────────────────────────────────────────────

  /**
   * Capture the current records. Entries are immutable, so copying the
   * maps is enough.
   */
  checkpoint(): LedgerCheckpoint {
    return {
      pending: new Map(this._pending),
      claimable: new Map(this._claimable),
    };
  }

  restore(checkpoint: LedgerCheckpoint): void {
    this._pending = new Map(checkpoint.pending);
    this._claimable = new Map(checkpoint.claimable);
  }

  // ─── Snapshot (Persistence) ──────────────────────────────────────────

  snapshot(): RedeemLedgerSnapshot {
    return {
      version: 1,
      pending: this.listPending().map((e) => ({
        account: e.account,
        asset: e.asset,
        shares: formatUint(e.shares),
        requestTime: formatUint(e.requestTime),
      })),
      claimable: this.listClaimable().map((e) => ({
        account: e.account,
        asset: e.asset,
        assets: formatUint(e.assets),
        shares: formatUint(e.shares),
      })),
      createdAt: new Date().toISOString(),
    };
  }

  /**
   * Restore a ledger from a snapshot, re-validating every record.
   */
  static fromSnapshot(snapshot: RedeemLedgerSnapshot, options?: RedeemLedgerOptions): RedeemLedger {
    if (snapshot.version !== 1) {
      throw new LedgerError("INVALID_SNAPSHOT", `Unsupported snapshot version: ${String(snapshot.version)}`);
    }

    const ledger = new RedeemLedger(options);

    for (const record of snapshot.pending) {
      const { account, asset } = record;
      if (!isPendingRedeemView(record)) {
        throw new LedgerError("INVALID_SNAPSHOT", `Malformed pending record for "${account}"`);
      }
      const shares = parseUint(record.shares, "shares");
      const requestTime = parseUint(record.requestTime, "requestTime");
      if (shares === 0n || shares > PENDING_SHARES_MAX || requestTime > REQUEST_TIME_MAX) {
        throw new LedgerError("INVALID_SNAPSHOT", `Pending record out of range for "${account}"`);
      }
      ledger._pending.set(recordKey(account, asset), {
        account,
        asset,
        shares,
        requestTime,
      });
    }

    for (const record of snapshot.claimable) {
      const { account, asset } = record;
      if (!isClaimableRedeemView(record)) {
        throw new LedgerError("INVALID_SNAPSHOT", `Malformed claimable record for "${account}"`);
      }
      const assets = parseUint(record.assets, "assets");
      const shares = parseUint(record.shares, "shares");
      if (
        (assets === 0n && shares === 0n) ||
        assets > CLAIMABLE_ASSETS_MAX ||
        shares > CLAIMABLE_SHARES_MAX
      ) {
        throw new LedgerError("INVALID_SNAPSHOT", `Claimable record out of range for "${account}"`);
      }
      ledger._claimable.set(recordKey(account, asset), {
        account,
        asset,
        assets,
        shares,
      });
    }

    return ledger;
  }
}
