/**
 * In-memory collaborators.
 *
 * Back the HTTP service and the tests. The share token and the asset
 * custody support rollback, so a failed controller operation leaves
 * their balances untouched as well.
 */

import type { AccountId, AssetId, UnixSeconds } from "@sluice/types";
import type { RateProvider } from "@sluice/ledger";
import { LedgerError, assertUint, mulDiv } from "@sluice/ledger";
import type {
  AccessGate,
  AssetTransfer,
  Clock,
  PauseGate,
  Rollback,
  ShareToken,
  VaultRole,
} from "./types.js";
import { VaultError } from "./types.js";

// =============================================================================
// Share Token
// =============================================================================

export class InMemoryShareToken implements ShareToken, Rollback {
  private _balances = new Map<AccountId, bigint>();
  private _totalSupply = 0n;

  balanceOf(account: AccountId): bigint {
    return this._balances.get(account) ?? 0n;
  }

  totalSupply(): bigint {
    return this._totalSupply;
  }

  mint(to: AccountId, shares: bigint): void {
    assertUint(shares, "shares");
    this._balances.set(to, this.balanceOf(to) + shares);
    this._totalSupply += shares;
  }

  burn(from: AccountId, shares: bigint): void {
    this._debit(from, shares);
    this._totalSupply -= shares;
  }

  transfer(from: AccountId, to: AccountId, shares: bigint): void {
    this._debit(from, shares);
    this._balances.set(to, this.balanceOf(to) + shares);
  }

  checkpoint(): () => void {
    const balances = new Map(this._balances);
    const totalSupply = this._totalSupply;
    return () => {
      this._balances = new Map(balances);
      this._totalSupply = totalSupply;
    };
  }

  private _debit(from: AccountId, shares: bigint): void {
    assertUint(shares, "shares");
    const balance = this.balanceOf(from);
    if (shares > balance) {
      throw new VaultError(
        "INSUFFICIENT_BALANCE",
        `"${from}" holds ${balance.toString()} shares, needs ${shares.toString()}`,
      );
    }
    this._balances.set(from, balance - shares);
  }
}

// =============================================================================
// Asset Custody
// =============================================================================

export class InMemoryAssetCustody implements AssetTransfer, Rollback {
  private _balances = new Map<string, bigint>();

  constructor(private readonly vaultAccount: AccountId) {}

  balanceOf(holder: AccountId, asset: AssetId): bigint {
    return this._balances.get(key(holder, asset)) ?? 0n;
  }

  /** Fund a holder from outside the vault. */
  credit(holder: AccountId, asset: AssetId, amount: bigint): void {
    assertUint(amount);
    this._balances.set(key(holder, asset), this.balanceOf(holder, asset) + amount);
  }

  transfer(asset: AssetId, to: AccountId, amount: bigint): void {
    this.transferFrom(asset, this.vaultAccount, to, amount);
  }

  transferFrom(asset: AssetId, from: AccountId, to: AccountId, amount: bigint): void {
    assertUint(amount);
    const balance = this.balanceOf(from, asset);
    if (amount > balance) {
      throw new VaultError(
        "INSUFFICIENT_BALANCE",
        `"${from}" holds ${balance.toString()} ${asset}, needs ${amount.toString()}`,
      );
    }
    this._balances.set(key(from, asset), balance - amount);
    this._balances.set(key(to, asset), this.balanceOf(to, asset) + amount);
  }

  checkpoint(): () => void {
    const balances = new Map(this._balances);
    return () => {
      this._balances = new Map(balances);
    };
  }
}

function key(holder: AccountId, asset: AssetId): string {
  return JSON.stringify([holder, asset]);
}

// =============================================================================
// Rates
// =============================================================================

/** Underlying per asset unit, as numerator / denominator. */
export interface AssetRate {
  readonly numerator: bigint;
  readonly denominator: bigint;
}

/**
 * Fixed per-asset rates.
 *   toUnderlying   = amount * numerator / denominator
 *   fromUnderlying = amount * denominator / numerator
 * Both round down.
 */
export class StaticRateProvider implements RateProvider {
  private readonly _rates = new Map<AssetId, AssetRate>();

  constructor(rates: Iterable<readonly [AssetId, AssetRate]> = []) {
    for (const [asset, rate] of rates) {
      this.setRate(asset, rate);
    }
  }

  setRate(asset: AssetId, rate: AssetRate): void {
    if (rate.numerator <= 0n || rate.denominator <= 0n) {
      throw new VaultError(
        "INVALID_CONFIG",
        `Rate for "${asset}" must have a positive numerator and denominator`,
      );
    }
    this._rates.set(asset, rate);
  }

  isSupported(asset: AssetId): boolean {
    return this._rates.has(asset);
  }

  convertToUnderlying(asset: AssetId, amount: bigint): bigint {
    const rate = this._rate(asset);
    return mulDiv(amount, rate.numerator, rate.denominator, "down");
  }

  convertFromUnderlying(asset: AssetId, amount: bigint): bigint {
    const rate = this._rate(asset);
    return mulDiv(amount, rate.denominator, rate.numerator, "down");
  }

  private _rate(asset: AssetId): AssetRate {
    const rate = this._rates.get(asset);
    if (rate === undefined) {
      throw new LedgerError("ASSET_NOT_SUPPORTED", `No rate for asset "${asset}"`);
    }
    return rate;
  }
}

// =============================================================================
// Access, Pause, Clock
// =============================================================================

export class InMemoryAccessGate implements AccessGate {
  private readonly _roles = new Map<VaultRole, Set<AccountId>>();
  private readonly _operators = new Map<AccountId, Set<AccountId>>();

  grantRole(role: VaultRole, account: AccountId): void {
    const members = this._roles.get(role) ?? new Set<AccountId>();
    members.add(account);
    this._roles.set(role, members);
  }

  revokeRole(role: VaultRole, account: AccountId): void {
    this._roles.get(role)?.delete(account);
  }

  hasRole(role: VaultRole, account: AccountId): boolean {
    return this._roles.get(role)?.has(account) ?? false;
  }

  /** Approve or revoke `operator` as a delegate of `controller`. */
  setOperator(controller: AccountId, operator: AccountId, approved: boolean): void {
    const operators = this._operators.get(controller) ?? new Set<AccountId>();
    if (approved) {
      operators.add(operator);
    } else {
      operators.delete(operator);
    }
    this._operators.set(controller, operators);
  }

  isAuthorized(controller: AccountId, caller: AccountId): boolean {
    return controller === caller || (this._operators.get(controller)?.has(caller) ?? false);
  }
}

export class PauseSwitch implements PauseGate {
  private _paused = false;

  pause(): void {
    this._paused = true;
  }

  unpause(): void {
    this._paused = false;
  }

  isPaused(): boolean {
    return this._paused;
  }
}

export const systemClock: Clock = {
  now: () => Math.floor(Date.now() / 1000),
};

/** A clock that only moves when told to. */
export class ManualClock implements Clock {
  constructor(private _now: UnixSeconds) {}

  now(): UnixSeconds {
    return this._now;
  }

  set(now: UnixSeconds): void {
    this._now = now;
  }

  advance(seconds: number): void {
    this._now += seconds;
  }
}
