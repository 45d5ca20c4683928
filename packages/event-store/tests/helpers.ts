/**
 * Journal fixtures shaped like the vault's own events.
 */

import type { DomainEvent, EventSource } from "@sluice/types";

export const T0_ISO = "2024-01-01T00:00:00.000Z";

let sequence = 0;

export function vaultEvent(
  type: string,
  payload: Readonly<Record<string, unknown>> = {},
  options: { readonly correlationId?: string; readonly actor?: string; readonly source?: EventSource } = {},
): DomainEvent {
  sequence += 1;
  return {
    type,
    metadata: {
      eventId: `evt-${sequence}`,
      timestamp: T0_ISO,
      actor: options.actor ?? "alice",
      correlationId: options.correlationId ?? `op-${sequence}`,
      source: options.source ?? "redemption",
    },
    payload,
  };
}

export function requested(shares: string, correlationId?: string): DomainEvent {
  return vaultEvent(
    "redeem.requested",
    { asset: "USDC", controller: "alice", owner: "alice", shares, pendingShares: shares },
    correlationId === undefined ? {} : { correlationId },
  );
}

export function fulfilled(shares: string, assets: string, correlationId?: string): DomainEvent {
  return vaultEvent(
    "redeem.fulfilled",
    { asset: "USDC", controller: "alice", shares, assets, fee: "0" },
    { actor: "operator", ...(correlationId === undefined ? {} : { correlationId }) },
  );
}

export function deposited(amount: string, correlationId?: string): DomainEvent {
  return vaultEvent(
    "vault.deposited",
    { asset: "USDC", owner: "alice", receiver: "alice", amount, underlying: amount, shares: amount },
    { source: "vault", ...(correlationId === undefined ? {} : { correlationId }) },
  );
}
