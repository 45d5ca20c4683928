/**
 * Global error handler.
 *
 * Catches all errors thrown by route handlers and produces a consistent
 * error envelope. Domain errors keep their code; the status follows the
 * kind of failure:
 *   400 malformed input, 401/403 auth, 404 unknown, 409 conflicts,
 *   422 domain rule failures, 423 paused.
 */

import type { Context } from "hono";
import { HTTPException } from "hono/http-exception";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import type { Logger } from "pino";
import { ZodError } from "zod";
import { LedgerError } from "@sluice/ledger";
import { FeeError } from "@sluice/fees";
import { EventStoreError } from "@sluice/event-store";
import { VaultError } from "@sluice/vault";
import { ApiError, createErrorEnvelope } from "../types/error.js";
import { formatZodErrors } from "./validate.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

type DomainError = LedgerError | FeeError | VaultError | EventStoreError;

const STATUS_MAP: Record<DomainError["code"], ContentfulStatusCode> = {
  // Ledger and conversion
  INSUFFICIENT_PENDING_SHARES: 422,
  INSUFFICIENT_CLAIMABLE_SHARES: 422,
  INSUFFICIENT_CLAIMABLE_ASSETS: 422,
  TOO_MANY_SHARES: 422,
  TOO_MANY_ASSETS: 422,
  ASSET_NOT_SUPPORTED: 404,
  INVALID_AMOUNT: 400,
  INVALID_SNAPSHOT: 400,
  MATH_OVERFLOW: 422,

  // Fees
  INVALID_FEES: 400,

  // Controller
  UNAUTHORIZED: 403,
  PAUSED: 423,
  INSUFFICIENT_BALANCE: 422,
  LENGTH_MISMATCH: 400,
  REENTRANT_CALL: 409,
  NOTHING_TO_REDEEM: 422,
  NOTHING_TO_WITHDRAW: 422,
  NOTHING_TO_MINT: 422,
  NO_PENDING_REDEEM: 422,
  INVALID_OBSERVATION: 422,
  INVALID_CONFIG: 500,
  RESERVED_ACCOUNT: 400,
  INVALID_TIMESTAMP: 500,

  // Journal
  CONCURRENCY_CONFLICT: 409,
  INVALID_STREAM_ID: 400,
  EMPTY_APPEND: 400,
  INVALID_VERSION: 400,
  SUBSCRIBER_FAILED: 500,
};

function isDomainError(err: Error): err is DomainError {
  return (
    err instanceof LedgerError ||
    err instanceof FeeError ||
    err instanceof VaultError ||
    err instanceof EventStoreError
  );
}

// =============================================================================
// Handler
// =============================================================================

/**
 * Create the handler registered as Hono's onError.
 */
export function createErrorHandler(logger: Logger) {
  return (err: Error, c: Context): Response => {
    if (err instanceof HTTPException) {
      return err.getResponse();
    }

    if (err instanceof ApiError) {
      return c.json(createErrorEnvelope(err.code, err.message, err.details), err.status);
    }

    if (err instanceof ZodError) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Validation failed", {
          issues: formatZodErrors(err),
        }),
        400,
      );
    }

    if (isDomainError(err)) {
      const status = STATUS_MAP[err.code];
      if (status >= 500) {
        logger.error({ err, code: err.code }, "Domain error");
        return c.json(createErrorEnvelope(err.code, "Internal server error"), status);
      }
      return c.json(createErrorEnvelope(err.code, err.message), status);
    }

    // Don't leak internal details
    logger.error({ err }, "Unhandled error");
    return c.json(createErrorEnvelope("INTERNAL_ERROR", "Internal server error"), 500);
  };
}
