/**
 * @sluice/node — HTTP service for the redemption vault.
 */

export { VaultService } from "./services/vault-service.js";
export type { VaultServiceConfig } from "./services/vault-service.js";
export { loadConfig, parseApiKeys, parseAssetRates, ConfigSchema } from "./config.js";
export type { AppConfig, ParsedApiKey } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export * from "./types/index.js";
