/**
 * @invite-escrow/node — HTTP service for the invitation escrow.
 *
 * Package public API. main.ts is the executable entry point.
 */

export { EscrowService } from "./services/escrow-service.js";
export type { EscrowServiceConfig } from "./services/escrow-service.js";
export { InMemoryIdentityRegistry } from "./services/identity-registry.js";
export { InMemoryAssetBank, AssetBankError } from "./services/asset-bank.js";
export type { AccountBalances, AssetBankErrorCode } from "./services/asset-bank.js";
export { loadConfig, ConfigSchema } from "./config.js";
export type { AppConfig } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export * from "./middleware/index.js";
export * from "./types/index.js";
