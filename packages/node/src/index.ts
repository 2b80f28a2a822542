/**
 * @meridian/node — Public API
 *
 * HTTP surface of the protocol, the keeper loop and configuration loading.
 */

export { loadConfig, parseApiKeys, parseAssets, parseList, principalsFrom, parametersFrom, ConfigSchema, PRICE_DECIMALS } from "./config.js";
export type { AppConfig, ParsedApiKey, ConfiguredAsset } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export { Keeper } from "./services/keeper.js";
export type { KeeperOptions, KeeperStep, KeeperOrchestrator } from "./services/keeper.js";
export { createSimulatedProtocol } from "./services/simulation.js";
export type { SimulatedProtocol } from "./services/simulation.js";
export * from "./middleware/index.js";
export * from "./routes/index.js";
export * from "./types/index.js";
