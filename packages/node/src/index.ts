/**
 * @coinwrap/node — HTTP service for the wrapping ledger.
 *
 * Package public API. The runnable entry point is main.ts.
 */

export { WrapperService } from "./services/wrapper-service.js";
export type { WrapperServiceConfig } from "./services/wrapper-service.js";
export { loadConfig, ConfigSchema } from "./config.js";
export type { AppConfig } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export * from "./types/index.js";
export * from "./middleware/index.js";
export * from "./routes/index.js";
