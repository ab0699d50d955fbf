/**
 * @meridian/node — HTTP service over the coordination engine.
 */

export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export { loadConfig, parseApiKeys, toEngineConfig, ConfigSchema } from "./config.js";
export type { AppConfig, ParsedApiKey } from "./config.js";
export { signalLogLevel, logSignal } from "./signal-log.js";
export type { SignalLogLevel, SignalLogger } from "./signal-log.js";
export * from "./middleware/index.js";
export * from "./routes/index.js";
export * from "./types/index.js";
