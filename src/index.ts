export * from "./services/flow";
export { PlexLibrary, type PlexLibraryOptions, type PlexHttpClient } from "./services/plex";
export { FlowScheduler, type FlowJob, type FlowSchedulerOptions } from "./workers/flowScheduler";
export { loadAppConfig, DEFAULT_PERIODS, type AppConfig, type PlexConfig } from "./config";
export { createSeededRandom } from "./utils/random";
export { AppError, ConfigurationError, ErrorCategory, ErrorCode } from "./utils/errors";
export { createLogger, type Logger } from "./utils/logger";
