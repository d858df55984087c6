/**
 * cdp-quiesce
 *
 * Awaitable browser automation over the Chrome DevTools Protocol.
 */

export * from './cdp/index.js';
export * from './browser/index.js';
export * from './retry/index.js';
export * from './handles/index.js';
export * from './runtime/index.js';
export * from './dom/index.js';
export * from './shared/errors/index.js';
export {
  LoggingService,
  LogLevelSchema,
  getLogger,
  setLogger,
  logLevelFromEnv,
  type LogEntry,
  type LogLevel,
  type Logger,
} from './shared/services/logging.service.js';
export {
  ClientConfigSchema,
  loadClientConfig,
  type ClientConfig,
  type ClientConfigInput,
} from './config/client-config.js';
