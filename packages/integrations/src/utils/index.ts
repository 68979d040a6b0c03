/**
 * Utility Functions
 * Transport retry, rate governance and logging helpers
 */

// Rate governor exports
export {
  RateGovernor,
  parseCallLimit,
  parseRetryAfter,
  readHeader,
  CALL_LIMIT_HEADER,
  RETRY_AFTER_HEADER,
  DEFAULT_RATE_GOVERNOR_OPTIONS,
  type CallLimit,
  type GovernedCallContext,
  type RateGovernorDependencies,
  type RateGovernorOptions,
  type RateState,
} from './rate-governor.js';

// Retry exports
export {
  sendWithRetry,
  isConnectTimeout,
  classifyTransportError,
  DEFAULT_TRANSPORT_POLICY,
  type SendOptions,
  type TransportPolicy,
} from './retry.js';

// Logger exports
export {
  createLogger,
  createSilentLogger,
  LogCounter,
  type LogCounts,
  type Logger,
} from './logger.js';
