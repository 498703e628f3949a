/**
 * multiraft-task-group
 *
 * Shutdown broadcast and drain barrier for the long-lived workers of a
 * multiraft node.
 *
 * @packageDocumentation
 */

// =============================================================================
// Task group module
// =============================================================================
export * from './task-group/index.js';

// =============================================================================
// Events module
// =============================================================================
export * from './events/index.js';

// =============================================================================
// Logging module
// =============================================================================
export {
  type ComponentLogger,
  createLogger,
  getRootLogger,
  type LogFields,
  logDebug,
  logError,
  logInfo,
  logTrace,
  logWarn,
  setRootLogger,
} from './logging/index.js';

// =============================================================================
// Server module
// =============================================================================
export * from './server/index.js';

// =============================================================================
// Workers module
// =============================================================================
export * from './workers/index.js';
