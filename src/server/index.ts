/**
 * Server module.
 *
 * Provides the ShutdownController for coordinating graceful shutdown of a
 * node's task group.
 */

export {
  ShutdownController,
  type ShutdownControllerConfig,
  type ShutdownHandler,
  type ShutdownResult,
  type SignalSource,
} from './shutdown-controller.js';
