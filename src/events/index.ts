/**
 * Events module.
 *
 * Provides event names and the typed lifecycle emitter.
 */

// Event emitter
export {
  type DriverErrorPayload,
  type DriverEventPayload,
  type GroupEventPayload,
  TaskGroupEventEmitter,
  type TaskGroupEventMap,
  type TaskFinishedPayload,
  type TaskOutcome,
  type TaskSpawnedPayload,
  type WakerPoisonedPayload,
} from './event-emitter.js';
// Event names
export {
  type DriverEventName,
  DriverEventNames,
  type EventName,
  EventNames,
  type GroupEventName,
  GroupEventNames,
  type TaskEventName,
  TaskEventNames,
} from './event-names.js';
