/**
 * Workers module.
 */

export {
  type DriverState,
  TickDriver,
  type TickCallback,
  type TickDriverConfig,
  type TickErrorCallback,
} from './tick-driver.js';
