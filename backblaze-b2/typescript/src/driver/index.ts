export type { StorageDriver } from './interface.js';
export {
  BackblazeB2Driver,
  downloadPath,
  type BackblazeB2DriverOptions,
} from './b2-driver.js';
