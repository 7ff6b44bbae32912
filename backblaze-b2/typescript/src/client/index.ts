export { createDriver, createDriverFromEnv, type DriverFactoryOptions } from './factory.js';
