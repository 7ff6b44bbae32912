/**
 * In-process stand-ins for the B2 service
 * @module backblaze-b2/simulation
 */

export {
  ScriptedTransport,
  TrackedBody,
  jsonResponse,
  rawResponse,
  streamBody,
  type ScriptedHandler,
} from './scripted-transport.js';

export {
  SimulatedB2Backend,
  type SimulatedB2BackendOptions,
  type SimulatedBucket,
  type SimulatedFileVersion,
} from './backend.js';
