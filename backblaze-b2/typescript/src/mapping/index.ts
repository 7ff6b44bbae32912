export { ResourceMapper } from './resources.js';
export { parseJson, parsePayload } from './payload.js';
