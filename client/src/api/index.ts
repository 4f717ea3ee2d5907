/**
 * Public API surface: the client and the fan-out helper it is built on
 */

export { ShovelsClient, MAX_CONTRACTOR_IDS, type ShovelsClientOptions } from './shovels-client.js';
export { fanOut, type FanOutFailure, type FanOutResult } from './fan-out.js';
