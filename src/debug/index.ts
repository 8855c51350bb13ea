/**
 * Debug entrypoint: request/response capture.
 * @module
 */
export { DUMP_TAG, dumpRequest, dumpResponse, frame } from './dump.js';
export { FileDebugSink } from './fileSink.js';
export type { DebugObserver } from './types.js';
