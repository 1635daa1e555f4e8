export * from './types.js';
export { createEnvelope, redactPayload } from './envelope.js';
export {
  EventEmitter,
  createEventEmitter,
  type EmitOptions,
  type EventHandler,
  type EventEmitterConfig,
} from './emitter.js';
