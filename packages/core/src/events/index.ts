export { InMemoryMessageBus } from './in-memory-bus';
export type { MessageHandler } from './in-memory-bus';
export {
  getMessageBus,
  setMessageBus,
  getSessionRegistry,
  setSessionRegistry,
  runScoped,
  withScopedSession,
  runSerialized,
  serialized,
  queueMessage,
  shutdownDataLayer,
} from './data-layer';
export type { AppSession } from './data-layer';
