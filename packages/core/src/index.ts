export * from './types.js';
export * from './http.js';
export * from './datafile.js';
export { MemoryCache, type Clock } from './cache/memory.js';
export { chunk } from './util/batch.js';
export {
  startServer,
  createHttpApp,
  type ServerFactory,
  type TransportConfig,
  type TransportKind
} from './transport.js';
