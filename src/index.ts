export { MockServer, createMockServer } from './server.js';
export { MockRegistry, type UnmatchedRequest } from './mock/registry.js';
export { MockEntry, DEFAULT_METHOD } from './mock/MockEntry.js';
export type {
  MockRequest,
  MockResponse,
  RequestFilter,
  Responder,
  ResponseStrategy,
  StatusProducer,
} from './mock/types.js';
export { RecordingReporter, type TestReporter } from './reporter.js';
export {
  MockServerOptionsSchema,
  loadLogSettings,
  resolveServerOptions,
  type LogSettings,
  type MockServerOptions,
  type ResolvedMockServerOptions,
} from './config.js';
export { default as logger } from './logger.js';
