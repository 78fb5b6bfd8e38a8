// @hasten/core - sessions, dispatch and calls for hasten services.

// RPC error types (for client-side error handling)
export { ErrorCode, HandlerFailure, ProtocolError, RpcError, type RpcErrorKind } from "@hasten/wire";

// Byte streams
export type { ByteStream } from "./transport.ts";
export { createChannel, type Channel } from "./channel.ts";
export { createMemoryStreamPair, type MemoryStreamOptions } from "./memory_stream.ts";

// Configuration and logging
export {
  DEFAULT_CALL_TIMEOUT_MS,
  DEFAULT_CLOSE_TIMEOUT_MS,
  DEFAULT_DISPATCH_CONCURRENCY,
  DEFAULT_MAX_PENDING_CALLS,
  type RuntimeConfig,
  defaultRuntimeConfig,
  resolveRuntimeConfig,
  runtimeConfigFromEnv,
} from "./config.ts";
export {
  type LogLevel,
  type LogRecord,
  type LogSink,
  Logger,
  type LoggerOptions,
  consoleSink,
  createLogger,
  errorFields,
  isNamespaceEnabled,
} from "./logging.ts";

// Descriptors
export {
  type MethodDescriptor,
  type ServiceDescriptor,
  defineService,
  methodByName,
} from "./descriptor.ts";

// Server side
export {
  Dispatcher,
  type DispatcherOptions,
  type HandlerContext,
  type HandlerEntry,
  type MethodHandler,
  type Outcome,
  type RawHandler,
  err,
  ok,
} from "./dispatcher.ts";
export { WorkerPool } from "./worker_pool.ts";

// Session and runtime
export {
  CallTable,
  type CallResolution,
  type CallTableOptions,
  type IssuedCall,
} from "./call_table.ts";
export { type RequestSink, Session, type SessionOptions, type SessionState } from "./session.ts";
export { type CallOptions, Runtime, RuntimeCaller, type RuntimeOptions } from "./runtime.ts";

// Client middleware
export { type Caller, type CallerRequest, MiddlewareCaller } from "./caller.ts";
export {
  type CallOutcome,
  type CallRequest,
  type ClientMiddleware,
  type Rejection,
  RejectionError,
} from "./middleware.ts";
export { type LoggingOptions, loggingMiddleware } from "./logging_middleware.ts";
