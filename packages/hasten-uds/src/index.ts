// @hasten/uds - Unix domain socket transport for hasten (Node.js only)

export { SocketStream } from "./socket_stream.ts";
export { UdsServer, type UdsOptions, connect, listen } from "./uds.ts";

// Re-export the runtime so callers need one import
export {
  Dispatcher,
  Runtime,
  type RuntimeOptions,
  RpcError,
  defineService,
  err,
  ok,
} from "@hasten/core";
