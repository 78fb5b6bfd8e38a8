// Frame model, framing and error taxonomy for hasten sessions.

export {
  DEFAULT_MAX_FRAME_SIZE,
  type Frame,
  FrameKind,
  HEADER_SIZE,
  HEADER_TAIL_SIZE,
  LENGTH_PREFIX_SIZE,
  cancelFrame,
  describeFrame,
  errorFrame,
  frameKindName,
  goodbyeFrame,
  isFrameKind,
  pingFrame,
  pongFrame,
  requestFrame,
  responseFrame,
  serializeFrame,
} from "./frame.ts";
export { FrameDecoder } from "./decoder.ts";
export {
  ErrorCode,
  HandlerFailure,
  ProtocolError,
  type ProtocolErrorKind,
  RpcError,
  type RpcErrorKind,
  isErrorCode,
} from "./errors.ts";
export {
  type WireError,
  WireErrorSchema,
  decodeGoodbyeReason,
  decodeWireError,
  encodeGoodbyeReason,
  encodeWireError,
  rpcErrorFromWire,
} from "./wire_error.ts";
