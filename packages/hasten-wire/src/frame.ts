/**
 * Frame - a complete message unit on a hasten byte stream.
 *
 * Wire format (little-endian):
 * [4 bytes: total_length] [1: kind] [4: request_id] [4: service_id]
 * [4: method_id] [3: reserved] [payload bytes]
 *
 * total_length counts everything after itself: 16 header bytes + payload.
 */

export const FrameKind = {
  Request: 0,
  Response: 1,
  Error: 2,
  Cancel: 3,
  Goodbye: 4,
  Ping: 5,
  Pong: 6,
} as const;

export type FrameKind = (typeof FrameKind)[keyof typeof FrameKind];

const FRAME_KIND_NAMES: Record<FrameKind, string> = {
  [FrameKind.Request]: "Request",
  [FrameKind.Response]: "Response",
  [FrameKind.Error]: "Error",
  [FrameKind.Cancel]: "Cancel",
  [FrameKind.Goodbye]: "Goodbye",
  [FrameKind.Ping]: "Ping",
  [FrameKind.Pong]: "Pong",
};

export function isFrameKind(value: number): value is FrameKind {
  return Object.hasOwn(FRAME_KIND_NAMES, value);
}

export function frameKindName(kind: FrameKind): string {
  return FRAME_KIND_NAMES[kind];
}

/** Size of the total_length prefix. */
export const LENGTH_PREFIX_SIZE = 4;
/** Header bytes counted by total_length (kind, ids, reserved). */
export const HEADER_TAIL_SIZE = 16;
/** Full header size, prefix included. */
export const HEADER_SIZE = LENGTH_PREFIX_SIZE + HEADER_TAIL_SIZE;

/** Default cap on total_length (16 MiB). */
export const DEFAULT_MAX_FRAME_SIZE = 16 * 1024 * 1024;

export interface Frame {
  kind: FrameKind;
  requestId: number;
  serviceId: number;
  /** 0 for every kind except Request. */
  methodId: number;
  payload: Uint8Array;
}

const EMPTY = new Uint8Array(0);

export function requestFrame(
  requestId: number,
  serviceId: number,
  methodId: number,
  payload: Uint8Array,
): Frame {
  return { kind: FrameKind.Request, requestId, serviceId, methodId, payload };
}

export function responseFrame(requestId: number, serviceId: number, payload: Uint8Array): Frame {
  return { kind: FrameKind.Response, requestId, serviceId, methodId: 0, payload };
}

export function errorFrame(requestId: number, serviceId: number, payload: Uint8Array): Frame {
  return { kind: FrameKind.Error, requestId, serviceId, methodId: 0, payload };
}

export function cancelFrame(requestId: number, serviceId: number): Frame {
  return { kind: FrameKind.Cancel, requestId, serviceId, methodId: 0, payload: EMPTY };
}

/** Goodbye is session-scoped, so its ids are zero. */
export function goodbyeFrame(payload: Uint8Array): Frame {
  return { kind: FrameKind.Goodbye, requestId: 0, serviceId: 0, methodId: 0, payload };
}

/** Liveness check. The peer answers with a Pong carrying the same id and payload. */
export function pingFrame(requestId: number, payload: Uint8Array = EMPTY): Frame {
  return { kind: FrameKind.Ping, requestId, serviceId: 0, methodId: 0, payload };
}

export function pongFrame(ping: Frame): Frame {
  return {
    kind: FrameKind.Pong,
    requestId: ping.requestId,
    serviceId: 0,
    methodId: 0,
    payload: ping.payload,
  };
}

function checkU32(value: number, field: string): void {
  if (!Number.isInteger(value) || value < 0 || value > 0xffff_ffff) {
    throw new RangeError(`frame ${field} ${value} is not a u32`);
  }
}

/**
 * Serialize a frame for transmission.
 *
 * Returns: [20-byte header][payload]
 */
export function serializeFrame(frame: Frame): Uint8Array {
  checkU32(frame.requestId, "requestId");
  checkU32(frame.serviceId, "serviceId");
  checkU32(frame.methodId, "methodId");

  const totalLength = HEADER_TAIL_SIZE + frame.payload.length;
  const out = new Uint8Array(LENGTH_PREFIX_SIZE + totalLength);
  const view = new DataView(out.buffer);

  view.setUint32(0, totalLength, true);
  view.setUint8(4, frame.kind);
  view.setUint32(5, frame.requestId, true);
  view.setUint32(9, frame.serviceId, true);
  view.setUint32(13, frame.methodId, true);
  // bytes 17..19 reserved, already zero
  out.set(frame.payload, HEADER_SIZE);

  return out;
}

/** One-line summary for logs. */
export function describeFrame(frame: Frame): string {
  const method = frame.kind === FrameKind.Request ? ` method=${frame.methodId}` : "";
  return (
    `${frameKindName(frame.kind)}#${frame.requestId} service=${frame.serviceId}${method}` +
    ` (${frame.payload.length} bytes)`
  );
}
