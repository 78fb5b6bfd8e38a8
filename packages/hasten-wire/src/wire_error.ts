// Payload codecs for Error and Goodbye frames.

import {
  DecodeError,
  concat,
  decodeString,
  decodeU32,
  encodeString,
  encodeU32,
  type StructSchema,
} from "@hasten/codec";
import { ErrorCode, RpcError, isErrorCode } from "./errors.ts";

/** Body of an Error frame. */
export interface WireError {
  code: ErrorCode;
  /** Application code for HandlerFailure, otherwise 0. */
  appCode: number;
  message: string;
}

/** Codec schema of the Error frame payload, for peers that decode it generically. */
export const WireErrorSchema: StructSchema = {
  kind: "struct",
  fields: {
    code: { kind: "u32" },
    appCode: { kind: "u32" },
    message: { kind: "string" },
  },
};

export function encodeWireError(error: WireError): Uint8Array {
  return concat(encodeU32(error.code), encodeU32(error.appCode), encodeString(error.message));
}

/** @throws DecodeError on malformed payloads or unknown codes */
export function decodeWireError(payload: Uint8Array): WireError {
  const code = decodeU32(payload, 0);
  if (!isErrorCode(code.value)) {
    throw DecodeError.invalid(`unknown error code ${code.value}`, 0);
  }
  const appCode = decodeU32(payload, code.next);
  const message = decodeString(payload, appCode.next);
  if (message.next !== payload.length) {
    throw DecodeError.trailing(message.next, payload.length);
  }
  return { code: code.value, appCode: appCode.value, message: message.value };
}

/** The error a caller sees for an Error frame. */
export function rpcErrorFromWire(error: WireError): RpcError {
  switch (error.code) {
    case ErrorCode.UnknownMethod:
      return new RpcError("unknownMethod", error.message);
    case ErrorCode.DecodeError:
      return new RpcError("decodeError", error.message);
    case ErrorCode.HandlerFailure:
      return RpcError.handlerFailure(error.appCode, error.message);
  }
}

export function encodeGoodbyeReason(reason: string): Uint8Array {
  return encodeString(reason);
}

/** @throws DecodeError on malformed payloads */
export function decodeGoodbyeReason(payload: Uint8Array): string {
  const reason = decodeString(payload, 0);
  if (reason.next !== payload.length) {
    throw DecodeError.trailing(reason.next, payload.length);
  }
  return reason.value;
}
