import { describe, expect, it } from "vitest";
import { decodeI64, encodeI64, encodeU32 } from "@hasten/codec";
import {
  ErrorCode,
  type Frame,
  FrameKind,
  HandlerFailure,
  RpcError,
  decodeWireError,
  requestFrame,
} from "@hasten/wire";
import { defineService, methodByName } from "./descriptor.ts";
import { Dispatcher, err, ok } from "./dispatcher.ts";

const Calculator = defineService("Calculator", 1, [
  { name: "double", methodId: 1, args: { kind: "i64" }, result: { kind: "i64" } },
  { name: "halve", methodId: 2, args: { kind: "i64" }, result: { kind: "i64" } },
]);
const double = methodByName(Calculator, "double");
const halve = methodByName(Calculator, "halve");

function wireErrorOf(frame: Frame) {
  expect(frame.kind).toBe(FrameKind.Error);
  return decodeWireError(frame.payload);
}

function calculator(): Dispatcher {
  const dispatcher = new Dispatcher();
  dispatcher.registerMethod(double, (x) =>
    typeof x === "bigint" ? ok(x * 2n) : err(1, "expected an integer"),
  );
  dispatcher.registerMethod(halve, async (x) => {
    if (x === 1n) throw new HandlerFailure("cannot halve one", 7);
    if (x === 3n) throw new Error("boom");
    if (typeof x !== "bigint" || x % 2n !== 0n) return err(42, "odd input");
    return ok(x / 2n);
  });
  return dispatcher;
}

describe("Dispatcher", () => {
  it("decodes args, runs the handler and encodes the result", async () => {
    const reply = await calculator().dispatch(requestFrame(7, 1, 1, encodeI64(5n)));

    expect(reply).toMatchObject({ kind: FrameKind.Response, requestId: 7, serviceId: 1, methodId: 0 });
    expect(decodeI64(reply.payload, 0).value).toBe(10n);
  });

  it("answers an unregistered pair with UnknownMethod", async () => {
    const reply = await calculator().dispatch(requestFrame(3, 9, 4, new Uint8Array(0)));

    expect(reply.requestId).toBe(3);
    expect(wireErrorOf(reply)).toEqual({
      code: ErrorCode.UnknownMethod,
      appCode: 0,
      message: "no handler for service 9 method 4",
    });
  });

  it("answers an undecodable payload with DecodeError", async () => {
    const reply = await calculator().dispatch(requestFrame(4, 1, 1, Uint8Array.from([1, 2, 3])));

    expect(wireErrorOf(reply)).toEqual({
      code: ErrorCode.DecodeError,
      appCode: 0,
      message: "i64: need 8 bytes, 3 available at offset 0 (path: <root>)",
    });
  });

  it("answers trailing bytes with DecodeError", async () => {
    const payload = Uint8Array.from([...encodeI64(5n), 0]);
    const reply = await calculator().dispatch(requestFrame(4, 1, 1, payload));

    expect(wireErrorOf(reply)).toMatchObject({
      code: ErrorCode.DecodeError,
      message: "1 trailing bytes after value at offset 8 (path: <root>)",
    });
  });

  it("carries the application code of an err outcome", async () => {
    const reply = await calculator().dispatch(requestFrame(5, 1, 2, encodeI64(5n)));

    expect(wireErrorOf(reply)).toEqual({
      code: ErrorCode.HandlerFailure,
      appCode: 42,
      message: "odd input",
    });
  });

  it("turns a thrown HandlerFailure into its code", async () => {
    const reply = await calculator().dispatch(requestFrame(5, 1, 2, encodeI64(1n)));

    expect(wireErrorOf(reply)).toEqual({
      code: ErrorCode.HandlerFailure,
      appCode: 7,
      message: "cannot halve one",
    });
  });

  it("turns any other thrown error into HandlerFailure with code 0", async () => {
    const reply = await calculator().dispatch(requestFrame(5, 1, 2, encodeI64(3n)));

    expect(wireErrorOf(reply)).toEqual({
      code: ErrorCode.HandlerFailure,
      appCode: 0,
      message: "boom",
    });
  });

  it("sends application codes that are not u32 as code 0 with the handler's message", async () => {
    const dispatcher = new Dispatcher();
    dispatcher.register(4, 1, () => {
      throw new HandlerFailure("too big", 2 ** 32);
    });
    dispatcher.register(4, 2, () => err(-1, "bad input"));
    dispatcher.register(4, 3, () => err(1.5, "half a code"));

    for (const [methodId, message] of [
      [1, "too big"],
      [2, "bad input"],
      [3, "half a code"],
    ] as const) {
      const reply = await dispatcher.dispatch(requestFrame(methodId, 4, methodId, new Uint8Array(0)));
      expect(wireErrorOf(reply)).toEqual({ code: ErrorCode.HandlerFailure, appCode: 0, message });
    }
  });

  it("passes raw payloads through and accepts raw outcomes", async () => {
    const dispatcher = new Dispatcher();
    dispatcher.register(2, 1, (payload) => payload.slice().reverse());
    dispatcher.register(2, 2, () => err(9, "refused"));

    const echoed = await dispatcher.dispatch(requestFrame(1, 2, 1, Uint8Array.from([1, 2, 3])));
    expect(echoed.payload).toEqual(Uint8Array.from([3, 2, 1]));

    const refused = await dispatcher.dispatch(requestFrame(2, 2, 2, new Uint8Array(0)));
    expect(wireErrorOf(refused)).toEqual({ code: ErrorCode.HandlerFailure, appCode: 9, message: "refused" });
  });

  it("gives handlers the request context", async () => {
    const dispatcher = new Dispatcher();
    const controller = new AbortController();
    dispatcher.register(3, 4, (_payload, ctx) => {
      expect(ctx.signal).toBe(controller.signal);
      return encodeU32(ctx.requestId + ctx.serviceId + ctx.methodId);
    });

    const reply = await dispatcher.dispatch(requestFrame(10, 3, 4, new Uint8Array(0)), controller.signal);
    expect(reply.payload).toEqual(encodeU32(17));
  });

  it("rejects a second handler for the same pair", () => {
    const dispatcher = calculator();
    expect(() => dispatcher.register(1, 1, () => new Uint8Array(0))).toThrow(RpcError);
    expect(() => dispatcher.register(1, 1, () => new Uint8Array(0))).toThrow(
      "a handler for service 1 method 1 is already registered",
    );
  });

  it("refuses registration once frozen", () => {
    const dispatcher = calculator();
    dispatcher.freeze();

    expect(dispatcher.isFrozen).toBe(true);
    expect(() => dispatcher.register(1, 3, () => new Uint8Array(0))).toThrow(
      "cannot register service 1 method 3: dispatcher is frozen",
    );
    expect(dispatcher.size).toBe(2);
    expect(dispatcher.lookup(1, 2)?.name).toBe("Calculator.halve");
  });
});
