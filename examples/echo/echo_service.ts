// Echo service: descriptors plus the typed client and server skeleton a
// code generator would emit for it.

import {
  type Caller,
  Dispatcher,
  type HandlerContext,
  type Outcome,
  RpcError,
  defineService,
  err,
  methodByName,
} from "@hasten/core";

export const EchoService = defineService("Echo", 1, [
  { name: "echo", methodId: 1, args: { kind: "string" }, result: { kind: "string" } },
  {
    name: "greet",
    methodId: 2,
    args: { kind: "struct", fields: { name: { kind: "string" }, times: { kind: "u32" } } },
    result: { kind: "vec", element: { kind: "string" } },
  },
]);

const echoMethod = methodByName(EchoService, "echo");
const greetMethod = methodByName(EchoService, "greet");

/** Application error codes of the Echo service. */
export const EchoErrorCode = {
  BadArguments: 1,
  TooMany: 2,
} as const;

export interface GreetRequest {
  name: string;
  times: number;
}

function isGreetRequest(value: unknown): value is GreetRequest {
  return (
    typeof value === "object" &&
    value !== null &&
    "name" in value &&
    typeof value.name === "string" &&
    "times" in value &&
    typeof value.times === "number"
  );
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === "string");
}

/**
 * Typed client for the Echo service.
 *
 * @example
 * ```typescript
 * const client = new EchoClient(runtime.asCaller());
 * await client.echo("hello"); // "hello"
 * ```
 */
export class EchoClient {
  constructor(private readonly caller: Caller) {}

  async echo(message: string): Promise<string> {
    const result = await this.caller.call({ method: echoMethod, args: message });
    if (typeof result !== "string") {
      throw RpcError.decodeError(`${echoMethod.name}: expected a string result`);
    }
    return result;
  }

  async greet(request: GreetRequest): Promise<string[]> {
    const result = await this.caller.call({ method: greetMethod, args: request });
    if (!isStringArray(result)) {
      throw RpcError.decodeError(`${greetMethod.name}: expected a list of strings`);
    }
    return result;
  }
}

/** What an Echo server implements. */
export interface EchoHandler {
  echo(message: string, ctx: HandlerContext): Outcome<string> | Promise<Outcome<string>>;
  greet(request: GreetRequest, ctx: HandlerContext): Outcome<string[]> | Promise<Outcome<string[]>>;
}

/** Register an EchoHandler's methods on a dispatcher. */
export function registerEcho(dispatcher: Dispatcher, handler: EchoHandler): Dispatcher {
  dispatcher.registerMethod(echoMethod, (args, ctx) =>
    typeof args === "string"
      ? handler.echo(args, ctx)
      : err(EchoErrorCode.BadArguments, "echo takes a string"),
  );
  dispatcher.registerMethod(greetMethod, (args, ctx) =>
    isGreetRequest(args)
      ? handler.greet(args, ctx)
      : err(EchoErrorCode.BadArguments, "greet takes { name, times }"),
  );
  return dispatcher;
}
