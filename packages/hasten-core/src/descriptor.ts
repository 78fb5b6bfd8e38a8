// Runtime method and service descriptor types.
//
// Generated stubs and skeletons carry these so the runtime can encode
// arguments and results without serialization logic in generated code.

import type { Schema, SchemaRegistry } from "@hasten/codec";

/**
 * Describes a single RPC method at runtime.
 */
export interface MethodDescriptor {
  /** Qualified name, e.g. "Calculator.double" (for logging/debugging). */
  name: string;
  serviceId: number;
  methodId: number;
  /** Schema of the argument value; several arguments travel as a tuple or struct. */
  args: Schema;
  /** Schema of the success value. */
  result: Schema;
  /** Resolves `ref` schemas used by args and result. */
  registry?: SchemaRegistry;
}

/** Describes a service at runtime (collection of method descriptors). */
export interface ServiceDescriptor {
  name: string;
  serviceId: number;
  methods: MethodDescriptor[];
}

/**
 * Build a service descriptor, qualifying each method name with the service's.
 *
 * @example
 * ```typescript
 * const Calculator = defineService("Calculator", 1, [
 *   { name: "double", methodId: 1, args: { kind: "i64" }, result: { kind: "i64" } },
 * ]);
 * ```
 *
 * @throws Error if two methods share a method id
 */
export function defineService(
  name: string,
  serviceId: number,
  methods: Array<Omit<MethodDescriptor, "serviceId">>,
): ServiceDescriptor {
  const seen = new Set<number>();
  for (const method of methods) {
    if (seen.has(method.methodId)) {
      throw new Error(`${name}: method id ${method.methodId} is used twice`);
    }
    seen.add(method.methodId);
  }
  return {
    name,
    serviceId,
    methods: methods.map((method) => ({
      ...method,
      name: `${name}.${method.name}`,
      serviceId,
    })),
  };
}

/**
 * Look a method up by its unqualified name.
 *
 * @throws Error if the service has no such method
 */
export function methodByName(service: ServiceDescriptor, name: string): MethodDescriptor {
  const method = service.methods.find((m) => m.name === `${service.name}.${name}`);
  if (!method) {
    throw new Error(`${service.name} has no method "${name}"`);
  }
  return method;
}
