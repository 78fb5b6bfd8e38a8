// Unix domain socket bootstrap.

import net from "node:net";
import {
  type Dispatcher,
  type Logger,
  Runtime,
  type RuntimeOptions,
  createLogger,
  errorFields,
} from "@hasten/core";
import { SocketStream } from "./socket_stream.ts";

/** Runtime options for every connection; the dispatcher is given separately to `listen`. */
export type UdsOptions = Omit<RuntimeOptions, "dispatcher">;

/**
 * Connect to a socket path and start a Runtime on the connection.
 *
 * @example
 * ```typescript
 * const runtime = await connect("/tmp/calculator.sock");
 * const doubled = await runtime.call(double, 5n);
 * await runtime.close();
 * ```
 */
export async function connect(
  path: string,
  options: RuntimeOptions = {},
): Promise<Runtime> {
  const socket = await new Promise<net.Socket>((resolve, reject) => {
    const socket = net.createConnection({ path }, () => {
      socket.off("error", reject);
      resolve(socket);
    });
    socket.once("error", reject);
  });
  const runtime = new Runtime(new SocketStream(socket), options);
  runtime.start();
  return runtime;
}

/**
 * Accepts connections on a socket path, one Runtime per connection, all
 * served by the same dispatcher.
 */
export class UdsServer {
  private readonly runtimes = new Set<Runtime>();
  private readonly log: Logger;

  constructor(
    private readonly server: net.Server,
    readonly path: string,
    private readonly dispatcher: Dispatcher,
    private readonly options: UdsOptions = {},
  ) {
    this.log = (options.logger ?? createLogger()).child("uds");
    server.on("connection", (socket) => this.accept(socket));
    server.on("error", (err) => {
      this.log.error("listener failed", { path, ...errorFields(err) });
    });
  }

  /** Connections currently open. */
  get connections(): number {
    return this.runtimes.size;
  }

  private accept(socket: net.Socket): void {
    const runtime = new Runtime(new SocketStream(socket), {
      ...this.options,
      dispatcher: this.dispatcher,
    });
    this.runtimes.add(runtime);
    this.log.debug("connection accepted", { path: this.path, connections: this.runtimes.size });

    runtime
      .run()
      .then((reason) => {
        this.log.debug("connection closed", reason ? errorFields(reason) : { reason: "clean" });
      })
      .catch((e: unknown) => {
        this.log.error("connection failed", errorFields(e));
      })
      .finally(() => {
        this.runtimes.delete(runtime);
      });
  }

  /** Say goodbye on every connection, then stop listening. */
  async close(): Promise<void> {
    await Promise.all([...this.runtimes].map((runtime) => runtime.close("server shutting down")));
    await new Promise<void>((resolve, reject) => {
      this.server.close((err) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }
}

/**
 * Listen on a socket path. The dispatcher is frozen before the first
 * connection is accepted.
 */
export function listen(
  path: string,
  dispatcher: Dispatcher,
  options: UdsOptions = {},
): Promise<UdsServer> {
  dispatcher.freeze();
  const server = net.createServer();
  const uds = new UdsServer(server, path, dispatcher, options);
  return new Promise((resolve, reject) => {
    server.once("error", reject);
    server.listen(path, () => {
      server.off("error", reject);
      resolve(uds);
    });
  });
}
