// Serve the Echo service on a Unix domain socket.
//
//   DEBUG=hasten:* npm run echo:server -- /tmp/echo.sock

import { Dispatcher, resolveRuntimeConfig, runtimeConfigFromEnv } from "@hasten/core";
import { listen } from "@hasten/uds";
import { echoHandler } from "./echo_handler.ts";
import { registerEcho } from "./echo_service.ts";

const path = process.argv[2] ?? process.env.HASTEN_SOCKET ?? "/tmp/hasten-echo.sock";
const config = resolveRuntimeConfig(runtimeConfigFromEnv());

const server = await listen(path, registerEcho(new Dispatcher(), echoHandler), { config });
console.log(`echo server listening on ${path}`);

process.once("SIGINT", () => {
  server.close().then(
    () => console.log("echo server stopped"),
    (e: unknown) => {
      console.error("echo server did not stop cleanly", e);
      process.exitCode = 1;
    },
  );
});
