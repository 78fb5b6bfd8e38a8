// Call the Echo service over a Unix domain socket.
//
//   DEBUG=hasten:rpc npm run echo:client -- /tmp/echo.sock

import { RpcError, loggingMiddleware } from "@hasten/core";
import { connect } from "@hasten/uds";
import { EchoClient } from "./echo_service.ts";

const path = process.argv[2] ?? process.env.HASTEN_SOCKET ?? "/tmp/hasten-echo.sock";

const runtime = await connect(path);
const client = new EchoClient(runtime.asCaller().with(loggingMiddleware()));

try {
  console.log(await client.echo("hello"));
  console.log(await client.greet({ name: "reader", times: 3 }));
  await client.greet({ name: "reader", times: 100 });
} catch (e) {
  if (!(e instanceof RpcError)) throw e;
  console.log(`greet failed as expected: ${e.kind} ${e.code}: ${e.message}`);
} finally {
  await runtime.close();
}
