// Echo service implementation shared by the server and the tests.

import { err, ok } from "@hasten/core";
import { EchoErrorCode, type EchoHandler } from "./echo_service.ts";

const MAX_GREETINGS = 10;

export const echoHandler: EchoHandler = {
  echo(message) {
    return ok(message);
  },

  greet({ name, times }) {
    if (times > MAX_GREETINGS) {
      return err(EchoErrorCode.TooMany, `at most ${MAX_GREETINGS} greetings, asked for ${times}`);
    }
    return ok(Array.from({ length: times }, (_, i) => `hello #${i + 1}, ${name}`));
  },
};
