#!/usr/bin/env node
import { runCli } from "./commands.js";
import { errorMessage } from "./errors.js";

runCli(process.argv.slice(2), {
  env: process.env,
  out: (line) => console.log(line),
  err: (line) => console.error(line),
})
  .then((code) => process.exit(code))
  .catch((err: unknown) => {
    console.error(`Unexpected error: ${errorMessage(err)}`);
    process.exit(1);
  });
