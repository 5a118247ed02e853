#!/usr/bin/env node
import { run } from "./cli";
import { ConfigError } from "./utils/error-handling";

run(process.argv.slice(2)).catch((error: unknown) => {
  if (error instanceof ConfigError) {
    console.error(error.message);
  } else {
    console.error(error);
  }
  process.exitCode = 1;
});
