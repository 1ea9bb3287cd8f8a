#!/usr/bin/env node
/**
 * envkit CLI - Build and rebuild declarative package environments
 */

import { run } from "./main.js";
import { errorMessage } from "./errors.js";

run(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error("Error:", errorMessage(error));
    process.exit(1);
  });
