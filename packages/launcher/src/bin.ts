#!/usr/bin/env -S node --import tsx

import { getErrorMessage } from "@cubelaunch/errors";
import { run } from "./cli.js";

run(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error("Fatal:", getErrorMessage(error));
    process.exitCode = 1;
  },
);
