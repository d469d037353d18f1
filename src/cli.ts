#!/usr/bin/env node
import { createProgram } from "./commands/program.js";
import { createDefaultEnvironment } from "./commands/runtime.js";
import { errorMessage } from "./domain/coded-error.js";

createProgram(createDefaultEnvironment())
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    console.error(errorMessage(error));
    process.exitCode = 1;
  });
