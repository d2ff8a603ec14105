#!/usr/bin/env node
import { errorMessage } from "@ali/core";

import { runCli } from "./program.js";

try {
  process.exitCode = await runCli(process.argv.slice(2), {
    stdout: (line) => process.stdout.write(`${line}\n`),
    stderr: (line) => process.stderr.write(`${line}\n`),
    env: process.env,
    cwd: process.cwd(),
  });
} catch (error) {
  process.stderr.write(`ali: ${errorMessage(error)}\n`);
  process.exitCode = 1;
}
