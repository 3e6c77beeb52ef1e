#!/usr/bin/env node
// Process entry point: wires runCli to argv and the exit code.

import { hideBin } from "yargs/helpers";
import { defaultIo, runCli } from "./cli";

runCli(hideBin(process.argv), defaultIo).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error("[logex] Unexpected error:", error);
    process.exitCode = 1;
  }
);
