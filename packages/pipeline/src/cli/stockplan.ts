#!/usr/bin/env node
// packages/pipeline/src/cli/stockplan.ts
/* eslint-disable no-console */

import { runCli } from "./commands.js";

runCli(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((e: unknown) => {
    console.error(e);
    process.exit(1);
  });
