#!/usr/bin/env node
/**
 * CLI entry point for `pgwire-probe`.
 *
 * Usage:
 *   HOST=db.internal PORT=5432 USER=app DATABASE=app PASSWORD=... pgwire-probe [--query <sql>]
 *
 * Exits 0 once the server is idle after the query, 1 on any failure.
 */

import { readFile } from "node:fs/promises";

import { runProbe } from "./probe.js";
import { NodeTransport } from "./transport.js";

process.exitCode = await runProbe(process.argv.slice(2), {
  env: process.env,
  stdout: process.stdout,
  stderr: process.stderr,
  createTransport: (options) => new NodeTransport(options),
  readFile: (path) => readFile(path, "utf8"),
});
