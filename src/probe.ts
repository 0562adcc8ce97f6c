/**
 * Command-line front end: flag parsing and one probe run.
 *
 * Kept apart from `cli.ts` so the whole run can be exercised with a fake
 * transport and captured output.
 */

import { parseArgs } from "node:util";

import { loadConfig } from "./config.js";
import { Connection } from "./connection.js";
import { ConfigError, describeError } from "./errors.js";
import { MessageLog, type TraceOutput } from "./message-log.js";
import type { NodeTransportOptions } from "./transport.js";
import type { Transport } from "./types.js";

export const USAGE = `Usage: pgwire-probe [options]

Connects to a Postgres server over TLS, logs in with a cleartext password,
runs one query and exits once the server is idle again.

Connection settings come from HOST, PORT, USER, DATABASE and PASSWORD.

Options:
  -h, --host <host>        override HOST
  -p, --port <port>        override PORT
  -U, --user <user>        override USER
  -d, --database <name>    override DATABASE
  -c, --query <sql>        query to run (default: SELECT * FROM my_table LIMIT 3;)
      --ca-file <path>     PEM bundle to verify the server with (PGPROBE_CA_FILE)
      --insecure           skip certificate verification (PGPROBE_TLS_INSECURE=1)
      --timeout <ms>       idle socket timeout (PGPROBE_TIMEOUT_MS)
  -q, --quiet              do not trace messages
      --help               show this help
`;

export interface ProbeArgs {
  /** Values that take precedence over the environment, keyed by variable. */
  overrides: Record<string, string>;
  query?: string;
  quiet: boolean;
  help: boolean;
}

export interface ProbeDependencies {
  env: Record<string, string | undefined>;
  stdout: TraceOutput;
  stderr: TraceOutput;
  createTransport(options: NodeTransportOptions): Transport;
  readFile(path: string): Promise<string>;
}

/**
 * Parse command-line flags.
 *
 * @throws {ConfigError} on an unknown flag or a missing flag value
 */
export function parseProbeArgs(argv: string[]): ProbeArgs {
  let parsed: ReturnType<typeof parseFlags>;
  try {
    parsed = parseFlags(argv);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigError([message], { cause: err });
  }

  const { values } = parsed;
  const overrides: Record<string, string> = {};
  const mapped: Array<[string, string | undefined]> = [
    ["HOST", values.host],
    ["PORT", values.port],
    ["USER", values.user],
    ["DATABASE", values.database],
    ["PGPROBE_CA_FILE", values["ca-file"]],
    ["PGPROBE_TIMEOUT_MS", values.timeout],
  ];
  for (const [name, value] of mapped) {
    if (value !== undefined) overrides[name] = value;
  }
  if (values.insecure) overrides.PGPROBE_TLS_INSECURE = "1";

  return {
    overrides,
    query: values.query,
    quiet: values.quiet ?? false,
    help: values.help ?? false,
  };
}

function parseFlags(argv: string[]) {
  return parseArgs({
    args: argv,
    options: {
      host: { type: "string", short: "h" },
      port: { type: "string", short: "p" },
      user: { type: "string", short: "U" },
      database: { type: "string", short: "d" },
      query: { type: "string", short: "c" },
      "ca-file": { type: "string" },
      insecure: { type: "boolean", default: false },
      timeout: { type: "string" },
      quiet: { type: "boolean", short: "q", default: false },
      help: { type: "boolean", default: false },
    },
    allowPositionals: false,
    strict: true,
  });
}

/**
 * Run one probe session and return the process exit status.
 *
 * Failures are reported as a single `Error: ...` line on stderr.
 */
export async function runProbe(argv: string[], deps: ProbeDependencies): Promise<number> {
  try {
    const args = parseProbeArgs(argv);
    if (args.help) {
      deps.stdout.write(USAGE);
      return 0;
    }

    const { config, transport } = loadConfig({ ...deps.env, ...args.overrides });
    const ca = transport.caFile === undefined ? undefined : await readCaFile(deps, transport.caFile);

    const connection = new Connection(
      config,
      deps.createTransport({
        rejectUnauthorized: transport.rejectUnauthorized,
        ca,
        timeoutMs: transport.timeoutMs,
      }),
      {
        query: args.query,
        log: new MessageLog(args.quiet ? null : deps.stdout),
      },
    );
    await connection.run();
    return 0;
  } catch (err) {
    deps.stderr.write(`Error: ${describeError(err)}\n`);
    return 1;
  }
}

async function readCaFile(deps: ProbeDependencies, path: string): Promise<string> {
  try {
    return await deps.readFile(path);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigError([`PGPROBE_CA_FILE cannot be read: ${message}`], { cause: err });
  }
}
