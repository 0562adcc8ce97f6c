/**
 * pgwire-probe: a minimal Postgres wire protocol client.
 *
 * Exposes the message codec, the handshake driver and the Node.js TLS
 * transport it runs on.
 *
 * @example
 * ```typescript
 * const connection = new Connection(
 *   { host: "db.internal", port: 5432, user: "app", database: "app", password: "test-secret" },
 *   new NodeTransport(),
 *   { query: "SELECT 1;" },
 * );
 * await connection.run();
 * ```
 */

export {
  encodeFrontendMessage,
  encodeRequestSSL,
  encodeStartup,
  encodePasswordMessage,
  encodeSimpleQuery,
  readBackendMessage,
  decodeBackendMessage,
  errorFieldFromCode,
  cstring,
  frame,
  u16,
  u32,
} from "./pg-wire.js";
export { Connection, DEFAULT_QUERY } from "./connection.js";
export type { ConnectionOptions, ConnectionPhase } from "./connection.js";
export { MessageLog, formatBackendMessage, formatFrontendMessage } from "./message-log.js";
export type { TraceOutput } from "./message-log.js";
export { NodeTransport } from "./transport.js";
export type { NodeTransportOptions } from "./transport.js";
export { SocketByteStream } from "./socket-stream.js";
export { loadConfig } from "./config.js";
export type { ProbeSettings, TransportSettings } from "./config.js";
export {
  PgProbeError,
  IoError,
  ParseError,
  TlsHandshakeError,
  TlsError,
  ProtocolViolationError,
  ConfigError,
  describeError,
} from "./errors.js";
export type { ErrorKind } from "./errors.js";
export {
  BackendMessageType,
  ErrorField,
  FrontendMessageType,
  ReadyForQueryStatus,
} from "./types.js";
export type {
  BackendMessage,
  ByteStream,
  Config,
  ErrorFieldKey,
  FrontendMessage,
  Transport,
} from "./types.js";
