/**
 * Message, configuration and transport types.
 *
 * Frontend and backend messages are discriminated unions keyed by `type`.
 * They are plain values: built right before one encode or decode and
 * dropped afterwards.
 */

// ── Frontend (Client → Server) Messages ──────────────────────────────────────

export enum FrontendMessageType {
  RequestSSL = "RequestSSL",
  StartupMessage = "StartupMessage",
  PasswordMessage = "PasswordMessage",
  SimpleQuery = "SimpleQuery",
}

export interface RequestSSLMessage {
  type: FrontendMessageType.RequestSSL;
}

export interface StartupMessage {
  type: FrontendMessageType.StartupMessage;
  user: string;
  database: string;
}

export interface PasswordMessage {
  type: FrontendMessageType.PasswordMessage;
  password: string;
}

export interface SimpleQueryMessage {
  type: FrontendMessageType.SimpleQuery;
  query: string;
}

export type FrontendMessage =
  | RequestSSLMessage
  | StartupMessage
  | PasswordMessage
  | SimpleQueryMessage;

// ── Backend (Server → Client) Messages ───────────────────────────────────────

export enum BackendMessageType {
  AuthenticationOk = "AuthenticationOk",
  AuthenticationCleartextPassword = "AuthenticationCleartextPassword",
  AuthenticationSasl = "AuthenticationSasl",
  ErrorResponse = "ErrorResponse",
  BackendKeyData = "BackendKeyData",
  ReadyForQuery = "ReadyForQuery",
  ParameterStatus = "ParameterStatus",
  Unknown = "Unknown",
}

export enum ReadyForQueryStatus {
  Idle = "Idle",
  Transaction = "Transaction",
  FailedTransaction = "FailedTransaction",
}

/**
 * Fields of an ErrorResponse, keyed by the single-character code that
 * precedes each record on the wire.
 */
export enum ErrorField {
  LocalizedSeverity = "LocalizedSeverity",
  Severity = "Severity",
  Code = "Code",
  Message = "Message",
  Detail = "Detail",
  Hint = "Hint",
  Position = "Position",
  InternalPosition = "InternalPosition",
  InternalQuery = "InternalQuery",
  Where = "Where",
  SchemaName = "SchemaName",
  TableName = "TableName",
  ColumnName = "ColumnName",
  DataTypeName = "DataTypeName",
  ConstraintName = "ConstraintName",
  File = "File",
  Line = "Line",
  Routine = "Routine",
}

/** A known field, or `Unknown(<code>)` for a code outside the known set. */
export type ErrorFieldKey = ErrorField | `Unknown(${string})`;

export interface AuthenticationOkMessage {
  type: BackendMessageType.AuthenticationOk;
}

export interface AuthenticationCleartextPasswordMessage {
  type: BackendMessageType.AuthenticationCleartextPassword;
}

export interface AuthenticationSaslMessage {
  type: BackendMessageType.AuthenticationSasl;
  mechanisms: string[];
}

export interface ErrorResponseMessage {
  type: BackendMessageType.ErrorResponse;
  fields: Map<ErrorFieldKey, string>;
}

export interface BackendKeyDataMessage {
  type: BackendMessageType.BackendKeyData;
  processId: number;
  secretKey: number;
}

export interface ReadyForQueryMessage {
  type: BackendMessageType.ReadyForQuery;
  status: ReadyForQueryStatus;
}

export interface ParameterStatusMessage {
  type: BackendMessageType.ParameterStatus;
  name: string;
  value: string;
}

export interface UnknownMessage {
  type: BackendMessageType.Unknown;
  prefix: string;
  payload: Uint8Array;
}

export type BackendMessage =
  | AuthenticationOkMessage
  | AuthenticationCleartextPasswordMessage
  | AuthenticationSaslMessage
  | ErrorResponseMessage
  | BackendKeyDataMessage
  | ReadyForQueryMessage
  | ParameterStatusMessage
  | UnknownMessage;

// ── Connection ───────────────────────────────────────────────────────────────

export interface Config {
  host: string;
  port: number;
  user: string;
  database: string;
  password: string;
}

/**
 * A bidirectional byte stream owned by one connection.
 *
 * `readExact` resolves with exactly `length` bytes, or rejects when the
 * stream fails or the peer closes before that many bytes arrived.
 */
export interface ByteStream {
  write(data: Uint8Array): Promise<void>;
  readExact(length: number): Promise<Uint8Array>;
}

/**
 * Opens the plaintext connection and upgrades it to TLS in place.
 *
 * In production this is `NodeTransport`; tests use an in-process
 * scripted server.
 */
export interface Transport {
  connect(address: { host: string; port: number }): Promise<ByteStream>;
  upgradeToTls(servername: string): Promise<ByteStream>;
  close(): void;
}
