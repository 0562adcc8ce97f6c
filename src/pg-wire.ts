/**
 * Postgres wire protocol encoder/decoder.
 *
 * Encodes the four frontend (client → server) messages this client sends
 * and decodes backend (server → client) messages from a ByteStream.
 *
 * Frames look like `[tag][int32 length][payload]`, where `length` counts
 * itself plus the payload. Startup-phase messages carry no tag.
 *
 * Reference: https://www.postgresql.org/docs/current/protocol-message-formats.html
 */

import { ParseError } from "./errors.js";
import {
  BackendMessageType,
  ErrorField,
  FrontendMessageType,
  ReadyForQueryStatus,
  type BackendMessage,
  type ByteStream,
  type ErrorFieldKey,
  type FrontendMessage,
} from "./types.js";

// ── Constants ────────────────────────────────────────────────────────────────

export const TAG = {
  // Frontend
  PASSWORD: 0x70, // 'p'
  QUERY: 0x51, // 'Q'

  // Backend
  AUTHENTICATION: 0x52, // 'R'
  ERROR_RESPONSE: 0x45, // 'E'
  BACKEND_KEY_DATA: 0x4b, // 'K'
  READY_FOR_QUERY: 0x5a, // 'Z'
  PARAMETER_STATUS: 0x53, // 'S'
} as const;

/** SSLRequest code 80877103, sent as two 16-bit halves. */
export const SSL_REQUEST_CODE = [1234, 5679] as const;

export const PROTOCOL_VERSION = { major: 3, minor: 0 } as const;

export const AUTH_OK = 0;
export const AUTH_CLEARTEXT_PASSWORD = 3;
export const AUTH_SASL = 10;

/** Single byte a server sends in reply to SSLRequest when it accepts TLS. */
export const SSL_ACCEPTED = 0x53; // 'S'

const HEADER_LENGTH = 4;

const ERROR_FIELD_CODES: ReadonlyMap<string, ErrorField> = new Map([
  ["S", ErrorField.LocalizedSeverity],
  ["V", ErrorField.Severity],
  ["C", ErrorField.Code],
  ["M", ErrorField.Message],
  ["D", ErrorField.Detail],
  ["H", ErrorField.Hint],
  ["P", ErrorField.Position],
  ["p", ErrorField.InternalPosition],
  ["q", ErrorField.InternalQuery],
  ["W", ErrorField.Where],
  ["s", ErrorField.SchemaName],
  ["t", ErrorField.TableName],
  ["c", ErrorField.ColumnName],
  ["d", ErrorField.DataTypeName],
  ["n", ErrorField.ConstraintName],
  ["F", ErrorField.File],
  ["L", ErrorField.Line],
  ["R", ErrorField.Routine],
]);

// ── Text Encoder/Decoder ─────────────────────────────────────────────────────

const encoder = new TextEncoder();
const decoder = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true });

// ── Field Encoding ───────────────────────────────────────────────────────────

/** Big-endian unsigned 16-bit integer. */
export function u16(value: number): Uint8Array {
  const buf = new Uint8Array(2);
  new DataView(buf.buffer).setUint16(0, value);
  return buf;
}

/** Big-endian unsigned 32-bit integer. */
export function u32(value: number): Uint8Array {
  const buf = new Uint8Array(4);
  new DataView(buf.buffer).setUint32(0, value);
  return buf;
}

/** UTF-8 bytes followed by a single NUL. */
export function cstring(value: string): Uint8Array {
  const bytes = encoder.encode(value);
  const buf = new Uint8Array(bytes.byteLength + 1);
  buf.set(bytes, 0);
  return buf;
}

/**
 * Assemble a frame from its payload parts.
 *
 * The length field is derived from the concatenated payload, so it always
 * matches what is actually written. Pass `null` as the tag for
 * startup-phase messages.
 */
export function frame(tag: number | null, parts: Uint8Array[]): Uint8Array {
  const payloadLength = parts.reduce((sum, p) => sum + p.byteLength, 0);
  const tagLength = tag === null ? 0 : 1;
  const buf = new Uint8Array(tagLength + HEADER_LENGTH + payloadLength);

  if (tag !== null) buf[0] = tag;
  new DataView(buf.buffer).setUint32(tagLength, payloadLength + HEADER_LENGTH);

  let offset = tagLength + HEADER_LENGTH;
  for (const part of parts) {
    buf.set(part, offset);
    offset += part.byteLength;
  }
  return buf;
}

// ── Frontend (Client → Server) Encoding ──────────────────────────────────────

/**
 * Encode an SSLRequest (no type byte).
 *
 * Format: int32 length, int16 1234, int16 5679, \0
 */
export function encodeRequestSSL(): Uint8Array {
  return frame(null, [u16(SSL_REQUEST_CODE[0]), u16(SSL_REQUEST_CODE[1]), cstring("")]);
}

/**
 * Encode a StartupMessage (no type byte).
 *
 * Format: int32 length, int16 major(3), int16 minor(0), key/value pairs, \0
 */
export function encodeStartup(user: string, database: string): Uint8Array {
  return frame(null, [
    u16(PROTOCOL_VERSION.major),
    u16(PROTOCOL_VERSION.minor),
    cstring("user"),
    cstring(user),
    cstring("database"),
    cstring(database),
    cstring(""),
  ]);
}

/** Cleartext password reply to AuthenticationCleartextPassword. */
export function encodePasswordMessage(password: string): Uint8Array {
  return frame(TAG.PASSWORD, [cstring(password)]);
}

/** One query string, run by the server under the simple query protocol. */
export function encodeSimpleQuery(query: string): Uint8Array {
  return frame(TAG.QUERY, [cstring(query)]);
}

export function encodeFrontendMessage(message: FrontendMessage): Uint8Array {
  switch (message.type) {
    case FrontendMessageType.RequestSSL:
      return encodeRequestSSL();
    case FrontendMessageType.StartupMessage:
      return encodeStartup(message.user, message.database);
    case FrontendMessageType.PasswordMessage:
      return encodePasswordMessage(message.password);
    case FrontendMessageType.SimpleQuery:
      return encodeSimpleQuery(message.query);
  }
}

// ── Backend (Server → Client) Decoding ───────────────────────────────────────

/**
 * Read exactly one backend message from the stream.
 *
 * Reads one tag byte, the 4-byte length, then `length - 4` payload bytes.
 * A short read surfaces as the stream's own error; a malformed body as
 * {@link ParseError}.
 */
export async function readBackendMessage(stream: ByteStream): Promise<BackendMessage> {
  const tag = (await stream.readExact(1))[0];
  const lengthBytes = await stream.readExact(4);
  const length = new DataView(
    lengthBytes.buffer,
    lengthBytes.byteOffset,
    lengthBytes.byteLength,
  ).getUint32(0);

  if (length < HEADER_LENGTH) {
    throw new ParseError(
      `message '${String.fromCharCode(tag)}' declares length ${length}, shorter than its ${HEADER_LENGTH}-byte header`,
    );
  }

  const payload = await stream.readExact(length - HEADER_LENGTH);
  return decodeBackendMessage(tag, length, payload);
}

/**
 * Classify one backend frame.
 *
 * A pure function of `(tag, length, payload)`. Tags and shapes this client
 * does not handle come back as an Unknown message rather than an error.
 */
export function decodeBackendMessage(
  tag: number,
  length: number,
  payload: Uint8Array,
): BackendMessage {
  switch (tag) {
    case TAG.AUTHENTICATION:
      return decodeAuthentication(tag, length, payload);
    case TAG.ERROR_RESPONSE:
      return decodeErrorResponse(payload);
    case TAG.BACKEND_KEY_DATA:
      if (length === 12) return decodeBackendKeyData(payload);
      break;
    case TAG.READY_FOR_QUERY:
      if (length === 5) return decodeReadyForQuery(payload);
      break;
    case TAG.PARAMETER_STATUS:
      return decodeParameterStatus(payload);
  }
  return unknownMessage(tag, payload);
}

/** Map an error record's leading character to its field. */
export function errorFieldFromCode(code: string): ErrorFieldKey {
  return ERROR_FIELD_CODES.get(code) ?? `Unknown(${code})`;
}

function decodeAuthentication(tag: number, length: number, payload: Uint8Array): BackendMessage {
  if (payload.byteLength < 4) return unknownMessage(tag, payload);

  const authType = readUint32(payload, 0);

  if (length === 8 && authType === AUTH_CLEARTEXT_PASSWORD) {
    return { type: BackendMessageType.AuthenticationCleartextPassword };
  }
  if (length === 8 && authType === AUTH_OK) {
    return { type: BackendMessageType.AuthenticationOk };
  }
  if (authType === AUTH_SASL) {
    // mechanism names, each NUL-terminated, then a final NUL
    if (payload.byteLength < 5) {
      throw new ParseError("SASL mechanism list is missing its terminator");
    }
    if (payload.byteLength === 5) {
      if (payload[4] !== 0) {
        throw new ParseError("SASL mechanism list is missing its terminator");
      }
      return { type: BackendMessageType.AuthenticationSasl, mechanisms: [] };
    }
    const list = decodeText(payload.subarray(4, payload.byteLength - 2), "SASL mechanism list");
    return {
      type: BackendMessageType.AuthenticationSasl,
      mechanisms: list === "" ? [] : list.split("\0"),
    };
  }
  return unknownMessage(tag, payload);
}

function decodeErrorResponse(payload: Uint8Array): BackendMessage {
  if (payload.byteLength < 2) {
    throw new ParseError("ErrorResponse is missing its terminators");
  }

  const fields = new Map<ErrorFieldKey, string>();
  const records = decodeText(payload.subarray(0, payload.byteLength - 2), "ErrorResponse");

  for (const record of records.split("\0")) {
    const code = record.length > 0 ? String.fromCodePoint(record.codePointAt(0) ?? 0) : "\0";
    fields.set(errorFieldFromCode(code), record.slice(code.length));
  }

  return { type: BackendMessageType.ErrorResponse, fields };
}

function decodeBackendKeyData(payload: Uint8Array): BackendMessage {
  const view = new DataView(payload.buffer, payload.byteOffset, payload.byteLength);
  return {
    type: BackendMessageType.BackendKeyData,
    processId: view.getUint32(0),
    secretKey: view.getInt32(4),
  };
}

function decodeReadyForQuery(payload: Uint8Array): BackendMessage {
  const byte = payload[0];
  switch (byte) {
    case 0x49: // 'I'
      return { type: BackendMessageType.ReadyForQuery, status: ReadyForQueryStatus.Idle };
    case 0x54: // 'T'
      return { type: BackendMessageType.ReadyForQuery, status: ReadyForQueryStatus.Transaction };
    case 0x45: // 'E'
      return {
        type: BackendMessageType.ReadyForQuery,
        status: ReadyForQueryStatus.FailedTransaction,
      };
    default:
      throw new ParseError(`invalid ReadyForQuery status byte 0x${hexByte(byte)}`);
  }
}

function decodeParameterStatus(payload: Uint8Array): BackendMessage {
  const separator = payload.indexOf(0);
  if (separator === -1) {
    throw new ParseError("ParameterStatus name is not NUL-terminated");
  }
  if (separator === payload.byteLength - 1) {
    throw new ParseError("ParameterStatus is missing its value");
  }

  return {
    type: BackendMessageType.ParameterStatus,
    name: decodeText(payload.subarray(0, separator), "ParameterStatus name"),
    value: decodeText(
      payload.subarray(separator + 1, payload.byteLength - 1),
      "ParameterStatus value",
    ),
  };
}

function unknownMessage(tag: number, payload: Uint8Array): BackendMessage {
  return {
    type: BackendMessageType.Unknown,
    prefix: String.fromCharCode(tag),
    payload,
  };
}

// ── Utility ──────────────────────────────────────────────────────────────────

function readUint32(bytes: Uint8Array, offset: number): number {
  return new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength).getUint32(offset);
}

function decodeText(bytes: Uint8Array, what: string): string {
  try {
    return decoder.decode(bytes);
  } catch (err) {
    throw new ParseError(`${what} is not valid UTF-8`, { cause: err });
  }
}

function hexByte(byte: number): string {
  return byte.toString(16).padStart(2, "0");
}
