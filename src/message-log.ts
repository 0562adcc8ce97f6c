/**
 * Direction-tagged message trace.
 *
 * Each message is written as one line before the driver acts on it:
 * `--> ` for messages sent, `<-- ` for messages received.
 */

import {
  BackendMessageType,
  FrontendMessageType,
  type BackendMessage,
  type FrontendMessage,
} from "./types.js";

export interface TraceOutput {
  write(line: string): unknown;
}

export class MessageLog {
  private readonly out: TraceOutput | null;

  /** Pass `null` to trace nothing. */
  constructor(out: TraceOutput | null = process.stdout) {
    this.out = out;
  }

  sent(message: FrontendMessage): void {
    this.line(`--> ${formatFrontendMessage(message)}`);
  }

  received(message: BackendMessage): void {
    this.line(`<-- ${formatBackendMessage(message)}`);
  }

  /** The single unframed byte a server answers SSLRequest with. */
  sslResponse(byte: number): void {
    this.line(`<-- SSLResponse(${formatChar(byte)})`);
  }

  private line(text: string): void {
    this.out?.write(`${text}\n`);
  }
}

export function formatFrontendMessage(message: FrontendMessage): string {
  switch (message.type) {
    case FrontendMessageType.RequestSSL:
      return message.type;
    case FrontendMessageType.StartupMessage:
      return formatFields(message.type, [
        ["user", JSON.stringify(message.user)],
        ["database", JSON.stringify(message.database)],
      ]);
    case FrontendMessageType.PasswordMessage:
      return formatFields(message.type, [["password", '"***"']]);
    case FrontendMessageType.SimpleQuery:
      return formatFields(message.type, [["query", JSON.stringify(message.query)]]);
  }
}

export function formatBackendMessage(message: BackendMessage): string {
  switch (message.type) {
    case BackendMessageType.AuthenticationOk:
    case BackendMessageType.AuthenticationCleartextPassword:
      return message.type;
    case BackendMessageType.AuthenticationSasl:
      return formatFields(message.type, [["mechanisms", JSON.stringify(message.mechanisms)]]);
    case BackendMessageType.ErrorResponse:
      return formatFields(
        message.type,
        [...message.fields].map(([field, value]): [string, string] => [
          field,
          JSON.stringify(value),
        ]),
      );
    case BackendMessageType.BackendKeyData:
      return formatFields(message.type, [
        ["processId", String(message.processId)],
        ["secretKey", String(message.secretKey)],
      ]);
    case BackendMessageType.ReadyForQuery:
      return formatFields(message.type, [["status", message.status]]);
    case BackendMessageType.ParameterStatus:
      return formatFields(message.type, [
        ["name", JSON.stringify(message.name)],
        ["value", JSON.stringify(message.value)],
      ]);
    case BackendMessageType.Unknown:
      return formatFields(message.type, [
        ["prefix", JSON.stringify(message.prefix)],
        ["payload", `[${Array.from(message.payload, hexByte).join(" ")}]`],
      ]);
  }
}

function formatFields(name: string, fields: Array<[string, string]>): string {
  if (fields.length === 0) return name;
  return `${name} { ${fields.map(([key, value]) => `${key}: ${value}`).join(", ")} }`;
}

function formatChar(byte: number): string {
  // printable ASCII as a quoted character, everything else as hex
  return byte >= 0x20 && byte < 0x7f ? `'${String.fromCharCode(byte)}'` : `0x${hexByte(byte)}`;
}

function hexByte(byte: number): string {
  return byte.toString(16).padStart(2, "0");
}
