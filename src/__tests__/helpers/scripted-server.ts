/**
 * ScriptedServer: an in-process Transport that plays the Postgres server.
 *
 * Classifies every frame the client writes, records it, and queues the
 * scripted reply for that kind of message on the client's read side.
 * The first two frames are startup-phase (untagged); every later frame
 * is tagged.
 */

import { IoError } from "../../errors.js";
import { FrontendMessageType, type ByteStream, type Transport } from "../../types.js";

const TEXT_ENCODER = new TextEncoder();

// ── Backend Message Builders ────────────────────────────────────────────────

export function buildBackendMessage(tag: string, payload: Uint8Array | number[]): Uint8Array {
  const body = payload instanceof Uint8Array ? payload : new Uint8Array(payload);
  const length = 4 + body.length;
  const buf = new ArrayBuffer(1 + length);
  const view = new DataView(buf);
  view.setUint8(0, tag.charCodeAt(0));
  view.setInt32(1, length);
  new Uint8Array(buf).set(body, 5);
  return new Uint8Array(buf);
}

export function buildAuthOk(): Uint8Array {
  return buildBackendMessage("R", [0, 0, 0, 0]);
}

export function buildAuthCleartextPassword(): Uint8Array {
  return buildBackendMessage("R", [0, 0, 0, 3]);
}

export function buildAuthSasl(mechanisms: string[]): Uint8Array {
  const names = TEXT_ENCODER.encode(mechanisms.map((m) => `${m}\0`).join("") + "\0");
  return buildBackendMessage("R", [0, 0, 0, 10, ...names]);
}

export function buildReadyForQuery(status = "I"): Uint8Array {
  return buildBackendMessage("Z", [status.charCodeAt(0)]);
}

export function buildParameterStatus(name: string, value: string): Uint8Array {
  return buildBackendMessage("S", TEXT_ENCODER.encode(`${name}\0${value}\0`));
}

export function buildBackendKeyData(processId: number, secretKey: number): Uint8Array {
  const buf = new ArrayBuffer(8);
  const view = new DataView(buf);
  view.setUint32(0, processId);
  view.setInt32(4, secretKey);
  return buildBackendMessage("K", new Uint8Array(buf));
}

export function buildErrorResponse(records: Array<[string, string]>): Uint8Array {
  const body = records.map(([code, value]) => `${code}${value}\0`).join("") + "\0";
  return buildBackendMessage("E", TEXT_ENCODER.encode(body));
}

export function concatBytes(...parts: Uint8Array[]): Uint8Array {
  const total = parts.reduce((sum, p) => sum + p.byteLength, 0);
  const out = new Uint8Array(total);
  let offset = 0;
  for (const p of parts) {
    out.set(p, offset);
    offset += p.byteLength;
  }
  return out;
}

// ── In-Memory Stream ────────────────────────────────────────────────────────

/**
 * A ByteStream whose read side is fed by the test. Reads never wait: a
 * read past the queued bytes fails the way a closed socket would.
 */
export class MemoryStream implements ByteStream {
  readonly writes: Uint8Array[] = [];
  private inbound: Uint8Array = new Uint8Array(0);
  private readonly onWrite: (data: Uint8Array) => void;

  constructor(onWrite: (data: Uint8Array) => void = () => undefined) {
    this.onWrite = onWrite;
  }

  enqueue(...chunks: Uint8Array[]): void {
    this.inbound = concatBytes(this.inbound, ...chunks);
  }

  get remaining(): number {
    return this.inbound.byteLength;
  }

  async write(data: Uint8Array): Promise<void> {
    this.writes.push(new Uint8Array(data));
    this.onWrite(data);
  }

  async readExact(length: number): Promise<Uint8Array> {
    if (this.inbound.byteLength < length) {
      throw new IoError("connection closed by server");
    }
    const bytes = this.inbound.slice(0, length);
    this.inbound = this.inbound.slice(length);
    return bytes;
  }
}

// ── Scripted Server ─────────────────────────────────────────────────────────

export interface ScriptedServerOptions {
  /** Byte sent in reply to SSLRequest. Defaults to 'S'. */
  sslResponse?: string;
  /** Replies queued after each kind of frontend message. */
  replies?: Partial<Record<FrontendMessageType, Uint8Array[]>>;
  /** Makes `upgradeToTls` reject with this error. */
  tlsFailure?: Error;
}

export class ScriptedServer implements Transport {
  /** Kinds of frontend message received, in order. */
  readonly received: FrontendMessageType[] = [];
  /** Raw frames received, in order. */
  readonly frames: Uint8Array[] = [];
  connectedTo: { host: string; port: number } | null = null;
  tlsServername: string | null = null;
  closed = 0;

  private readonly options: ScriptedServerOptions;
  private active: MemoryStream | null = null;

  constructor(options: ScriptedServerOptions = {}) {
    this.options = options;
  }

  async connect(address: { host: string; port: number }): Promise<ByteStream> {
    this.connectedTo = address;
    this.active = new MemoryStream((data) => this.handle(data));
    return this.active;
  }

  async upgradeToTls(servername: string): Promise<ByteStream> {
    this.tlsServername = servername;
    if (this.options.tlsFailure) {
      throw this.options.tlsFailure;
    }
    this.active = new MemoryStream((data) => this.handle(data));
    return this.active;
  }

  close(): void {
    this.closed++;
  }

  private handle(data: Uint8Array): void {
    const kind = this.classify(data);
    this.received.push(kind);
    this.frames.push(new Uint8Array(data));

    const stream = this.active;
    if (stream === null) return;

    if (kind === FrontendMessageType.RequestSSL) {
      stream.enqueue(TEXT_ENCODER.encode(this.options.sslResponse ?? "S"));
    }
    stream.enqueue(...(this.options.replies?.[kind] ?? []));
  }

  private classify(data: Uint8Array): FrontendMessageType {
    switch (this.frames.length) {
      case 0:
        return FrontendMessageType.RequestSSL;
      case 1:
        return FrontendMessageType.StartupMessage;
    }
    switch (String.fromCharCode(data[0])) {
      case "p":
        return FrontendMessageType.PasswordMessage;
      case "Q":
        return FrontendMessageType.SimpleQuery;
      default:
        throw new Error(`unexpected frontend tag '${String.fromCharCode(data[0])}'`);
    }
  }
}
