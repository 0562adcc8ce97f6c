/**
 * ByteStream over a Node.js socket.
 *
 * Incoming chunks are buffered until a `readExact` call can be satisfied
 * in full. At most one read may be pending at a time; the connection
 * driver awaits every read before issuing the next one.
 */

import type { Duplex } from "node:stream";

import { IoError, PgProbeError } from "./errors.js";
import type { ByteStream } from "./types.js";

/**
 * Wraps a socket `error` event in the error class for this stream's layer.
 * The peer closing the stream is always an IoError.
 */
export type StreamErrorFactory = (message: string, cause?: unknown) => PgProbeError;

interface PendingRead {
  length: number;
  resolve(bytes: Uint8Array): void;
  reject(err: PgProbeError): void;
}

export class SocketByteStream implements ByteStream {
  private readonly socket: Duplex;
  private readonly wrapError: StreamErrorFactory;
  private chunks: Buffer[] = [];
  private buffered = 0;
  private pending: PendingRead | null = null;
  private failure: PgProbeError | null = null;

  constructor(socket: Duplex, wrapError: StreamErrorFactory) {
    this.socket = socket;
    this.wrapError = wrapError;

    socket.on("data", this.onData);
    socket.on("end", this.onEnd);
    socket.on("close", this.onEnd);
    socket.on("error", this.onError);
  }

  /** Number of received bytes not yet consumed by a read. */
  get bufferedLength(): number {
    return this.buffered;
  }

  write(data: Uint8Array): Promise<void> {
    if (this.failure !== null) {
      return Promise.reject(this.failure);
    }

    return new Promise((resolve, reject) => {
      this.socket.write(data, (err?: Error | null) => {
        if (err) {
          reject(this.asStreamError(err));
        } else {
          resolve();
        }
      });
    });
  }

  readExact(length: number): Promise<Uint8Array> {
    if (this.pending !== null) {
      return Promise.reject(new Error("readExact() called while another read is pending"));
    }
    if (this.buffered >= length) {
      return Promise.resolve(this.take(length));
    }
    if (this.failure !== null) {
      return Promise.reject(this.failure);
    }

    return new Promise((resolve, reject) => {
      this.pending = { length, resolve, reject };
    });
  }

  /**
   * Stop consuming the socket and hand back any bytes received but not
   * read. Used right before the socket is wrapped in TLS.
   */
  detach(): Uint8Array {
    this.socket.off("data", this.onData);
    this.socket.off("end", this.onEnd);
    this.socket.off("close", this.onEnd);
    // the raw socket keeps its error listener after the upgrade
    return this.take(this.buffered);
  }

  // ── Private Methods ──────────────────────────────────────────────────────

  private readonly onData = (chunk: Buffer | string): void => {
    const bytes = typeof chunk === "string" ? Buffer.from(chunk) : chunk;
    this.chunks.push(bytes);
    this.buffered += bytes.byteLength;

    const pending = this.pending;
    if (pending !== null && this.buffered >= pending.length) {
      this.pending = null;
      pending.resolve(this.take(pending.length));
    }
  };

  private readonly onEnd = (): void => {
    this.fail(new IoError("connection closed by server"));
  };

  private readonly onError = (err: Error): void => {
    this.fail(this.asStreamError(err));
  };

  private asStreamError(err: Error): PgProbeError {
    return err instanceof PgProbeError ? err : this.wrapError(err.message, err);
  }

  private fail(err: PgProbeError): void {
    if (this.failure === null) {
      this.failure = err;
    }

    const pending = this.pending;
    if (pending !== null) {
      this.pending = null;
      pending.reject(this.failure);
    }
  }

  private take(length: number): Uint8Array {
    const all = this.chunks.length === 1 ? this.chunks[0] : Buffer.concat(this.chunks);
    const bytes = new Uint8Array(all.subarray(0, length));
    const rest = all.subarray(length);

    this.chunks = rest.byteLength > 0 ? [rest] : [];
    this.buffered = rest.byteLength;
    return bytes;
  }
}
