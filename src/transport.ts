/**
 * Node.js transport: a TCP socket upgraded in place to TLS.
 *
 * Errors are classified by the layer they come from: connect and
 * plaintext failures are IoError, failures before `secureConnect` are
 * TlsHandshakeError, and failures on the established TLS session are
 * TlsError. The server closing the connection and the idle timeout are
 * IoError on either layer, except that a timeout during the handshake
 * fails the handshake.
 */

import * as net from "node:net";
import * as tls from "node:tls";

import {
  IoError,
  ProtocolViolationError,
  TlsError,
  TlsHandshakeError,
} from "./errors.js";
import { SocketByteStream } from "./socket-stream.js";
import type { ByteStream, Transport } from "./types.js";

export interface NodeTransportOptions {
  /** Verify the server certificate. Defaults to true. */
  rejectUnauthorized?: boolean;
  /** PEM-encoded CA bundle to trust instead of the system store. */
  ca?: string;
  /** Destroy the socket after this many milliseconds without activity. */
  timeoutMs?: number;
}

export class NodeTransport implements Transport {
  private readonly options: NodeTransportOptions;
  private socket: net.Socket | null = null;
  private plaintext: SocketByteStream | null = null;
  private secure: tls.TLSSocket | null = null;

  constructor(options: NodeTransportOptions = {}) {
    this.options = options;
  }

  async connect(address: { host: string; port: number }): Promise<ByteStream> {
    if (this.socket !== null) {
      throw new IoError("transport is already connected");
    }

    const socket = await new Promise<net.Socket>((resolve, reject) => {
      const s = net.createConnection({ host: address.host, port: address.port });
      const onError = (err: Error): void => {
        reject(
          new IoError(`failed to connect to ${address.host}:${address.port}: ${err.message}`, {
            cause: err,
          }),
        );
      };
      s.once("error", onError);
      s.once("connect", () => {
        s.off("error", onError);
        resolve(s);
      });
    });

    this.socket = socket;
    this.applyTimeout(socket);
    this.plaintext = new SocketByteStream(socket, (message, cause) => new IoError(message, { cause }));
    return this.plaintext;
  }

  async upgradeToTls(servername: string): Promise<ByteStream> {
    const socket = this.socket;
    const plaintext = this.plaintext;
    if (socket === null || plaintext === null) {
      throw new IoError("cannot start TLS before connecting");
    }
    if (this.secure !== null) {
      throw new TlsError("TLS upgrade already started");
    }

    const leftover = plaintext.detach();
    if (leftover.byteLength > 0) {
      throw new ProtocolViolationError(
        `received ${leftover.byteLength} unencrypted byte(s) before the TLS handshake`,
      );
    }

    // the TLS socket owns the idle timeout from here on, handshake included
    socket.setTimeout(0);

    const secure = tls.connect({
      socket,
      servername,
      rejectUnauthorized: this.options.rejectUnauthorized ?? true,
      ca: this.options.ca,
    });
    this.secure = secure;
    this.applyTimeout(secure);

    await new Promise<void>((resolve, reject) => {
      const onError = (err: Error): void => {
        secure.destroy();
        reject(
          new TlsHandshakeError(`TLS handshake with ${servername} failed: ${err.message}`, {
            cause: err,
          }),
        );
      };
      secure.once("error", onError);
      secure.once("secureConnect", () => {
        secure.off("error", onError);
        resolve();
      });
    });

    return new SocketByteStream(secure, (message, cause) => new TlsError(message, { cause }));
  }

  /** Destroy both sockets. Safe to call more than once. */
  close(): void {
    this.secure?.destroy();
    this.socket?.destroy();
    this.secure = null;
    this.socket = null;
    this.plaintext = null;
  }

  private applyTimeout(socket: net.Socket): void {
    const timeoutMs = this.options.timeoutMs;
    if (timeoutMs === undefined || timeoutMs <= 0) return;

    socket.setTimeout(timeoutMs, () => {
      socket.destroy(new IoError(`no activity on the connection for ${timeoutMs}ms`));
    });
  }
}
