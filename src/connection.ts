/**
 * Connection driver for the probe handshake.
 *
 * Drives one session over a Transport:
 *   1. SSLRequest, expecting the single byte 'S' back
 *   2. TLS upgrade, then StartupMessage
 *   3. cleartext password when the server asks for it
 *   4. the query on the first idle ReadyForQuery
 *   5. done on the second idle ReadyForQuery
 *
 * Every other message is traced and otherwise ignored.
 *
 * Usage:
 *   const connection = new Connection(config, new NodeTransport());
 *   await connection.run();
 */

import { ProtocolViolationError } from "./errors.js";
import { MessageLog } from "./message-log.js";
import { SSL_ACCEPTED, encodeFrontendMessage, readBackendMessage } from "./pg-wire.js";
import {
  BackendMessageType,
  FrontendMessageType,
  ReadyForQueryStatus,
  type BackendMessage,
  type ByteStream,
  type Config,
  type FrontendMessage,
  type Transport,
} from "./types.js";

export const DEFAULT_QUERY = "SELECT * FROM my_table LIMIT 3;";

/** Whether the query has gone out yet; the only state a session carries. */
export type ConnectionPhase = "AwaitingQuery" | "QuerySent";

export interface ConnectionOptions {
  /** SQL sent on the first idle ReadyForQuery. */
  query?: string;
  log?: MessageLog;
}

export class Connection {
  private readonly config: Config;
  private readonly transport: Transport;
  private readonly query: string;
  private readonly log: MessageLog;

  constructor(config: Config, transport: Transport, options: ConnectionOptions = {}) {
    this.config = config;
    this.transport = transport;
    this.query = options.query ?? DEFAULT_QUERY;
    this.log = options.log ?? new MessageLog();
  }

  /**
   * Run the session to completion.
   *
   * Resolves on the second idle ReadyForQuery. Rejects with the first
   * I/O, parse, TLS or protocol error. The transport is closed either way.
   */
  async run(): Promise<void> {
    try {
      const plaintext = await this.transport.connect({
        host: this.config.host,
        port: this.config.port,
      });
      await this.negotiateTls(plaintext);

      const stream = await this.transport.upgradeToTls(this.config.host);
      await this.send(stream, {
        type: FrontendMessageType.StartupMessage,
        user: this.config.user,
        database: this.config.database,
      });

      await this.exchange(stream);
    } finally {
      this.transport.close();
    }
  }

  // ── Private Methods ──────────────────────────────────────────────────────

  private async negotiateTls(stream: ByteStream): Promise<void> {
    await this.send(stream, { type: FrontendMessageType.RequestSSL });

    const ack = (await stream.readExact(1))[0];
    this.log.sslResponse(ack);

    if (ack !== SSL_ACCEPTED) {
      throw new ProtocolViolationError(
        `expected 'S' in reply to SSLRequest, got 0x${ack.toString(16).padStart(2, "0")}`,
      );
    }
  }

  private async exchange(stream: ByteStream): Promise<void> {
    let phase: ConnectionPhase = "AwaitingQuery";

    for (;;) {
      const message = await this.receive(stream);

      switch (message.type) {
        case BackendMessageType.AuthenticationCleartextPassword:
          await this.send(stream, {
            type: FrontendMessageType.PasswordMessage,
            password: this.config.password,
          });
          break;

        case BackendMessageType.ReadyForQuery:
          // Transaction and FailedTransaction are not acted on
          if (message.status !== ReadyForQueryStatus.Idle) break;
          if (phase === "QuerySent") return;

          await this.send(stream, { type: FrontendMessageType.SimpleQuery, query: this.query });
          phase = "QuerySent";
          break;

        // AuthenticationOk, AuthenticationSasl, ErrorResponse, BackendKeyData,
        // ParameterStatus and Unknown are traced only
      }
    }
  }

  private async send(stream: ByteStream, message: FrontendMessage): Promise<void> {
    this.log.sent(message);
    await stream.write(encodeFrontendMessage(message));
  }

  private async receive(stream: ByteStream): Promise<BackendMessage> {
    const message = await readBackendMessage(stream);
    this.log.received(message);
    return message;
  }
}
