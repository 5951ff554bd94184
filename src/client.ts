import type { Duplex } from 'stream';
import { Rcon } from './types';
import { RconPacket, AUTH_FAILED_ID } from './packet';
import { StreamConnection, dial } from './connection';
import { RESET_ID, resolveOptions } from './config';
import {
  AuthenticationFailedError,
  NotConnectedError,
  ProtocolError,
} from './errors';
import { logger } from './logger';

/**
 * Remote console session over one TCP connection.
 *
 * Exchanges are strictly sequential: await each call before starting the
 * next one. Call or defer `close()` to release the connection; the client
 * can be reused by calling `connect()` again.
 *
 * @example
 * ```ts
 * const client = new RconClient('127.0.0.1', { port: 25575 });
 * await client.connect('password');
 * const players = await client.command('list');
 * await client.close();
 * ```
 */
export class RconClient implements Rcon.Session {
  public readonly address: string;
  public readonly port: number;
  public readonly timeout: number;
  public readonly cap: number;
  private $connection: StreamConnection | null = null;
  private $requestID = RESET_ID;
  private $busy = false;

  /**
   * @description Log prefix
   * */
  private get logprefix() {
    return `RCON ${this.address}:${this.port}`;
  }

  /**
   * @description Construct a RCON client. Nothing is dialed until `connect()`.
   * @param {string} address Host name / IP.
   * @param {Rcon.ClientOptions} [options] Port, timeout, request id cap or an open stream.
   * */
  constructor(address: string, options?: Rcon.ClientOptions) {
    const resolved = resolveOptions(options);
    this.address = address;
    this.port = resolved.port;
    this.timeout = resolved.timeout;
    this.cap = resolved.cap;
    if (resolved.connection) {
      this.$connection = new StreamConnection(resolved.connection, this.logprefix);
    }
  }

  /**
   * @description Is a transport attached.
   * */
  public get connected(): boolean {
    return this.$connection !== null;
  }

  /**
   * @description Underlying stream, or `null` while disconnected.
   * */
  public get connection(): Duplex | null {
    return this.$connection?.stream ?? null;
  }

  /**
   * @description Id the next packet will be sent with.
   * */
  public get requestID(): number {
    return this.$requestID;
  }

  public set requestID(value: number) {
    if (!Number.isInteger(value) || value < RESET_ID || value > this.cap) {
      throw new RangeError(
        `request id must be an integer between ${RESET_ID} and ${this.cap}, got ${value}`,
      );
    }
    this.$requestID = value;
  }

  /**
   * @description Dial the server unless a stream is already attached, then authenticate.
   * Authentication is attempted on every call. A wrong password leaves the connection open.
   * @throws {AuthenticationFailedError} The server rejected the password.
   * */
  public async connect(password: string): Promise<void> {
    if (!this.$connection) {
      logger.debug(`${this.logprefix} dialing`, { timeout: this.timeout });
      const socket = await dial({
        host: this.address,
        port: this.port,
        timeout: this.timeout,
      });
      this.$connection = new StreamConnection(socket, this.logprefix);
    }
    await this.authenticate(password);
  }

  /**
   * @description Send a command and return the response body.
   * @param {string} cmd Command.
   * @throws {NotConnectedError}
   * */
  public async command(cmd: string): Promise<string> {
    const response = await this.exchange(
      Rcon.PacketType.SERVERDATA_EXECCOMMAND,
      cmd,
      true,
    );
    return response.body;
  }

  /**
   * @description Send a command without waiting for a response.
   * Errors the server reports in its reply are not seen.
   * @param {string} cmd Command.
   * @throws {NotConnectedError}
   * */
  public async commandNoResponse(cmd: string): Promise<void> {
    await this.exchange(Rcon.PacketType.SERVERDATA_EXECCOMMAND, cmd, false);
  }

  /**
   * @description Reset the request id and close the connection. Closing a disconnected client is a no-op.
   * The client is disconnected even when closing the stream fails; the error is still thrown.
   * */
  public async close(): Promise<void> {
    this.$requestID = RESET_ID;
    const connection = this.$connection;
    if (!connection) return;
    this.$connection = null;
    logger.debug(`${this.logprefix} closing`);
    await connection.close();
  }

  /**
   * @private
   * @description Send an authentication packet.
   * */
  private async authenticate(password: string): Promise<void> {
    const response = await this.exchange(
      Rcon.PacketType.SERVERDATA_AUTH,
      password,
      true,
    );
    if (response.requestID === AUTH_FAILED_ID) {
      throw new AuthenticationFailedError(this.logprefix);
    }
  }

  /**
   * @private
   * @description Write one packet and, when `expectReply` is set, read the next packet back.
   * The request id is consumed as soon as the write succeeds. A reply that cannot be framed closes the connection.
   * */
  private exchange(
    type: Rcon.PacketType,
    body: string,
    expectReply: true,
  ): Promise<Rcon.Response>;
  private exchange(
    type: Rcon.PacketType,
    body: string,
    expectReply: false,
  ): Promise<null>;
  private async exchange(
    type: Rcon.PacketType,
    body: string,
    expectReply: boolean,
  ): Promise<Rcon.Response | null> {
    const connection = this.$connection;
    if (!connection) {
      throw new NotConnectedError();
    }
    if (this.$busy) {
      throw new ProtocolError(
        `${this.logprefix} another request is still in flight`,
      );
    }

    const packet = new RconPacket(this.$requestID, type, body);
    this.$busy = true;
    try {
      await connection.write(packet.buffer);
      this.incrementRequestID();
      logger.packet(this.logprefix, '->', packet);
      if (!expectReply) return null;

      const reply = await RconPacket.read(connection).catch(
        async (err: unknown) => {
          // unreadable framing leaves the stream out of step, drop it
          if (err instanceof ProtocolError) await this.close();
          throw err;
        },
      );
      logger.packet(this.logprefix, '<-', reply);
      return reply.toResponse();
    } finally {
      this.$busy = false;
    }
  }

  /**
   * @private
   * @description Advance the request id, wrapping back to 1 once it passes the cap.
   * */
  private incrementRequestID(): void {
    this.$requestID += 1;
    if (this.$requestID > this.cap) {
      this.$requestID = RESET_ID;
    }
  }
}
