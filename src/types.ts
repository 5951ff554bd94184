import type { Duplex } from 'stream';

export module Rcon {
  /**
   * @link https://developer.valvesoftware.com/wiki/Source_RCON_Protocol#Packet_Type
   * */
  export enum PacketType {
    SERVERDATA_RESPONSE_VALUE = 0,
    SERVERDATA_AUTH_RESPONSE = 2,
    SERVERDATA_EXECCOMMAND = 2,
    SERVERDATA_AUTH = 3,
  }

  /**
   * @description Fixed fields at the start of every packet.
   * */
  export interface PacketHeader {
    /**
     * @description Byte count of everything after the size field.
     * */
    size: number;
    requestID: number;
    type: number;
  }

  export interface Response {
    requestID: number;
    type: number;
    /**
     * @description Body text with the two padding bytes removed.
     * */
    body: string;
  }

  /**
   * @description Anything packets can be read from, a fixed number of bytes at a time.
   * */
  export interface ByteSource {
    read(length: number): Promise<Buffer>;
  }

  export interface Session {
    connect(password: string): Promise<void>;

    command(cmd: string): Promise<string>;

    commandNoResponse(cmd: string): Promise<void>;

    close(): Promise<void>;
  }

  export interface ClientOptions {
    /**
     * @description Port number.
     * @default 61695
     * */
    port?: number;
    /**
     * @description Connect timeout (ms). `0` to disable.
     * @default 10000
     * */
    timeout?: number;
    /**
     * @description Highest request id before the counter wraps back to 1.
     * @default 100
     * */
    cap?: number;
    /**
     * @description Already open stream to use instead of dialing `address:port`.
     * */
    connection?: Duplex;
  }

  export interface DialOptions {
    host: string;
    port: number;
    timeout: number;
  }
}
