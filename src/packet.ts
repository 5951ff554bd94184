import { Rcon } from './types';
import { ProtocolError } from './errors';
import { safeInt32 } from './utils';

const ENCODING: BufferEncoding = 'utf-8';
const PACKET_FIXED_SIZE = 14; // number of bytes for fixed size packet fields: Size(4), ID(4), Type(4), null(1), null(1)
const PADDING_SIZE = 2;
export const HEADER_SIZE = 12; // Size(4), ID(4), Type(4)
export const MIN_PACKET_SIZE = PACKET_FIXED_SIZE - 4;
// request id the server echoes back when the password is wrong
export const AUTH_FAILED_ID = -1;

export type PacketBody = string | Uint8Array;

function byteLength(body: PacketBody): number {
  return typeof body === 'string'
    ? Buffer.byteLength(body, ENCODING)
    : body.byteLength;
}

/**
 * @description Value of the size field for a body of `bodyLength` bytes.
 * @throws {IntegerOverflowError} When the body length or the packet size does not fit in int32.
 * */
export function packetSize(bodyLength: number): number {
  return safeInt32(safeInt32(bodyLength) + MIN_PACKET_SIZE);
}

/**
 * @description Serialize a packet. Nothing is allocated when the size check fails.
 * @example
 * ```js
 * encode('list', Rcon.PacketType.SERVERDATA_EXECCOMMAND, 1);
 * // <Buffer 0e 00 00 00 01 00 00 00 02 00 00 00 6c 69 73 74 00 00>
 * ```
 * */
export function encode(
  body: PacketBody,
  type: Rcon.PacketType | number,
  requestID: number,
): Buffer {
  const bodyLength = byteLength(body);
  const size = packetSize(bodyLength);
  safeInt32(requestID);
  safeInt32(type);

  const buffer = Buffer.alloc(size + 4);
  buffer.writeInt32LE(size, 0);
  buffer.writeInt32LE(requestID, 4);
  buffer.writeInt32LE(type, 8);
  if (typeof body === 'string') {
    buffer.write(body, HEADER_SIZE, bodyLength, ENCODING);
  } else {
    buffer.set(body, HEADER_SIZE);
  }
  // trailing 0x00 0x00 is left by Buffer.alloc
  return buffer;
}

/**
 * @description Parse the 12 header bytes of a packet.
 * */
export function decodeHeader(header: Buffer): Rcon.PacketHeader {
  if (header.length < HEADER_SIZE) {
    throw new ProtocolError(
      `header too short: expected ${HEADER_SIZE} bytes, got ${header.length}`,
    );
  }
  const size = header.readInt32LE(0);
  if (size < MIN_PACKET_SIZE) {
    throw new ProtocolError(`invalid packet size: ${size}`);
  }
  return {
    size,
    requestID: header.readInt32LE(4),
    type: header.readInt32LE(8),
  };
}

/**
 * @description Read one packet from `source` and return it as a response.
 * A request id of -1 is returned as is; authentication failure is for the caller to detect.
 * */
export async function decode(source: Rcon.ByteSource): Promise<Rcon.Response> {
  const packet = await RconPacket.read(source);
  return packet.toResponse();
}

export class RconPacket {
  private readonly $buffer: Buffer;

  /**
   * @description Construct a packet around an already serialized buffer.
   * @example
   * ```js
   * const packet = new RconPacket(buffer);
   * ```;
   * */
  constructor(buffer: Buffer);
  /**
   * @description Construct a packet from id, type and body.
   * @param {number} id - The request id.
   * @param {Rcon.PacketType} type - The packet type.
   * @param {PacketBody} [body] - The packet body.
   * @example
   * ```js
   * const packet = new RconPacket(7, Rcon.PacketType.SERVERDATA_EXECCOMMAND, "save-all");
   * ```
   * */
  constructor(id: number, type: Rcon.PacketType | number, body?: PacketBody);
  constructor(
    id: number | Buffer,
    type: Rcon.PacketType | number = Rcon.PacketType.SERVERDATA_EXECCOMMAND,
    body: PacketBody = '',
  ) {
    this.$buffer = Buffer.isBuffer(id) ? id : encode(body, type, id);
  }

  /**
   * @description Read the header, then exactly as many bytes as it announces.
   * */
  public static async read(source: Rcon.ByteSource): Promise<RconPacket> {
    const header = await source.read(HEADER_SIZE);
    const { size } = decodeHeader(header);
    const payload = await source.read(size - 8);
    return new RconPacket(Buffer.concat([header, payload]));
  }

  public get buffer(): Buffer {
    return this.$buffer;
  }

  public get size(): number {
    return this.$buffer.readInt32LE(0);
  }

  public get id(): number {
    return this.$buffer.readInt32LE(4);
  }

  public get type(): number {
    return this.$buffer.readInt32LE(8);
  }

  public get body(): string {
    return this.$buffer.toString(
      ENCODING,
      HEADER_SIZE,
      this.$buffer.length - PADDING_SIZE,
    );
  }

  public toResponse(): Rcon.Response {
    return { requestID: this.id, type: this.type, body: this.body };
  }

  /**
   * @description Convert instance to a string. Auth bodies are hidden.
   * @example
   * ```js
   * const packet = new RconPacket(7, Rcon.PacketType.SERVERDATA_EXECCOMMAND, "save-all");
   * console.log(packet.toString());
   * // RconPacket{"size":18,"id":7,"type":2,"body":"save-all"}
   * ```
   * */
  public toString(): string {
    return `RconPacket${JSON.stringify({
      size: this.size,
      id: this.id,
      type: this.type,
      body: this.type === Rcon.PacketType.SERVERDATA_AUTH ? '<hidden>' : this.body,
    })}`;
  }
}
