export { Rcon } from './types';
export { RconClient } from './client';
export {
  RconPacket,
  encode,
  decode,
  decodeHeader,
  packetSize,
  HEADER_SIZE,
  MIN_PACKET_SIZE,
  AUTH_FAILED_ID,
} from './packet';
export type { PacketBody } from './packet';
export { StreamConnection, dial } from './connection';
export {
  DEFAULT_CAP,
  DEFAULT_PORT,
  DEFAULT_TIMEOUT,
  RESET_ID,
  resolveOptions,
} from './config';
export * from './errors';
export { Logger, LogLevel, logger } from './logger';
