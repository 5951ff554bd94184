import type { Duplex } from 'stream';
import { Rcon } from './types';
import { INT32_MAX } from './utils';

export const DEFAULT_PORT = 61695;
export const DEFAULT_TIMEOUT = 10_000;
export const DEFAULT_CAP = 100;
// request id the counter starts from and wraps back to
export const RESET_ID = 1;

export interface ResolvedOptions {
  port: number;
  timeout: number;
  cap: number;
  connection: Duplex | null;
}

export const config = {
  debug: process.env.RCON_DEBUG === '1',
};

/**
 * @description Apply defaults to client options and validate them.
 * @throws {RangeError} When `port` or `cap` is out of range.
 * */
export function resolveOptions(options: Rcon.ClientOptions = {}): ResolvedOptions {
  const port = options.port ?? DEFAULT_PORT;
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new RangeError(`invalid port: ${port}`);
  }

  const cap = options.cap ?? DEFAULT_CAP;
  if (!Number.isInteger(cap) || cap < RESET_ID || cap > INT32_MAX) {
    throw new RangeError(`invalid request id cap: ${cap}`);
  }

  const timeout =
    options.timeout !== undefined && Number.isFinite(options.timeout)
      ? Math.max(options.timeout, 0)
      : DEFAULT_TIMEOUT;

  return { port, timeout, cap, connection: options.connection ?? null };
}
