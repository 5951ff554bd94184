import { config } from './config';

export enum LogLevel {
  DEBUG = 'DEBUG',
  ERROR = 'ERROR',
}

export class Logger {
  private readonly debugEnabled: boolean;

  /**
   * @param {boolean} [debugEnabled] Print debug lines. Defaults to `RCON_DEBUG=1`.
   * */
  constructor(debugEnabled: boolean = config.debug) {
    this.debugEnabled = debugEnabled;
  }

  public get isDebugEnabled(): boolean {
    return this.debugEnabled;
  }

  public debug(message: string, meta?: unknown): void {
    if (!this.debugEnabled) return;
    console.log(this.line(LogLevel.DEBUG, message, meta));
  }

  public error(message: string, meta?: unknown): void {
    console.error(this.line(LogLevel.ERROR, message, meta));
  }

  /**
   * @description Debug line for a packet crossing the wire. Auth bodies come out hidden via `RconPacket#toString`.
   * */
  public packet(prefix: string, direction: '->' | '<-', packet: { toString(): string }): void {
    if (!this.debugEnabled) return;
    this.debug(`${prefix} ${direction} ${packet.toString()}`);
  }

  private line(level: LogLevel, message: string, meta?: unknown): string {
    const suffix = meta === undefined ? '' : ` ${JSON.stringify(meta)}`;
    return `[${new Date().toISOString()}] [${level}] ${message}${suffix}`;
  }
}

export const logger = new Logger();
