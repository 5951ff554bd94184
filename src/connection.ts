import { createConnection, Socket } from 'net';
import type { Duplex } from 'stream';
import { Rcon } from './types';
import {
  ConnectionClosedError,
  DialTimeoutError,
  ProtocolError,
} from './errors';
import { prefixError } from './utils';

type PendingRead = {
  length: number;
  resolve: (data: Buffer) => void;
  reject: (err: Error) => void;
};

/**
 * @description Open a TCP connection, failing after `timeout` ms (`0` waits indefinitely).
 * */
export function dial(options: Rcon.DialOptions): Promise<Socket> {
  const logprefix = `RCON ${options.host}:${options.port}`;
  return new Promise((resolve, reject): void => {
    const socket = createConnection({
      host: options.host,
      port: options.port,
      timeout: options.timeout,
    });
    const cleanup = () => {
      socket.off('connect', handleConnect);
      socket.off('error', handleError);
      socket.off('timeout', handleTimeout);
    };
    const handleConnect = () => {
      cleanup();
      socket.setTimeout(0);
      socket.setNoDelay(true);
      resolve(socket);
    };
    const handleError = (err: Error) => {
      cleanup();
      socket.destroy();
      reject(prefixError(logprefix, err));
    };
    const handleTimeout = () => {
      cleanup();
      socket.destroy();
      reject(new DialTimeoutError(logprefix, options.timeout));
    };

    socket
      .once('connect', handleConnect)
      .once('error', handleError)
      .once('timeout', handleTimeout);
  });
}

/**
 * Adapts a duplex stream (usually a TCP socket) to exact-length reads and
 * awaited writes. Incoming chunks are buffered until a read asks for them.
 *
 * Only one read may be pending at a time.
 */
export class StreamConnection implements Rcon.ByteSource {
  public readonly stream: Duplex;
  private readonly logprefix: string;
  private $buffer: Buffer = Buffer.alloc(0);
  private $pending: PendingRead | null = null;
  private $failure: Error | null = null;

  private readonly onData = (chunk: Buffer) => {
    this.$buffer = Buffer.concat([this.$buffer, chunk]);
    this.flush();
  };
  private readonly onError = (err: Error) => {
    this.fail(prefixError(this.logprefix, err));
  };
  private readonly onEnd = () => {
    this.fail(new ConnectionClosedError(this.logprefix));
  };

  constructor(stream: Duplex, logprefix: string = 'RCON') {
    this.stream = stream;
    this.logprefix = logprefix;
    stream
      .on('data', this.onData)
      .on('error', this.onError)
      .on('end', this.onEnd)
      .on('close', this.onEnd);
  }

  /**
   * @description Bytes received but not read yet.
   * */
  public get buffered(): number {
    return this.$buffer.length;
  }

  public read(length: number): Promise<Buffer> {
    if (this.$pending) {
      return Promise.reject(new ProtocolError('a read is already pending'));
    }
    return new Promise((resolve, reject): void => {
      this.$pending = { length, resolve, reject };
      this.flush();
    });
  }

  public write(data: Buffer): Promise<void> {
    if (this.$failure) {
      return Promise.reject(this.$failure);
    }
    return new Promise((resolve, reject): void => {
      this.stream.write(data, (err?: Error | null) => {
        if (err) {
          reject(prefixError(this.logprefix, err));
        } else {
          resolve();
        }
      });
    });
  }

  /**
   * @description End and destroy the stream. A pending read is rejected with `ConnectionClosedError`,
   * an error raised while the stream shuts down rejects the returned promise.
   * */
  public close(): Promise<void> {
    this.fail(new ConnectionClosedError(this.logprefix));
    this.detach();
    if (this.stream.destroyed) {
      return Promise.resolve();
    }
    return new Promise((resolve, reject): void => {
      const handleClose = () => {
        this.stream.off('error', handleError);
        resolve();
      };
      const handleError = (err: Error) => {
        this.stream.off('close', handleClose);
        reject(prefixError(this.logprefix, err));
      };
      this.stream.once('close', handleClose).once('error', handleError);
      this.stream.end();
      this.stream.destroy();
    });
  }

  private flush(): void {
    const pending = this.$pending;
    if (pending && this.$buffer.length >= pending.length) {
      this.$pending = null;
      const data = this.$buffer.subarray(0, pending.length);
      this.$buffer = this.$buffer.subarray(pending.length);
      pending.resolve(data);
      return;
    }
    if (pending && this.$failure) {
      this.$pending = null;
      pending.reject(this.$failure);
    }
  }

  private fail(err: Error): void {
    this.$failure ??= err;
    this.flush();
  }

  private detach(): void {
    this.stream
      .off('data', this.onData)
      .off('end', this.onEnd)
      .off('close', this.onEnd);
    // error listener stays attached after close
  }
}
