export class RconError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RconError';
  }
}

export class NotConnectedError extends RconError {
  constructor() {
    super('client is not connected');
    this.name = 'NotConnectedError';
  }
}

export class IntegerOverflowError extends RconError {
  constructor(value: number) {
    super(`integer overflow: ${value} does not fit in int32`);
    this.name = 'IntegerOverflowError';
  }
}

export class AuthenticationFailedError extends RconError {
  constructor(prefix: string) {
    super(`${prefix} Authentication Failed`);
    this.name = 'AuthenticationFailedError';
  }
}

export class ProtocolError extends RconError {
  constructor(message: string) {
    super(message);
    this.name = 'ProtocolError';
  }
}

export class ConnectionClosedError extends RconError {
  constructor(prefix: string) {
    super(`${prefix} connection closed`);
    this.name = 'ConnectionClosedError';
  }
}

export class DialTimeoutError extends RconError {
  constructor(prefix: string, timeout: number) {
    super(`${prefix} timed out connecting after ${timeout}ms`);
    this.name = 'DialTimeoutError';
  }
}
