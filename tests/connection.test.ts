import { Socket, createConnection } from 'net';
import { Duplex } from 'stream';
import {
  RconClient,
  StreamConnection,
  dial,
  ConnectionClosedError,
  DialTimeoutError,
  ProtocolError,
} from '../src';
import { createPipe, readBytes, serverPacket, flush } from './helpers/pipe';

jest.mock('net', () => {
  const actual = jest.requireActual<typeof import('net')>('net');
  return { ...actual, createConnection: jest.fn() };
});

const mockedCreateConnection = jest.mocked(createConnection);

function refused(): NodeJS.ErrnoException {
  const err: NodeJS.ErrnoException = new Error('connect ECONNREFUSED 127.0.0.1:25575');
  err.code = 'ECONNREFUSED';
  err.syscall = 'connect';
  return err;
}

describe('dial', () => {
  let socket: Socket;

  beforeEach(() => {
    socket = new Socket();
    mockedCreateConnection.mockReset();
    mockedCreateConnection.mockImplementation(() => socket);
  });

  afterEach(() => {
    socket.destroy();
  });

  test('resolves with the socket once connected', async () => {
    const setNoDelay = jest.spyOn(socket, 'setNoDelay');
    const setTimeout = jest.spyOn(socket, 'setTimeout');
    const pending = dial({ host: '127.0.0.1', port: 25575, timeout: 3000 });
    socket.emit('connect');

    await expect(pending).resolves.toBe(socket);
    expect(mockedCreateConnection).toHaveBeenCalledWith({
      host: '127.0.0.1',
      port: 25575,
      timeout: 3000,
    });
    expect(setNoDelay).toHaveBeenCalledWith(true);
    expect(setTimeout).toHaveBeenCalledWith(0);
    expect(socket.listenerCount('timeout')).toBe(0);
  });

  test('socket errors keep their code and gain the address prefix', async () => {
    const pending = dial({ host: '127.0.0.1', port: 25575, timeout: 3000 });
    socket.emit('error', refused());

    await expect(pending).rejects.toThrow(
      'RCON 127.0.0.1:25575 connect ECONNREFUSED 127.0.0.1:25575',
    );
    await expect(pending).rejects.toMatchObject({
      code: 'ECONNREFUSED',
      syscall: 'connect',
    });
    expect(socket.destroyed).toBe(true);
  });

  test('timeout', async () => {
    const pending = dial({ host: '10.0.0.1', port: 25575, timeout: 50 });
    socket.emit('timeout');

    await expect(pending).rejects.toBeInstanceOf(DialTimeoutError);
    await expect(pending).rejects.toThrow(
      'RCON 10.0.0.1:25575 timed out connecting after 50ms',
    );
  });

  test('RconClient.connect surfaces dial errors', async () => {
    const client = new RconClient('127.0.0.1', { port: 25575, timeout: 1000 });
    const pending = client.connect('test-secret');
    socket.emit('error', refused());

    await expect(pending).rejects.toMatchObject({ code: 'ECONNREFUSED' });
    expect(client.connected).toBe(false);
    expect(client.requestID).toBe(1);
  });

  test('RconClient.connect skips dialing when a stream is supplied', async () => {
    const [server, clientEnd] = createPipe();
    const client = new RconClient('127.0.0.1', { connection: clientEnd });
    const pending = client.connect('test-secret');
    await readBytes(server, 25);
    server.write(serverPacket(1, 2, ''));

    await expect(pending).resolves.toBeUndefined();
    expect(mockedCreateConnection).not.toHaveBeenCalled();
    await client.close();
    server.destroy();
  });
});

describe('StreamConnection', () => {
  test('reads exact lengths out of coalesced chunks', async () => {
    const [server, clientEnd] = createPipe();
    const connection = new StreamConnection(clientEnd);
    server.write(Buffer.from([1, 2, 3, 4, 5]));
    await flush();

    expect(connection.buffered).toBe(5);
    await expect(connection.read(2)).resolves.toEqual(Buffer.from([1, 2]));
    await expect(connection.read(3)).resolves.toEqual(Buffer.from([3, 4, 5]));
    expect(connection.buffered).toBe(0);
    await connection.close();
  });

  test('waits for enough bytes', async () => {
    const [server, clientEnd] = createPipe();
    const connection = new StreamConnection(clientEnd);
    const pending = connection.read(4);
    server.write(Buffer.from([9, 8]));
    await flush();
    server.write(Buffer.from([7, 6, 5]));

    await expect(pending).resolves.toEqual(Buffer.from([9, 8, 7, 6]));
    expect(connection.buffered).toBe(1);
    await connection.close();
  });

  test('only one read may be pending', async () => {
    const [server, clientEnd] = createPipe();
    const connection = new StreamConnection(clientEnd);
    const first = connection.read(1);
    await expect(connection.read(1)).rejects.toBeInstanceOf(ProtocolError);
    server.write(Buffer.from([0]));
    await expect(first).resolves.toEqual(Buffer.from([0]));
    await connection.close();
  });

  test('stream ending before the bytes arrive', async () => {
    const [server, clientEnd] = createPipe();
    const connection = new StreamConnection(clientEnd, 'RCON test:1');
    const pending = connection.read(12);
    server.write(Buffer.from([1, 2, 3]));
    server.end();

    await expect(pending).rejects.toThrow('RCON test:1 connection closed');
    await expect(connection.read(4)).rejects.toBeInstanceOf(ConnectionClosedError);
    await connection.close();
  });

  test('stream errors reject the pending read with a prefix', async () => {
    const [, clientEnd] = createPipe();
    const connection = new StreamConnection(clientEnd, 'RCON test:1');
    const pending = connection.read(12);
    clientEnd.destroy(new Error('socket hang up'));

    await expect(pending).rejects.toThrow('RCON test:1 socket hang up');
  });

  test('write resolves once the bytes are handed over', async () => {
    const [server, clientEnd] = createPipe();
    const connection = new StreamConnection(clientEnd);
    await connection.write(Buffer.from('ping'));
    await expect(readBytes(server, 4)).resolves.toEqual(Buffer.from('ping'));
    await connection.close();
  });

  test('write after the peer went away rejects', async () => {
    const [server, clientEnd] = createPipe();
    const connection = new StreamConnection(clientEnd, 'RCON test:1');
    server.destroy();
    await flush();

    await expect(connection.write(Buffer.from('ping'))).rejects.toThrow(
      'RCON test:1 connection closed',
    );
    await connection.close();
  });

  test('close rejects when the stream fails to shut down', async () => {
    const stream = new Duplex({
      read() {},
      destroy(_error, callback) {
        callback(Object.assign(new Error('EIO on close'), { code: 'EIO' }));
      },
    });
    const connection = new StreamConnection(stream, 'RCON test:1');

    const closing = connection.close();
    await expect(closing).rejects.toThrow('RCON test:1 EIO on close');
    await expect(closing).rejects.toMatchObject({ code: 'EIO' });
  });

  test('close destroys the stream and rejects a pending read', async () => {
    const [, clientEnd] = createPipe();
    const connection = new StreamConnection(clientEnd);
    const pending = connection.read(4);
    const rejected = expect(pending).rejects.toBeInstanceOf(ConnectionClosedError);

    await connection.close();
    await rejected;
    expect(clientEnd.destroyed).toBe(true);
  });
});
