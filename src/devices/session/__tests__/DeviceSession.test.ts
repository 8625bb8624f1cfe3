import { DeviceSession } from '../DeviceSession';
import { DeviceResult } from '../DeviceResult';
import {
  LineTransport,
  NetworkAddress,
  TransportError,
  TransportErrorType,
  TransportFactory
} from '../../transport/LineTransport';
import { DeviceRegistry } from '../../registry/DeviceRegistry';
import { ErrorKind, PJLinkErrorCode, ProtocolError } from '../../../core/errors/DeviceError';
import { Logger } from '../../../core/logging/Logger';
import { MuteState, PowerState } from '../../../core/types/DeviceState';

type Script = Array<string | TransportError>;

class FakeTransport implements LineTransport {
  readonly endpoint = 'fake:4352';
  readonly written: string[] = [];
  closed = false;

  constructor(private readonly replies: Script) {}

  async write(line: string): Promise<void> {
    if (this.closed) {
      throw new TransportError(TransportErrorType.PEER_CLOSED, 'closed');
    }
    this.written.push(line);
  }

  async readLine(): Promise<string> {
    const next = this.replies.shift();
    if (next === undefined) {
      throw new TransportError(TransportErrorType.READ_TIMEOUT, 'No reply');
    }
    if (next instanceof TransportError) {
      throw next;
    }
    return next;
  }

  close(): void {
    this.closed = true;
  }
}

/**
 * Each open() takes the next script; a TransportError in place of a script
 * fails the connect
 */
class FakeTransportFactory implements TransportFactory {
  readonly opened: FakeTransport[] = [];
  readonly addresses: NetworkAddress[] = [];

  constructor(private readonly scripts: Array<Script | TransportError>) {}

  async open(address: NetworkAddress): Promise<LineTransport> {
    this.addresses.push(address);
    const script = this.scripts.shift();
    if (script === undefined) {
      throw new TransportError(TransportErrorType.CONNECT_FAILED, 'Connection refused');
    }
    if (script instanceof TransportError) {
      throw script;
    }
    const transport = new FakeTransport(script);
    this.opened.push(transport);
    return transport;
  }
}

const GREETING = 'PJLINK 0\r';
const registry = DeviceRegistry.fromSource({ devices: [{ id: 'left', host: '10.0.0.1' }] });

function sessionWith(factory: TransportFactory): DeviceSession {
  return new DeviceSession(registry.resolve('left'), { transportFactory: factory, logger: Logger.silent() });
}

function expectFailure(result: DeviceResult, kind: ErrorKind, attempts: number): void {
  expect(result.ok).toBe(false);
  if (!result.ok) {
    expect(result.kind).toBe(kind);
    expect(result.error.kind).toBe(kind);
    expect(result.attempts).toBe(attempts);
    expect(result.deviceId).toBe('left');
  }
}

describe('DeviceSession', () => {
  test('should query power over one connection', async () => {
    const factory = new FakeTransportFactory([[GREETING, '%1POWR=1\r']]);
    const session = sessionWith(factory);

    const result = await session.send({ verb: 'power', action: 'query' });

    expect(result).toEqual({
      ok: true,
      deviceId: 'left',
      command: { verb: 'power', action: 'query' },
      verb: 'power',
      value: PowerState.ON,
      attempts: 1
    });
    expect(factory.opened[0].written).toEqual(['%1POWR ?\r']);
    expect(factory.addresses).toEqual([{ host: '10.0.0.1', port: 4352 }]);
    expect(session.cachedState().power).toBe(PowerState.ON);
    expect(session.connected).toBe(true);
  });

  test('should reuse the connection for later commands', async () => {
    const factory = new FakeTransportFactory([[GREETING, '%1POWR=0\r', '%1AVMT=31\r']]);
    const session = sessionWith(factory);

    await session.send({ verb: 'power', action: 'query' });
    const mute = await session.send({ verb: 'mute', action: 'query' });

    expect(mute.ok && mute.verb === 'mute' ? mute.value : undefined).toBe(MuteState.MUTED);
    expect(session.connectionCount).toBe(1);
  });

  test('should report protocol errors without retrying and keep the connection', async () => {
    const factory = new FakeTransportFactory([[GREETING, '%1POWR=ERR3\r', '%1POWR=0\r']]);
    const session = sessionWith(factory);

    const rejected = await session.send({ verb: 'power', action: 'on' });
    expectFailure(rejected, ErrorKind.PROTOCOL_ERROR, 1);
    if (!rejected.ok) {
      expect(rejected.error).toBeInstanceOf(ProtocolError);
      expect(rejected.error instanceof ProtocolError ? rejected.error.code : undefined).toBe(
        PJLinkErrorCode.UNAVAILABLE_TIME
      );
    }

    const query = await session.send({ verb: 'power', action: 'query' });
    expect(query.ok).toBe(true);
    expect(session.connectionCount).toBe(1);
    expect(factory.opened[0].written).toEqual(['%1POWR 1\r', '%1POWR ?\r']);
  });

  test('should retry once on a fresh connection after a bad reply', async () => {
    const factory = new FakeTransportFactory([
      [GREETING, '%1AVMT=OK\r'],
      [GREETING, '%1POWR=1\r']
    ]);
    const session = sessionWith(factory);

    const result = await session.send({ verb: 'power', action: 'query' });

    expect(result.ok).toBe(true);
    expect(result.attempts).toBe(2);
    expect(session.connectionCount).toBe(2);
    expect(factory.opened[0].closed).toBe(true);
    expect(factory.opened[1].closed).toBe(false);
  });

  test('should treat an object property name as a bad value', async () => {
    const factory = new FakeTransportFactory([
      [GREETING, '%1POWR=constructor\r'],
      [GREETING, '%1POWR=toString\r']
    ]);
    const session = sessionWith(factory);

    const result = await session.send({ verb: 'power', action: 'query' });

    expectFailure(result, ErrorKind.COMMS_FAULT, 2);
    expect(session.cachedState().power).toBeUndefined();
    expect(factory.opened.map(transport => transport.closed)).toEqual([true, true]);
  });

  test('should give up after the second fault', async () => {
    const factory = new FakeTransportFactory([[GREETING], [GREETING], [GREETING, '%1POWR=1\r']]);
    const session = sessionWith(factory);

    const result = await session.send({ verb: 'power', action: 'query' });

    expectFailure(result, ErrorKind.COMMS_FAULT, 2);
    expect(factory.opened).toHaveLength(2);
    expect(session.connected).toBe(false);
  });

  test('should report connect failures as ConnectFault', async () => {
    const refused = new TransportError(TransportErrorType.CONNECT_FAILED, 'Connection refused');
    const factory = new FakeTransportFactory([refused, refused]);
    const session = sessionWith(factory);

    const result = await session.send({ verb: 'power', action: 'on' });

    expectFailure(result, ErrorKind.CONNECT_FAULT, 2);
    expect(factory.addresses).toHaveLength(2);
    expect(session.connectionCount).toBe(0);
  });

  test('should treat an unreadable greeting as a comms fault', async () => {
    const factory = new FakeTransportFactory([['HELLO\r'], [GREETING, '%1POWR=0\r']]);
    const session = sessionWith(factory);

    const result = await session.send({ verb: 'power', action: 'query' });

    expect(result.ok).toBe(true);
    expect(result.attempts).toBe(2);
    expect(factory.opened[0].closed).toBe(true);
  });

  test('should refuse devices that demand authentication', async () => {
    const factory = new FakeTransportFactory([['PJLINK 1 test-seed\r'], [GREETING]]);
    const session = sessionWith(factory);

    const result = await session.send({ verb: 'power', action: 'query' });

    expectFailure(result, ErrorKind.PROTOCOL_ERROR, 1);
    if (!result.ok) {
      expect(result.error instanceof ProtocolError ? result.error.code : undefined).toBe(
        PJLinkErrorCode.AUTHENTICATION
      );
    }
    expect(factory.opened).toHaveLength(1);
    expect(factory.opened[0].closed).toBe(true);
    expect(factory.opened[0].written).toEqual([]);
  });

  describe('toggle', () => {
    test('should query then set the opposite', async () => {
      const factory = new FakeTransportFactory([[GREETING, '%1AVMT=30\r', '%1AVMT=OK\r']]);
      const session = sessionWith(factory);

      const result = await session.send({ verb: 'mute', action: 'toggle' });

      expect(result.ok && result.verb === 'mute' ? result.value : undefined).toBe(MuteState.MUTED);
      expect(result.attempts).toBe(2);
      expect(factory.opened[0].written).toEqual(['%1AVMT ?\r', '%1AVMT 31\r']);
    });

    test('should turn a warming projector off', async () => {
      const factory = new FakeTransportFactory([[GREETING, '%1POWR=3\r', '%1POWR=OK\r']]);
      const session = sessionWith(factory);

      const result = await session.send({ verb: 'power', action: 'toggle' });

      expect(result.ok && result.verb === 'power' ? result.value : undefined).toBe(PowerState.OFF);
      expect(factory.opened[0].written).toEqual(['%1POWR ?\r', '%1POWR 0\r']);
    });

    test('should not send a set when the query fails', async () => {
      const factory = new FakeTransportFactory([[GREETING, '%1POWR=ERR4\r']]);
      const session = sessionWith(factory);

      const result = await session.send({ verb: 'power', action: 'toggle' });

      expectFailure(result, ErrorKind.PROTOCOL_ERROR, 1);
      expect(factory.opened[0].written).toEqual(['%1POWR ?\r']);
    });
  });

  test('should cache sets optimistically until a query answers', async () => {
    const factory = new FakeTransportFactory([[GREETING, '%1POWR=OK\r', '%1POWR=3\r']]);
    const session = sessionWith(factory);

    await session.send({ verb: 'power', action: 'on' });
    expect(session.cachedState().power).toBe(PowerState.ON);

    await session.send({ verb: 'power', action: 'query' });
    expect(session.cachedState().power).toBe(PowerState.WARMING);
  });

  test('should serialize concurrent commands', async () => {
    const factory = new FakeTransportFactory([[GREETING, '%1POWR=1\r', '%1AVMT=31\r', '%2FREZ=0\r']]);
    const session = sessionWith(factory);

    const [power, mute, freeze] = await Promise.all([
      session.send({ verb: 'power', action: 'query' }),
      session.send({ verb: 'mute', action: 'query' }),
      session.send({ verb: 'freeze', action: 'query' })
    ]);

    expect([power.ok, mute.ok, freeze.ok]).toEqual([true, true, true]);
    expect(factory.opened[0].written).toEqual(['%1POWR ?\r', '%1AVMT ?\r', '%2FREZ ?\r']);
    expect(session.connectionCount).toBe(1);
  });

  test('should open a new connection after close', async () => {
    const factory = new FakeTransportFactory([[GREETING, '%1POWR=1\r'], [GREETING, '%1POWR=0\r']]);
    const session = sessionWith(factory);

    await session.send({ verb: 'power', action: 'query' });
    session.close();
    expect(session.connected).toBe(false);

    const result = await session.send({ verb: 'power', action: 'query' });
    expect(result.ok && result.verb === 'power' ? result.value : undefined).toBe(PowerState.OFF);
    expect(session.connectionCount).toBe(2);
  });
});
