import { Test } from '@nestjs/testing';
import { createSocket, type RemoteInfo, type Socket } from 'node:dgram';
import { mkdtempSync, readdirSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { AcarsStreamService, IDLE_BUCKET_MS } from './acars-stream.service';
import type { StreamSettings } from './acars.types';
import { AcarsModule } from './acars.module';
import { BucketWriter } from '../output/bucket-writer';

const BUSY_PORT = 15999;

// In-process stand-in for UDP sockets: bind() reports listening on the next
// tick, except for BUSY_PORT which fails like an address already in use.
jest.mock('node:dgram', () => {
  const { EventEmitter } = jest.requireActual<typeof import('node:events')>('node:events');

  class MockSocket extends EventEmitter {
    bind = jest.fn((port: number) => {
      process.nextTick(() => {
        if (port === 15999) {
          this.emit('error', new Error('bind EADDRINUSE'));
        } else {
          this.emit('listening');
        }
      });
    });

    close = jest.fn((callback?: () => void) => {
      callback?.();
    });
  }

  return { createSocket: jest.fn(() => new MockSocket()) };
});

const M1 = '00:16:25 18-03-25 UTC AES:E4920F GES:D0 2 .PTZNG ! H1 A\nFANS-1/A CPDLC request climb';
const M2 = '00:17:02 18-03-25 UTC AES:A1B2C3 GES:90 1 .N123AB ! 5Z 2\nposition report ADS-C';
const M3 = '00:18:40 18-03-25 UTC AES:A1B2C3 GES:90 1 .N123AB ! H1 B\nMIAM compressed payload';

const RINFO: RemoteInfo = { address: '127.0.0.1', family: 'IPv4', port: 40000, size: 0 };

describe('AcarsStreamService', () => {
  let service: AcarsStreamService;
  let outputDir: string;

  const settings = (overrides: Partial<StreamSettings> = {}): StreamSettings => ({
    host: '127.0.0.1',
    ports: [15550, 15551],
    outputDir,
    bufferTimeout: 60,
    splitBy: 'label',
    keyword: null,
    ...overrides,
  });

  const sockets = (): Socket[] =>
    jest.mocked(createSocket).mock.results.map((result) => result.value);
  const send = (socket: Socket, text: string) => socket.emit('message', Buffer.from(text), RINFO);
  const read = (name: string) => readFileSync(join(outputDir, name), 'utf-8');

  beforeEach(async () => {
    jest.clearAllMocks();
    const moduleRef = await Test.createTestingModule({ imports: [AcarsModule] }).compile();
    service = moduleRef.get(AcarsStreamService);
    outputDir = join(mkdtempSync(join(tmpdir(), 'acars-stream-')), 'out');
  });

  afterEach(async () => {
    await service.stop();
    rmSync(join(outputDir, '..'), { recursive: true, force: true });
  });

  it('should bind one socket per port on the configured host', async () => {
    await service.start(settings());

    const [first, second] = sockets();
    expect(sockets()).toHaveLength(2);
    expect(first.bind).toHaveBeenCalledWith(15550, '127.0.0.1');
    expect(second.bind).toHaveBeenCalledWith(15551, '127.0.0.1');
    expect(service.getStatus()).toMatchObject({ running: true, host: '127.0.0.1' });
  });

  it('should write a message once the next header arrives on the same port', async () => {
    await service.start(settings());
    const [first] = sockets();

    send(first, `${M1}\n`);
    send(first, `${M2}\n`);
    await service.stop();

    expect(readdirSync(outputDir)).toEqual(['acars_label_H1.txt']);
    expect(read('acars_label_H1.txt')).toBe(M1);
  });

  it('should keep a separate buffer per port', async () => {
    await service.start(settings());
    const [first, second] = sockets();

    send(first, `${M1}\n`);
    send(second, `${M2}\n`);
    expect(service.getStatus().ports.map((port) => port.messagesProcessed)).toEqual([0, 0]);

    send(second, `${M3}\n`);
    await service.stop();

    expect(readdirSync(outputDir)).toEqual(['acars_label_5Z.txt']);
    expect(read('acars_label_5Z.txt')).toBe(M2);
  });

  it('should append to existing bucket files', async () => {
    await service.start(settings({ splitBy: 'tail' }));
    writeFileSync(join(outputDir, 'acars_tail_N123AB.txt'), 'archived message');

    service.handleDatagram(15550, Buffer.from(`${M2}\n${M3}\n${M1}`));
    await service.stop();

    expect(read('acars_tail_N123AB.txt')).toBe(`archived message\n\n${M2}\n\n${M3}`);
  });

  it('should route keyword misses to their own bucket', async () => {
    await service.start(settings({ splitBy: 'keyword', keyword: 'climb' }));

    service.handleDatagram(15550, Buffer.from(`${M1}\n${M2}\n${M3}`));
    await service.stop();

    expect(read('acars_containing_climb.txt')).toBe(M1);
    expect(read('acars_not_containing_climb.txt')).toBe(M2);
  });

  it('should flush a stale trailing message when the buffer times out', async () => {
    await service.start(settings({ ports: [15550] }));

    expect(service.handleDatagram(15550, Buffer.from(M3))).toBe(0);
    expect(service.checkTimeouts(Date.now())).toBe(0);
    expect(service.checkTimeouts(Date.now() + 121_000)).toBe(1);
    await service.stop();

    expect(read('acars_label_H1.txt')).toBe(M3);
  });

  it('should drop datagrams that are not valid UTF-8', async () => {
    await service.start(settings({ ports: [15550] }));

    expect(service.handleDatagram(15550, Buffer.from([0xff, 0xfe, 0xfd]))).toBe(0);
    expect(service.getStatus().ports[0].bufferedChars).toBe(0);
  });

  it('should ignore datagrams for ports it does not listen on', async () => {
    await service.start(settings({ ports: [15550] }));
    expect(service.handleDatagram(16000, Buffer.from(M1))).toBe(0);
  });

  it('should reject start and stay stopped when a port cannot be bound', async () => {
    await expect(service.start(settings({ ports: [15550, BUSY_PORT] }))).rejects.toThrow(
      `Failed to bind UDP 127.0.0.1:${BUSY_PORT}: bind EADDRINUSE`,
    );
    expect(service.getStatus()).toEqual({
      running: false,
      host: null,
      ports: [],
      lastError: 'bind EADDRINUSE',
    });
  });

  it('should refuse to start twice', async () => {
    await service.start(settings());
    await expect(service.start(settings())).rejects.toThrow(
      'ACARS stream listener is already running',
    );
  });

  it('should refuse a second start while the first is still binding', async () => {
    const first = service.start(settings());
    const second = service.start(settings());

    await expect(second).rejects.toThrow('ACARS stream listener is already running');
    await expect(first).resolves.toBeUndefined();
    expect(sockets()).toHaveLength(2);
  });

  it('should close idle bucket files on the timeout check', async () => {
    const evictIdle = jest.spyOn(BucketWriter.prototype, 'evictIdle');
    await service.start(settings({ ports: [15550] }));
    const now = Date.now();

    service.checkTimeouts(now);

    expect(evictIdle).toHaveBeenCalledWith(now - IDLE_BUCKET_MS);
    evictIdle.mockRestore();
  });
});
