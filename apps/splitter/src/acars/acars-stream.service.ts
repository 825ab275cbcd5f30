import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { createSocket, type Socket } from 'node:dgram';
import { mkdir } from 'node:fs/promises';
import { clearInterval as clearIntervalSafe, setInterval as setIntervalSafe } from 'node:timers';

import type { PortStatus, StreamSettings, StreamStatus } from './acars.types';
import { classify } from './message-classifier';
import { decodeDatagram, StreamFramer } from './stream-framer';
import { bucketFileName } from '../output/bucket-naming';
import { BucketWriter } from '../output/bucket-writer';
import { describeError } from '../utils/errors';

// Bucket files not written for this long are closed until their next message.
export const IDLE_BUCKET_MS = 10 * 60 * 1000;

interface PortListener {
  port: number;
  socket: Socket | null;
  framer: StreamFramer;
  lastProcessedAt: string | null;
}

@Injectable()
export class AcarsStreamService implements OnModuleDestroy {
  private readonly logger = new Logger(AcarsStreamService.name);
  private settings: StreamSettings | null = null;
  private writer: BucketWriter | null = null;
  private listeners: Map<number, PortListener> = new Map();
  private timer: NodeJS.Timeout | null = null;
  private lastError: string | null = null;
  private starting = false;

  async start(settings: StreamSettings): Promise<void> {
    if (this.settings || this.starting) {
      throw new Error('ACARS stream listener is already running');
    }
    if (settings.ports.length === 0) {
      throw new Error('No UDP ports specified');
    }

    this.starting = true;
    try {
      await this.open(settings);
    } finally {
      this.starting = false;
    }
  }

  private async open(settings: StreamSettings): Promise<void> {
    await mkdir(settings.outputDir, { recursive: true });
    this.settings = settings;
    this.writer = new BucketWriter(settings.outputDir, {
      mode: 'append',
      onError: (file, error) => {
        this.lastError = error.message;
        this.logger.error(`Failed to write ${file}: ${error.message}`);
      },
    });

    this.logConfiguration(settings);

    const now = Date.now();
    for (const port of settings.ports) {
      this.listeners.set(port, {
        port,
        socket: null,
        framer: new StreamFramer(now),
        lastProcessedAt: null,
      });
    }

    try {
      await Promise.all(settings.ports.map((port) => this.bindPort(settings.host, port)));
    } catch (error) {
      await this.stop();
      throw error;
    }

    this.timer = setIntervalSafe(() => {
      this.checkTimeouts();
    }, settings.bufferTimeout * 1000);
  }

  async stop(): Promise<void> {
    if (this.timer) {
      clearIntervalSafe(this.timer);
      this.timer = null;
    }

    await Promise.all(
      Array.from(this.listeners.values()).map((listener) => this.closeSocket(listener)),
    );
    this.listeners.clear();

    const writer = this.writer;
    this.writer = null;
    this.settings = null;
    if (writer) {
      await writer.close();
    }
  }

  async onModuleDestroy(): Promise<void> {
    await this.stop();
  }

  getStatus(): StreamStatus {
    const ports: PortStatus[] = Array.from(this.listeners.values()).map((listener) => ({
      port: listener.port,
      bufferedChars: listener.framer.pending,
      messagesProcessed: listener.framer.messagesEmitted,
      lastProcessedAt: listener.lastProcessedAt,
    }));

    return {
      running: this.settings !== null,
      host: this.settings?.host ?? null,
      ports,
      lastError: this.lastError,
    };
  }

  handleDatagram(port: number, data: Uint8Array, now: number = Date.now()): number {
    const listener = this.listeners.get(port);
    if (!listener) {
      this.logger.warn(`Dropping datagram for unknown port ${port}`);
      return 0;
    }

    const text = decodeDatagram(data);
    if (text === null) {
      this.logger.warn(`Received data on port ${port} that could not be decoded as UTF-8`);
      return 0;
    }

    const messages = listener.framer.push(text, now);
    for (const message of messages) {
      this.route(listener, message, now, false);
    }
    return messages.length;
  }

  checkTimeouts(now: number = Date.now()): number {
    if (!this.settings) {
      return 0;
    }

    const timeoutMs = this.settings.bufferTimeout * 1000;
    let flushed = 0;
    for (const listener of this.listeners.values()) {
      const message = listener.framer.flushStale(timeoutMs, now);
      if (message !== null) {
        this.route(listener, message, now, true);
        flushed += 1;
      }
    }

    if (this.writer) {
      void this.writer.evictIdle(now - IDLE_BUCKET_MS).catch((error) => {
        this.logger.warn(`Failed to close idle bucket files: ${describeError(error)}`);
      });
    }
    return flushed;
  }

  private route(listener: PortListener, message: string, now: number, timedOut: boolean): void {
    if (!this.settings || !this.writer) {
      return;
    }

    const { splitBy } = this.settings;
    const key = classify(message, this.settings);
    this.writer.write(bucketFileName(splitBy, key), message, now);
    listener.lastProcessedAt = new Date(now).toISOString();

    const kind = timedOut ? 'timeout message' : 'message';
    this.logger.log(
      `Port ${listener.port}: Processed ${kind} with ${splitBy}: ${key ?? 'unclassified'}`,
    );
  }

  private bindPort(host: string, port: number): Promise<void> {
    const listener = this.listeners.get(port);
    if (!listener) {
      return Promise.reject(new Error(`No listener registered for port ${port}`));
    }

    return new Promise<void>((resolve, reject) => {
      const socket = createSocket('udp4');
      listener.socket = socket;

      const onBindError = (error: Error) => {
        this.lastError = error.message;
        reject(new Error(`Failed to bind UDP ${host}:${port}: ${error.message}`));
      };
      socket.once('error', onBindError);

      socket.on('message', (msg) => {
        try {
          this.handleDatagram(port, msg);
        } catch (error) {
          this.lastError = describeError(error);
          this.logger.error(`Failed to process datagram on port ${port}: ${this.lastError}`);
        }
      });

      socket.on('listening', () => {
        socket.off('error', onBindError);
        socket.on('error', (error) => {
          this.lastError = error.message;
          this.logger.error(`ACARS UDP socket error on port ${port}: ${error.message}`);
        });
        this.logger.log(`Listening for ACARS messages on ${host}:${port}...`);
        resolve();
      });

      socket.bind(port, host);
    });
  }

  private closeSocket(listener: PortListener): Promise<void> {
    const socket = listener.socket;
    if (!socket) {
      return Promise.resolve();
    }
    listener.socket = null;

    return new Promise<void>((resolve) => {
      try {
        socket.close(() => resolve());
      } catch (error) {
        // close() throws when the socket never finished binding
        this.logger.debug(
          `UDP socket on port ${listener.port} already closed: ${describeError(error)}`,
        );
        resolve();
      }
    });
  }

  private logConfiguration(settings: StreamSettings): void {
    this.logger.log('ACARS Message Processor Configuration:');
    this.logger.log(`  Host: ${settings.host}`);
    this.logger.log(`  Ports: ${settings.ports.join(', ')}`);
    this.logger.log(`  Output Directory: ${settings.outputDir}`);
    this.logger.log(`  Split by: ${settings.splitBy}`);
    if (settings.splitBy === 'keyword') {
      this.logger.log(`  Keyword: ${settings.keyword ?? ''}`);
    }
    this.logger.log(`  Buffer Timeout: ${settings.bufferTimeout} seconds`);
  }
}
