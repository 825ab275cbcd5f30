import fs from 'node:fs';
import path from 'node:path';

import type { BucketSummary } from '../acars/acars.types';

export type BucketWriteMode = 'append' | 'truncate';

export const MESSAGE_SEPARATOR = '\n\n';

export interface BucketWriterOptions {
  mode: BucketWriteMode;
  onError?: (filePath: string, error: Error) => void;
}

interface BucketHandle {
  stream: fs.WriteStream;
  lastWriteAt: number;
}

interface BucketState {
  hasContent: boolean;
  messages: number;
}

function hasFileContent(filePath: string): boolean {
  if (!fs.existsSync(filePath)) {
    return false;
  }
  const stats = fs.statSync(filePath);
  return stats.isFile() && stats.size > 0;
}

/**
 * Routes messages to one file per bucket. A file is opened the first time a
 * message is routed to it and stays open until {@link BucketWriter.close} or
 * {@link BucketWriter.evictIdle}. A stream that fails is dropped, and the next
 * message for that bucket opens the file again.
 */
export class BucketWriter {
  private readonly handles = new Map<string, BucketHandle>();
  private readonly buckets = new Map<string, BucketState>();
  private readonly errors: Error[] = [];
  private closed = false;

  constructor(
    private readonly outputDir: string,
    private readonly options: BucketWriterOptions,
  ) {}

  write(fileName: string, message: string, now: number = Date.now()): void {
    if (this.closed) {
      throw new Error(`Bucket writer for ${this.outputDir} is closed`);
    }

    const handle = this.handles.get(fileName) ?? this.open(fileName);
    const bucket = this.bucket(fileName);
    handle.stream.write(bucket.hasContent ? `${MESSAGE_SEPARATOR}${message}` : message);
    handle.lastWriteAt = now;
    bucket.hasContent = true;
    bucket.messages += 1;
  }

  get openBuckets(): number {
    return this.handles.size;
  }

  /** Stream errors seen so far, in the order they happened. */
  get failures(): readonly Error[] {
    return this.errors;
  }

  summary(): BucketSummary[] {
    return Array.from(this.buckets.entries()).map(([fileName, bucket]) => ({
      file: path.join(this.outputDir, fileName),
      messages: bucket.messages,
    }));
  }

  /**
   * Closes the streams of buckets that have not been written since `idleSince`.
   * Resolves with the number of buckets closed.
   */
  async evictIdle(idleSince: number): Promise<number> {
    const idle = Array.from(this.handles.entries()).filter(
      ([, handle]) => handle.lastWriteAt < idleSince,
    );
    for (const [fileName] of idle) {
      this.handles.delete(fileName);
    }

    await Promise.all(idle.map(([, handle]) => this.end(handle)));
    return idle.length;
  }

  /**
   * Flushes and closes every stream. Rejects with the first stream error, if
   * any happened, once all streams are closed.
   */
  async close(): Promise<BucketSummary[]> {
    if (this.closed) {
      return this.summary();
    }
    this.closed = true;

    const handles = Array.from(this.handles.values());
    this.handles.clear();
    await Promise.all(handles.map((handle) => this.end(handle)));

    if (this.errors.length > 0) {
      throw this.errors[0];
    }
    return this.summary();
  }

  private bucket(fileName: string): BucketState {
    const bucket = this.buckets.get(fileName);
    if (bucket) {
      return bucket;
    }
    const created: BucketState = { hasContent: false, messages: 0 };
    this.buckets.set(fileName, created);
    return created;
  }

  private open(fileName: string): BucketHandle {
    const filePath = path.join(this.outputDir, fileName);
    fs.mkdirSync(this.outputDir, { recursive: true });

    // Only the first open of a bucket in truncate mode recreates the file;
    // later opens continue whatever is on disk.
    const truncate = this.options.mode === 'truncate' && !this.buckets.has(fileName);
    this.bucket(fileName).hasContent = !truncate && hasFileContent(filePath);
    const stream = fs.createWriteStream(filePath, { flags: truncate ? 'w' : 'a' });

    const handle: BucketHandle = { stream, lastWriteAt: 0 };
    stream.on('error', (error: Error) => {
      this.errors.push(error);
      if (this.handles.get(fileName) === handle) {
        this.handles.delete(fileName);
      }
      this.options.onError?.(filePath, error);
    });

    this.handles.set(fileName, handle);
    return handle;
  }

  private end(handle: BucketHandle): Promise<void> {
    return new Promise<void>((resolve) => {
      if (handle.stream.destroyed) {
        resolve();
        return;
      }
      handle.stream.once('error', () => resolve());
      handle.stream.end(() => resolve());
    });
  }
}
