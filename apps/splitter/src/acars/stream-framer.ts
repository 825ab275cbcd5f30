import { findMessageStarts } from './acars-message.parser';

const utf8 = new TextDecoder('utf-8', { fatal: true });

/**
 * Strict UTF-8 decode; returns null for datagrams with invalid byte sequences.
 */
export function decodeDatagram(data: Uint8Array): string | null {
  try {
    return utf8.decode(data);
  } catch {
    return null;
  }
}

/**
 * Reassembles a text stream into complete messages. A message is complete
 * once the next header timestamp has arrived; the trailing one stays buffered
 * until then or until {@link StreamFramer.flushStale} gives up waiting.
 */
export class StreamFramer {
  private buffer = '';
  private lastEmitAt: number;
  private emitted = 0;

  constructor(now: number = Date.now()) {
    this.lastEmitAt = now;
  }

  push(text: string, now: number = Date.now()): string[] {
    this.buffer += text;

    const starts = findMessageStarts(this.buffer);
    if (starts.length < 2) {
      return [];
    }

    const messages: string[] = [];
    for (let index = 0; index < starts.length - 1; index += 1) {
      messages.push(this.buffer.slice(starts[index], starts[index + 1]).trim());
    }

    this.buffer = this.buffer.slice(starts[starts.length - 1]);
    this.markEmitted(messages.length, now);
    return messages;
  }

  flushStale(timeoutMs: number, now: number = Date.now()): string | null {
    if (!this.buffer || now - this.lastEmitAt <= timeoutMs * 2) {
      return null;
    }

    const starts = findMessageStarts(this.buffer);
    if (starts.length === 0) {
      return null;
    }

    const message = this.buffer.slice(starts[0]).trim();
    this.buffer = '';
    this.markEmitted(1, now);
    return message;
  }

  get pending(): number {
    return this.buffer.length;
  }

  get messagesEmitted(): number {
    return this.emitted;
  }

  get lastEmittedAt(): number {
    return this.lastEmitAt;
  }

  private markEmitted(count: number, now: number): void {
    this.emitted += count;
    this.lastEmitAt = now;
  }
}
