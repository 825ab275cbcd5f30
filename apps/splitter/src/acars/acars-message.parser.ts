import type { AcarsHeader } from './acars.types';

// Jaero output format 3 header, e.g.
// 00:16:25 18-03-25 UTC AES:E4920F GES:D0 2 ..PTZNG 2 52 A
export const HEADER_TIMESTAMP = /^\d{2}:\d{2}:\d{2} \d{2}-\d{2}-\d{2} UTC/m;

const HEADER_TIMESTAMPS = new RegExp(HEADER_TIMESTAMP.source, 'gm');
const HEADER_LINE = new RegExp(HEADER_TIMESTAMP.source);
const HEADER_LABEL_INDEX = 8;
const ALPHANUMERIC = /^[A-Za-z0-9]+$/;

/**
 * Returns the offset of every line that opens a new message.
 */
export function findMessageStarts(content: string): number[] {
  const starts: number[] = [];
  for (const match of content.matchAll(HEADER_TIMESTAMPS)) {
    if (match.index !== undefined) {
      starts.push(match.index);
    }
  }
  return starts;
}

/**
 * Slices a log into messages. Each message runs from its header timestamp up to
 * the next one (or the end of input); anything before the first header is dropped.
 */
export function splitMessages(content: string): string[] {
  const starts = findMessageStarts(content);
  return starts.map((start, index) => {
    const end = index + 1 < starts.length ? starts[index + 1] : content.length;
    return content.slice(start, end).trim();
  });
}

export function parseHeader(message: string): AcarsHeader | null {
  const firstLine = message.split('\n')[0]?.trim() ?? '';
  if (!HEADER_LINE.test(firstLine)) {
    return null;
  }

  const parts = firstLine.split(/\s+/);
  const field = (index: number): string | null => parts[index] ?? null;

  const aes = field(3);
  const ges = field(4);
  const tail = field(6)?.replace(/^\.+/, '') || null;
  const label = field(HEADER_LABEL_INDEX);

  return {
    time: parts[0],
    date: parts[1],
    aes: aes?.startsWith('AES:') ? aes.slice(4) : null,
    ges: ges?.startsWith('GES:') ? ges.slice(4) : null,
    tail,
    label: label && ALPHANUMERIC.test(label) ? label : null,
  };
}
