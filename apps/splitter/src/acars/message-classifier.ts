import { parseHeader } from './acars-message.parser';
import type { AcarsMessageType, SplitRule } from './acars.types';

const LABEL_MARKER = /!\s+([A-Za-z0-9]{2})\s+[A-Za-z0-9]/;
const TAIL_AFTER_GES = /AES:[A-F0-9]+\s+GES:[A-Z0-9]+\s+\d+\s+(\.*[A-Za-z0-9-]+)/;

export function extractLabel(message: string): string | null {
  const match = LABEL_MARKER.exec(message);
  if (match) {
    return match[1];
  }
  return parseHeader(message)?.label ?? null;
}

export function extractTailNumber(message: string): string | null {
  const match = TAIL_AFTER_GES.exec(message);
  if (!match) {
    return null;
  }
  const tail = match[1].replace(/^\.+|\.+$/g, '');
  return tail.length > 0 ? tail : null;
}

// First family found wins.
export function determineMessageType(message: string): AcarsMessageType {
  if (message.includes('FANS-1/A CPDLC')) {
    return 'CPDLC';
  }
  if (message.includes('ADS-C')) {
    return 'ADS-C';
  }
  if (message.includes('MIAM')) {
    return 'MIAM';
  }
  return 'OTHER';
}

export function containsKeyword(message: string, keyword: string): boolean {
  return message.toLowerCase().includes(keyword.toLowerCase());
}

/**
 * Bucket key for a message under the given rule, or null when the message
 * cannot be classified. Keyword rules always classify: a message either
 * contains the keyword or it doesn't.
 */
export function classify(message: string, rule: SplitRule): string | null {
  switch (rule.splitBy) {
    case 'label':
      return extractLabel(message);
    case 'tail':
      return extractTailNumber(message);
    case 'type':
      return determineMessageType(message);
    case 'keyword': {
      const keyword = rule.keyword ?? '';
      if (!keyword) {
        return null;
      }
      return containsKeyword(message, keyword)
        ? `containing_${keyword}`
        : `not_containing_${keyword}`;
    }
  }
}

/**
 * A keyword miss still gets a bucket, but for log splitting it counts as
 * unclassified.
 */
export function isClassified(key: string | null, rule: SplitRule): boolean {
  if (key === null) {
    return false;
  }
  return rule.splitBy !== 'keyword' || key.startsWith('containing_');
}
