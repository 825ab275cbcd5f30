import { join } from 'node:path';

import type { SplitCriterion } from '../acars/acars.types';
import { sanitizeFileComponent } from '../utils/sanitize';

export const UNCLASSIFIED_FILE = 'acars_unclassified.txt';

const PREFIXES: Record<SplitCriterion, string> = {
  label: 'acars_label_',
  tail: 'acars_tail_',
  type: 'acars_type_',
  keyword: 'acars_',
};

export function bucketFileName(splitBy: SplitCriterion, key: string | null): string {
  if (!key) {
    return UNCLASSIFIED_FILE;
  }
  return `${PREFIXES[splitBy]}${sanitizeFileComponent(key)}.txt`;
}

export function bucketFilePath(
  outputDir: string,
  splitBy: SplitCriterion,
  key: string | null,
): string {
  return join(outputDir, bucketFileName(splitBy, key));
}
