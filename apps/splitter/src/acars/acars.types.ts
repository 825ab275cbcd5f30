export const SPLIT_CRITERIA = ['label', 'tail', 'type', 'keyword'] as const;

export type SplitCriterion = (typeof SPLIT_CRITERIA)[number];

export type AcarsMessageType = 'CPDLC' | 'ADS-C' | 'MIAM' | 'OTHER';

export interface AcarsHeader {
  time: string;
  date: string;
  aes: string | null;
  ges: string | null;
  tail: string | null;
  label: string | null;
}

export interface SplitRule {
  splitBy: SplitCriterion;
  keyword?: string | null;
}

export interface LogSplitRequest extends SplitRule {
  inputFile: string;
  outputDir: string;
}

export interface BucketSummary {
  file: string;
  messages: number;
}

export interface SplitSummary {
  total: number;
  classified: number;
  unclassified: number;
  files: BucketSummary[];
}

export interface StreamSettings extends SplitRule {
  host: string;
  ports: number[];
  outputDir: string;
  bufferTimeout: number;
}

export interface PortStatus {
  port: number;
  bufferedChars: number;
  messagesProcessed: number;
  lastProcessedAt: string | null;
}

export interface StreamStatus {
  running: boolean;
  host: string | null;
  ports: PortStatus[];
  lastError: string | null;
}
