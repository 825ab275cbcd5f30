import { Injectable, Logger } from '@nestjs/common';
import { existsSync, statSync } from 'node:fs';
import { mkdir, readFile } from 'node:fs/promises';

import { AcarsInputError } from './acars.errors';
import type { LogSplitRequest, SplitSummary } from './acars.types';
import { splitMessages } from './acars-message.parser';
import { classify, isClassified } from './message-classifier';
import { bucketFileName } from '../output/bucket-naming';
import { BucketWriter } from '../output/bucket-writer';
import { describeError } from '../utils/errors';

const emptySummary = (total = 0): SplitSummary => ({
  total,
  classified: 0,
  unclassified: total,
  files: [],
});

@Injectable()
export class LogFileSplitterService {
  private readonly logger = new Logger(LogFileSplitterService.name);

  async split(request: LogSplitRequest): Promise<SplitSummary> {
    const { inputFile } = request;

    if (!existsSync(inputFile) || !statSync(inputFile).isFile()) {
      throw new AcarsInputError(`Input file '${inputFile}' not found.`, inputFile);
    }

    try {
      return await this.splitFile(request);
    } catch (error) {
      throw new AcarsInputError(`Error processing file: ${describeError(error)}`, inputFile);
    }
  }

  private async splitFile(request: LogSplitRequest): Promise<SplitSummary> {
    const { inputFile, outputDir, splitBy } = request;
    await mkdir(outputDir, { recursive: true });

    const content = await readFile(inputFile, 'utf-8');
    const messages = splitMessages(content);
    if (messages.length === 0) {
      this.logger.warn(
        "Can't distinguish headers--bad formatting? Set JAERO to output format 3.",
      );
      return emptySummary();
    }

    // Buckets keep first-seen order; unclassified messages are written last.
    const groups = new Map<string, string[]>();
    const unclassified: string[] = [];

    for (const message of messages) {
      const key = classify(message, request);
      if (key !== null && isClassified(key, request)) {
        const group = groups.get(key);
        if (group) {
          group.push(message);
        } else {
          groups.set(key, [message]);
        }
      } else {
        unclassified.push(message);
      }
    }

    if (groups.size === 0) {
      this.logger.warn(`No messages could be classified by ${splitBy}.`);
      return emptySummary(messages.length);
    }

    const writer = new BucketWriter(outputDir, { mode: 'truncate' });
    for (const [key, group] of groups) {
      const fileName = bucketFileName(splitBy, key);
      for (const message of group) {
        writer.write(fileName, message);
      }
    }

    if (unclassified.length > 0) {
      // Keyword misses land in acars_not_containing_<keyword>.txt.
      const fileName =
        splitBy === 'keyword' && request.keyword
          ? bucketFileName(splitBy, `not_containing_${request.keyword}`)
          : bucketFileName(splitBy, null);
      for (const message of unclassified) {
        writer.write(fileName, message);
      }
    }

    const files = await writer.close();
    for (const { file, messages: count } of files) {
      this.logger.log(`Created ${file} with ${count} messages`);
    }

    return {
      total: messages.length,
      classified: messages.length - unclassified.length,
      unclassified: unclassified.length,
      files,
    };
  }
}
