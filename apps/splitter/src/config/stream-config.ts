import { Logger } from '@nestjs/common';
import { readFile } from 'node:fs/promises';
import { z } from 'zod';

import { AcarsConfigError } from '../acars/acars.errors';
import { SPLIT_CRITERIA, type SplitCriterion, type StreamSettings } from '../acars/acars.types';
import { describeError } from '../utils/errors';

export type StreamDefaults = Pick<StreamSettings, 'host' | 'outputDir' | 'bufferTimeout'>;

export const STREAM_DEFAULTS: StreamDefaults = {
  host: '127.0.0.1',
  outputDir: 'acars_split',
  bufferTimeout: 60,
};

const portSchema = z.number().int().min(1).max(65535);
const bufferTimeoutSchema = z.number().positive();

const streamConfigSchema = z.object({
  host: z.string().min(1).optional(),
  ports: z.array(portSchema).optional(),
  output_dir: z.string().min(1).optional(),
  buffer_timeout: bufferTimeoutSchema.optional(),
  split_by: z.string().optional(),
  keyword: z.string().nullable().optional(),
});

export type StreamConfigFile = z.infer<typeof streamConfigSchema>;

const logger = new Logger('StreamConfig');

function isSplitCriterion(value: string): value is SplitCriterion {
  return SPLIT_CRITERIA.some((criterion) => criterion === value);
}

export function resolveSplitCriterion(
  splitBy: string | undefined,
  keyword: string | null | undefined,
): SplitCriterion {
  const requested = splitBy ?? 'label';
  if (!isSplitCriterion(requested)) {
    logger.warn(`Invalid split_by value: '${requested}'. Using 'label' instead.`);
    return 'label';
  }
  if (requested === 'keyword' && !keyword) {
    logger.warn("split_by is 'keyword' but no keyword specified. Using 'label' instead.");
    return 'label';
  }
  return requested;
}

export function parseStreamConfig(
  raw: unknown,
  defaults: StreamDefaults = STREAM_DEFAULTS,
): StreamSettings {
  const parsed = streamConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new AcarsConfigError(
      `Invalid stream configuration: ${JSON.stringify(parsed.error.flatten().fieldErrors)}`,
    );
  }

  const config = parsed.data;
  if (!config.ports || config.ports.length === 0) {
    throw new AcarsConfigError('No UDP ports specified in the configuration file');
  }

  const splitBy = resolveSplitCriterion(config.split_by, config.keyword);
  return {
    host: config.host ?? defaults.host,
    ports: Array.from(new Set(config.ports)),
    outputDir: config.output_dir ?? defaults.outputDir,
    bufferTimeout: config.buffer_timeout ?? defaults.bufferTimeout,
    splitBy,
    keyword: splitBy === 'keyword' ? config.keyword : null,
  };
}

const listenerOptionsSchema = z.object({
  ports: z.array(portSchema).min(1),
  bufferTimeout: bufferTimeoutSchema,
});

/**
 * Applies the config file's port and timeout rules to settings built from
 * command-line options.
 */
export function validateStreamSettings(settings: StreamSettings): StreamSettings {
  const parsed = listenerOptionsSchema.safeParse(settings);
  if (!parsed.success) {
    throw new AcarsConfigError(
      `Invalid listener settings: ${JSON.stringify(parsed.error.flatten().fieldErrors)}`,
    );
  }
  return { ...settings, ports: Array.from(new Set(settings.ports)) };
}

export async function loadStreamConfig(
  configPath: string,
  defaults: StreamDefaults = STREAM_DEFAULTS,
): Promise<StreamSettings> {
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(configPath, 'utf-8'));
  } catch (error) {
    throw new AcarsConfigError(
      `Failed to read configuration file '${configPath}': ${describeError(error)}`,
      configPath,
    );
  }

  try {
    return parseStreamConfig(raw, defaults);
  } catch (error) {
    if (error instanceof AcarsConfigError) {
      throw new AcarsConfigError(error.message, configPath);
    }
    throw error;
  }
}
