import { type INestApplicationContext, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

import type { CliCommand, FileCommand, ListenCommand, StreamsCommand } from './cli-options';
import { AcarsStreamService } from '../acars/acars-stream.service';
import type { SplitSummary, StreamSettings } from '../acars/acars.types';
import { LogFileSplitterService } from '../acars/log-file-splitter.service';
import {
  loadStreamConfig,
  resolveSplitCriterion,
  type StreamDefaults,
  validateStreamSettings,
} from '../config/stream-config';

const logger = new Logger('AcarsSplit');

export function resolveDefaults(config: ConfigService): StreamDefaults {
  return {
    host: config.get<string>('acars.host', '127.0.0.1'),
    outputDir: config.get<string>('acars.outputDir', 'acars_split'),
    bufferTimeout: config.get<number>('acars.bufferTimeout', 60),
  };
}

export function listenSettings(command: ListenCommand, defaults: StreamDefaults): StreamSettings {
  const splitBy = resolveSplitCriterion(command.splitBy, command.keyword);
  return validateStreamSettings({
    host: command.host ?? defaults.host,
    ports: command.ports,
    outputDir: command.outputDir ?? defaults.outputDir,
    bufferTimeout: command.bufferTimeout ?? defaults.bufferTimeout,
    splitBy,
    keyword: splitBy === 'keyword' ? command.keyword : null,
  });
}

function waitForShutdownSignal(): Promise<NodeJS.Signals> {
  return new Promise((resolve) => {
    process.once('SIGINT', () => resolve('SIGINT'));
    process.once('SIGTERM', () => resolve('SIGTERM'));
  });
}

async function runFile(app: INestApplicationContext, command: FileCommand): Promise<SplitSummary> {
  const defaults = resolveDefaults(app.get(ConfigService));
  return app.get(LogFileSplitterService).split({
    inputFile: command.inputFile,
    outputDir: command.outputDir ?? defaults.outputDir,
    splitBy: command.splitBy,
    keyword: command.keyword,
  });
}

async function runListener(app: INestApplicationContext, settings: StreamSettings): Promise<void> {
  const streams = app.get(AcarsStreamService);
  await streams.start(settings);
  logger.log('Press Ctrl+C to stop');

  const signal = await waitForShutdownSignal();
  logger.log(`Exiting... (${signal})`);
  await streams.stop();
}

async function streamsSettings(
  app: INestApplicationContext,
  command: StreamsCommand,
): Promise<StreamSettings> {
  return loadStreamConfig(command.configFile, resolveDefaults(app.get(ConfigService)));
}

export async function runCommand(app: INestApplicationContext, command: CliCommand): Promise<void> {
  switch (command.command) {
    case 'file': {
      const summary = await runFile(app, command);
      logger.log(
        `Split ${summary.total} messages (${summary.classified} classified) ` +
          `into ${summary.files.length} files`,
      );
      return;
    }
    case 'listen':
      await runListener(app, listenSettings(command, resolveDefaults(app.get(ConfigService))));
      return;
    case 'streams':
      await runListener(app, await streamsSettings(app, command));
      return;
  }
}
