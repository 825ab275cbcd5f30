#!/usr/bin/env node
import 'reflect-metadata';

import { bootstrap } from './bootstrap';
import { parseCliArgs } from './cli/cli-options';
import { runCommand } from './cli/run-command';
import { describeError } from './utils/errors';

async function main(): Promise<void> {
  const command = parseCliArgs(process.argv.slice(2));

  if (command.silent || process.env.SILENT === 'true') {
    process.env.SILENT = 'true';
    process.env.LOG_LEVEL = 'error';
  }

  const app = await bootstrap();
  try {
    await runCommand(app, command);
  } finally {
    await app.close();
  }
}

main()
  .then(() => process.exit(0))
  .catch((error: unknown) => {
    console.error(`[acars-split] ${describeError(error)}`);
    process.exit(1);
  });
