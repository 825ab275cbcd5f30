import { ArgumentParser } from 'argparse';

import { SPLIT_CRITERIA, type SplitCriterion } from '../acars/acars.types';

export interface FileCommand {
  command: 'file';
  inputFile: string;
  outputDir: string | null;
  splitBy: SplitCriterion;
  keyword: string | null;
  silent: boolean;
}

export interface ListenCommand {
  command: 'listen';
  host: string | null;
  ports: number[];
  outputDir: string | null;
  bufferTimeout: number | null;
  splitBy: SplitCriterion;
  keyword: string | null;
  silent: boolean;
}

export interface StreamsCommand {
  command: 'streams';
  configFile: string;
  silent: boolean;
}

export type CliCommand = FileCommand | ListenCommand | StreamsCommand;

interface ParsedArgs {
  command?: CliCommand['command'] | null;
  silent?: boolean;
  input_file?: string;
  config_file?: string;
  output_dir?: string | null;
  by_label?: boolean;
  by_tail?: boolean;
  by_type?: boolean;
  keyword?: string | null;
  address?: string | null;
  port?: number[] | null;
  timeout?: number | null;
  split_by?: SplitCriterion | null;
}

function buildParser(): ArgumentParser {
  const parser = new ArgumentParser({
    prog: 'acars-split',
    description: 'Split ACARS messages into per-bucket files by label, tail, type or keyword.',
  });

  const common = new ArgumentParser({ add_help: false });
  common.add_argument('--silent', {
    action: 'store_true',
    help: 'Only log errors',
  });

  const commands = parser.add_subparsers({ dest: 'command' });

  const file = commands.add_parser('file', {
    parents: [common],
    help: 'Split a Jaero log file',
    description: 'Split ACARS log by various criteria.',
  });
  file.add_argument('input_file', { help: 'Path to the ACARS log file' });
  file.add_argument('-o', '--output-dir', {
    help: 'Directory to store output files (default: acars_split)',
  });
  const criteria = file.add_mutually_exclusive_group();
  criteria.add_argument('-l', '--by-label', {
    action: 'store_true',
    help: 'Split messages by label (default)',
  });
  criteria.add_argument('-t', '--by-tail', {
    action: 'store_true',
    help: 'Split messages by aircraft tail number',
  });
  criteria.add_argument('-m', '--by-type', {
    action: 'store_true',
    help: 'Split messages by type (CPDLC, ADS-C, MIAM, OTHER)',
  });
  criteria.add_argument('-k', '--keyword', {
    metavar: 'KEYWORD',
    help: 'Extract messages containing specific keyword',
  });

  const listen = commands.add_parser('listen', {
    parents: [common],
    help: 'Listen for ACARS messages on one or more UDP ports',
    description: 'Listen for ACARS messages via UDP and split them into files.',
  });
  listen.add_argument('-a', '--address', {
    help: 'IP address to listen on (default: 127.0.0.1)',
  });
  listen.add_argument('-p', '--port', {
    action: 'append',
    type: 'int',
    required: true,
    help: 'UDP port to listen on (repeat for several ports)',
  });
  listen.add_argument('-o', '--output-dir', {
    help: 'Directory to store output files (default: acars_split)',
  });
  listen.add_argument('-t', '--timeout', {
    type: 'int',
    help: 'Buffer timeout in seconds (default: 60)',
  });
  listen.add_argument('--split-by', {
    choices: [...SPLIT_CRITERIA],
    default: 'label',
    help: 'Criterion to split by (default: label)',
  });
  listen.add_argument('-k', '--keyword', {
    help: 'Keyword to match when splitting by keyword',
  });

  const streams = commands.add_parser('streams', {
    parents: [common],
    help: 'Listen on the UDP ports named in a JSON config file',
    description: 'Multi-port ACARS message processor driven by a JSON config file.',
  });
  streams.add_argument('config_file', { help: 'Path to the JSON configuration file' });

  return parser;
}

function fileCriterion(args: ParsedArgs): SplitCriterion {
  if (args.by_tail) {
    return 'tail';
  }
  if (args.by_type) {
    return 'type';
  }
  if (args.keyword) {
    return 'keyword';
  }
  return 'label';
}

export function parseCliArgs(argv: string[]): CliCommand {
  const cleaned = argv.length > 0 && argv[0] === '--' ? argv.slice(1) : argv;
  const parser = buildParser();
  const args = parser.parse_args(cleaned) as ParsedArgs;
  const silent = Boolean(args.silent);

  if (!args.command) {
    parser.print_help();
    throw new Error('A command is required: file, listen or streams');
  }

  switch (args.command) {
    case 'file': {
      const splitBy = fileCriterion(args);
      return {
        command: 'file',
        inputFile: args.input_file ?? '',
        outputDir: args.output_dir ?? null,
        splitBy,
        keyword: splitBy === 'keyword' ? (args.keyword ?? null) : null,
        silent,
      };
    }
    case 'listen':
      return {
        command: 'listen',
        host: args.address ?? null,
        ports: Array.from(new Set(args.port ?? [])),
        outputDir: args.output_dir ?? null,
        bufferTimeout: args.timeout ?? null,
        splitBy: args.split_by ?? 'label',
        keyword: args.keyword ?? null,
        silent,
      };
    case 'streams':
      return {
        command: 'streams',
        configFile: args.config_file ?? '',
        silent,
      };
  }
}
