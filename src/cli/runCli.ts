import fs from 'fs/promises';
import { parseArgs } from 'util';
import {
  type EditOperation,
  type EditOptions,
  type SubtitleEdit,
  UsageError,
  editSrtContent,
  mergeSrtContents,
  parseEditOptions,
  resolveEditOperation,
} from '../subtitles';
import { config } from '../config';
import { COMMAND_USAGE, GENERAL_USAGE, PROGRAM_NAME } from './usage';

/**
 * File access used by the CLI; swapped for an in-memory map in tests
 */
export interface CliFileSystem {
  readFile(filePath: string): Promise<string>;
  writeFile(filePath: string, content: string): Promise<void>;
}

export interface CliIO {
  fs: CliFileSystem;
  stdout: (text: string) => void;
  stderr: (text: string) => void;
}

export const defaultIO: CliIO = {
  fs: {
    readFile: (filePath) => fs.readFile(filePath, 'utf-8'),
    writeFile: (filePath, content) => fs.writeFile(filePath, content, 'utf-8'),
  },
  stdout: (text) => console.log(text),
  stderr: (text) => console.error(text),
};

/** Exit codes */
const EXIT_OK = 0;
const EXIT_FAILURE = 1;
const EXIT_USAGE = 2;

type OptionSpec = Record<string, { type: 'string'; short: string }>;

const COMMAND_OPTIONS: Record<EditOperation, OptionSpec> = {
  shift: {
    target: { type: 'string', short: 'a' },
    to: { type: 'string', short: 't' },
  },
  shiftby: {
    by: { type: 'string', short: 'b' },
  },
  stretch: {
    factor: { type: 'string', short: 'f' },
    anchor: { type: 'string', short: 'a' },
  },
  sync: {
    target: { type: 'string', short: 't' },
    goal: { type: 'string', short: 'g' },
    anchor: { type: 'string', short: 'a' },
  },
  reindex: {},
  shiftindex: {
    by: { type: 'string', short: 'b' },
  },
  replace: {
    find: { type: 'string', short: 'f' },
    'replace-with': { type: 'string', short: 'r' },
  },
};

const SUBCOMMAND_ALIASES: Record<string, string> = {
  squeeze: 'stretch',
  h: 'help',
  '?': 'help',
};

/**
 * Strips up to two leading dashes and resolves aliases ("--h" -> "help")
 */
export function resolveSubcommand(raw: string): string {
  const name = raw.replace(/^-{1,2}/, '');
  return SUBCOMMAND_ALIASES[name] ?? name;
}

function parseRawArgs(args: string[], spec: OptionSpec) {
  try {
    return parseArgs({ args, options: spec, strict: true, allowPositionals: true });
  } catch (error) {
    // parseArgs reports unknown options and missing values as TypeErrors
    if (error instanceof TypeError) {
      throw new UsageError(error.message);
    }
    throw error;
  }
}

/**
 * Splits a subcommand's arguments into option values and file paths
 * @throws UsageError on unknown options or options missing their value
 */
export function parseCommandArgs(
  args: string[],
  spec: OptionSpec
): { options: EditOptions; files: string[] } {
  const parsed = parseRawArgs(args, spec);

  const options: EditOptions = {};
  for (const [key, value] of Object.entries(parsed.values)) {
    if (typeof value === 'string') {
      options[key] = value;
    }
  }

  return { options, files: parsed.positionals };
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function helpFor(subcommand: string | undefined): string {
  if (subcommand === undefined) {
    return GENERAL_USAGE;
  }

  const usage = COMMAND_USAGE[resolveSubcommand(subcommand)];
  if (!usage) {
    throw new UsageError(`Unrecognized subcommand: ${subcommand}`);
  }
  return usage;
}

/**
 * Edits every file in place. A failure on one file is reported and the others are
 * still processed; a failed file is never written.
 */
async function editFiles(files: string[], edit: SubtitleEdit, io: CliIO): Promise<number> {
  if (files.length === 0) {
    throw new UsageError('No subtitle files specified.');
  }

  let failures = 0;
  for (const file of files) {
    try {
      const content = await io.fs.readFile(file);
      await io.fs.writeFile(file, editSrtContent(content, edit));
    } catch (error) {
      io.stderr(`${file}: ${describeError(error)}`);
      failures++;
    }
  }

  return failures > 0 ? EXIT_FAILURE : EXIT_OK;
}

async function mergeFiles(files: string[], io: CliIO): Promise<number> {
  if (files.length < 2) {
    throw new UsageError('What good is there to merge, when there is naught but one item?');
  }

  try {
    const contents: string[] = [];
    for (const file of files) {
      contents.push(await io.fs.readFile(file));
    }
    io.stdout(mergeSrtContents(contents));
    return EXIT_OK;
  } catch (error) {
    io.stderr(`merge: ${describeError(error)}`);
    return EXIT_FAILURE;
  }
}

/**
 * Runs one CLI invocation
 * @param argv - Arguments after the program name, subcommand first
 * @param io - File system and output streams
 * @returns Process exit code: 0 on success, 1 when a file failed, 2 on usage errors
 */
export async function runCli(argv: string[], io: CliIO = defaultIO): Promise<number> {
  try {
    const [rawSubcommand = 'help', ...args] = argv;
    const subcommand = resolveSubcommand(rawSubcommand);

    if (subcommand === 'help') {
      io.stdout(helpFor(args[0]));
      return EXIT_OK;
    }

    if (subcommand === 'version') {
      io.stdout(`${PROGRAM_NAME} ${config.version}`);
      return EXIT_OK;
    }

    if (subcommand === 'merge') {
      const { files } = parseCommandArgs(args, {});
      return await mergeFiles(files, io);
    }

    const kind = resolveEditOperation(subcommand);
    if (!kind) {
      throw new UsageError(`Unrecognized subcommand.\nType '${PROGRAM_NAME} help' for usage.`);
    }

    const { options, files } = parseCommandArgs(args, COMMAND_OPTIONS[kind]);
    const edit = parseEditOptions(kind, options, { anchor: config.defaultAnchor });
    return await editFiles(files, edit, io);
  } catch (error) {
    if (error instanceof UsageError) {
      io.stderr(error.message);
      return EXIT_USAGE;
    }
    throw error;
  }
}
