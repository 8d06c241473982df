#!/usr/bin/env npx tsx

/**
 * @fileoverview Timeline export CLI
 *
 * Converts a saved test (native JSON) to an analysis format.
 *
 * Usage:
 *   npx tsx scripts/export-timeline.ts <input.json> <output> [--format <id>] [--show]
 *   npx tsx scripts/export-timeline.ts --list-formats
 *
 * Without --format the format is picked from the output file name.
 * --show prints a text chart of the timeline before exporting.
 *
 * Exit Codes:
 *   0 - Success
 *   1 - Error (bad arguments, unreadable input, failed export)
 */

import { pathToFileURL } from 'node:url';
import { EXPORT_FORMATS, getExportFormatInfo } from '@/export/formats';
import { nodeFileSystem, type FileSystem } from '@/services/fileSystem';
import { initializeLogger } from '@/services/logger';
import { createTimelineStore } from '@/stores/timelineStore';
import { getUserFriendlyError } from '@/utils/errorMessages';
import { renderTimelineText } from '@/utils/timelineText';

export interface CliIO {
  fileSystem?: FileSystem;
  stdout?: (line: string) => void;
  stderr?: (line: string) => void;
}

interface CliArgs {
  input?: string;
  output?: string;
  format?: string;
  show: boolean;
  listFormats: boolean;
}

export const USAGE = 'Usage: export-timeline <input.json> <output> [--format <id>] [--show]';

/**
 * Parse command line arguments (without the node and script entries)
 *
 * @throws Error for an unknown flag or a missing --format value
 */
export function parseCliArgs(argv: readonly string[]): CliArgs {
  const args: CliArgs = { show: false, listFormats: false };
  const positional: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--format' || arg === '-f') {
      const value = argv[i + 1];
      if (value === undefined || value.startsWith('-')) {
        throw new Error('--format needs a value');
      }
      args.format = value;
      i++;
    } else if (arg === '--show') {
      args.show = true;
    } else if (arg === '--list-formats') {
      args.listFormats = true;
    } else if (arg.startsWith('-')) {
      throw new Error(`Unknown option: ${arg}`);
    } else {
      positional.push(arg);
    }
  }

  [args.input, args.output] = positional;
  return args;
}

/**
 * Run the CLI and return its exit code
 */
export function runExportCli(argv: readonly string[], io: CliIO = {}): number {
  const stdout = io.stdout ?? ((line: string) => console.log(line));
  const stderr = io.stderr ?? ((line: string) => console.error(line));

  let args: CliArgs;
  try {
    args = parseCliArgs(argv);
  } catch (error) {
    stderr(`Error: ${error instanceof Error ? error.message : String(error)}`);
    stderr(USAGE);
    return 1;
  }

  if (args.listFormats) {
    for (const format of EXPORT_FORMATS) {
      const info = getExportFormatInfo(format);
      stdout(`${format}\t${info.extension}\t${info.name}`);
    }
    return 0;
  }

  if (args.input === undefined || args.output === undefined) {
    stderr(USAGE);
    return 1;
  }

  const store = createTimelineStore({ fileSystem: io.fileSystem ?? nodeFileSystem, recentTests: false });

  try {
    store.getState().loadTest(args.input);
    const { timeline } = store.getState();
    stdout(`Loaded "${timeline.metadata.name}" (${timeline.size} events, ${timeline.durationMs}ms)`);

    if (args.show) {
      renderTimelineText(timeline.events, timeline.durationMs).forEach((line) => stdout(line));
    }

    const written = store.getState().exportTest(args.output, args.format);
    stdout(`Exported ${written} to ${args.output}`);
    return 0;
  } catch (error) {
    stderr(`Error: ${getUserFriendlyError(error)}`);
    return 1;
  }
}

// Run CLI if executed directly
const entry = process.argv[1];
if (entry !== undefined && import.meta.url === pathToFileURL(entry).href) {
  initializeLogger();
  process.exitCode = runExportCli(process.argv.slice(2));
}
