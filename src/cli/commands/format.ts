/**
 * @arch fmtkit.cli.command.complex
 * @intent:cli-output
 */
import { Command, InvalidArgumentError, Option } from 'commander';
import * as path from 'node:path';
import { loadConfig, resolveEncoding } from '../../core/config/loader.js';
import { LineEndingSchema, type Config, type LineEnding } from '../../core/config/schema.js';
import { CACHE_FILENAME } from '../../core/cache/types.js';
import { collectSourceFiles } from '../../core/sources/collector.js';
import { FormatRunner, defaultConcurrency } from '../../core/run/runner.js';
import { createConfiguredRegistry } from '../../formatters/register.js';
import { HumanFormatter } from '../formatters/human.js';
import { JsonFormatter } from '../formatters/json.js';
import type { ISummaryFormatter } from '../formatters/types.js';
import type { FormatterSettings } from '../../formatters/interface.types.js';
import type { RunReport } from '../../core/run/types.js';
import { logger as log } from '../../utils/logger.js';
import { errorMessage } from '../../utils/errors.js';

export interface FormatOptions {
  config?: string;
  lineEnding?: LineEnding;
  encoding?: string;
  concurrency?: number;
  timeout?: number;
  dryRun?: boolean;
  /** False when --no-cache is given */
  cache?: boolean;
  skip?: boolean;
  json?: boolean;
  quiet?: boolean;
  verbose?: boolean;
  strict?: boolean;
}

export interface FormatCommandResult {
  /** Null when formatting was skipped or there was nothing to format */
  report: RunReport | null;
  exitCode: number;
}

function parsePositiveInt(value: string): number {
  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed < 1 || String(parsed) !== value.trim()) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

function parseLineEnding(value: string): LineEnding {
  const parsed = LineEndingSchema.safeParse(value);
  if (!parsed.success) {
    throw new InvalidArgumentError('Expected one of AUTO, KEEP, LF, CRLF, CR.');
  }
  return parsed.data;
}

/**
 * Create the format command.
 */
export function createFormatCommand(): Command {
  return new Command('format')
    .description('Format Java and JavaScript sources whose content changed since the last run')
    .argument('[paths...]', 'Files, directories or glob patterns (default: configured source directories)')
    .option('-c, --config <path>', 'Path to config file')
    .addOption(new Option('--line-ending <policy>', 'Line ending policy: AUTO, KEEP, LF, CRLF or CR').argParser(parseLineEnding))
    .option('--encoding <name>', 'Source file encoding (default: utf-8)')
    .option('--concurrency <n>', 'Number of files formatted in parallel', parsePositiveInt)
    .option('--timeout <ms>', 'Stop scheduling files after this many milliseconds', parsePositiveInt)
    .option('--dry-run', 'Report what would be formatted without writing files or the cache')
    .option('--no-cache', 'Ignore the file hash cache and do not write it')
    .option('--skip', 'Skip formatting')
    .option('--json', 'Output the summary as JSON')
    .option('-q, --quiet', 'Only print warnings, errors and the summary')
    .option('-v, --verbose', 'Print every file and debug output')
    .option('--strict', 'Exit with code 1 when a file fails to format')
    .action(async (paths: string[], options: FormatOptions) => {
      try {
        const { exitCode } = await runFormat(process.cwd(), paths, options);
        if (exitCode !== 0) process.exit(exitCode);
      } catch (error) {
        log.error(errorMessage(error));
        process.exit(1);
      }
    });
}

function summaryFormatter(options: FormatOptions): ISummaryFormatter {
  const dryRun = options.dryRun === true;
  if (options.json) return new JsonFormatter({ dryRun });
  return new HumanFormatter({
    colors: process.stdout.isTTY === true,
    verbose: options.verbose === true,
    dryRun,
  });
}

function formatterSettings(projectRoot: string, config: Config, encoding: BufferEncoding): FormatterSettings {
  return {
    compilerSource: config.compiler.source,
    compilerCompliance: config.compiler.compliance,
    compilerTarget: config.compiler.target,
    targetDirectory: path.resolve(projectRoot, config.target_directory),
    encoding,
  };
}

/**
 * Load configuration, discover sources and run the formatters.
 * Configuration errors propagate; per-file failures end up in the report.
 */
export async function runFormat(
  projectRoot: string,
  paths: string[],
  options: FormatOptions = {}
): Promise<FormatCommandResult> {
  if (options.verbose) {
    log.setLevel('debug');
  } else if (options.quiet || options.json) {
    log.setLevel('warn');
  }

  const config = await loadConfig(projectRoot, options.config);
  if (options.skip || config.skip) {
    log.info('Formatting is skipped');
    return { report: null, exitCode: 0 };
  }

  const encoding = resolveEncoding(options.encoding ?? config.encoding);
  const lineEnding = options.lineEnding ?? config.line_ending;
  const settings = formatterSettings(projectRoot, config, encoding);

  const files = await collectSourceFiles(projectRoot, config.files, paths);
  log.info(`Number of files to be formatted: ${files.length}`);
  if (files.length === 0) {
    return { report: null, exitCode: 0 };
  }

  const registry = await createConfiguredRegistry(projectRoot, config, settings);
  const runner = new FormatRunner(registry, {
    projectRoot,
    cachePath: path.join(settings.targetDirectory, CACHE_FILENAME),
    lineEnding,
    encoding,
    concurrency: options.concurrency ?? config.concurrency ?? defaultConcurrency(),
    dryRun: options.dryRun === true,
    noCache: options.cache === false,
    signal: options.timeout !== undefined ? AbortSignal.timeout(options.timeout) : undefined,
  });

  const report = await runner.run(files);
  console.log(summaryFormatter(options).format(report));

  const failed = options.strict === true && report.statistics.failCount > 0;
  return { report, exitCode: failed ? 1 : 0 };
}
