import { Command, Option } from 'commander';
import { loadConfig } from '../../core/config/loader.js';
import type { Config, OutputFormat } from '../../core/config/schema.js';
import { scanFile, exitCodeFor } from '../../core/scanner/scanner.js';
import type { ScanSummary } from '../../core/scanner/types.js';
import { createFormatter, formatCounts, type IFormatter } from '../formatters/index.js';
import { resolvePath } from '../../utils/file-system.js';
import { BracecheckError, ErrorCodes } from '../../utils/errors.js';
import { logger, type LogLevel } from '../../utils/logger.js';

/** Exit code for usage, configuration and file access failures. */
export const FAILURE_EXIT_CODE = 1;

export interface CheckCommandOptions {
  config?: string;
  format?: OutputFormat;
  color?: boolean;
  verbose?: boolean;
  quiet?: boolean;
}

export type OutputWriter = (chunk: string) => void;

export interface CheckDependencies {
  write: OutputWriter;
  setExitCode: (code: number) => void;
  cwd: () => string;
}

const defaultDependencies: CheckDependencies = {
  write: (chunk) => {
    process.stdout.write(chunk);
  },
  setExitCode: (code) => {
    process.exitCode = code;
  },
  cwd: () => process.cwd(),
};

export interface CheckSettings {
  target: string;
  format: OutputFormat;
  colors: boolean;
  logLevel: LogLevel;
}

function flagLogLevel(options: CheckCommandOptions): LogLevel | undefined {
  if (options.verbose) return 'debug';
  if (options.quiet) return 'silent';
  return undefined;
}

/**
 * Merge command line options over config values.
 */
export function resolveCheckSettings(
  file: string | undefined,
  options: CheckCommandOptions,
  config: Config,
  projectRoot: string
): CheckSettings {
  const target = file ?? config.target;
  if (!target) {
    throw new BracecheckError(
      ErrorCodes.MISSING_TARGET,
      'No file to scan: pass a path or set "target" in .bracecheck.yaml'
    );
  }

  return {
    target: resolvePath(projectRoot, target),
    format: options.format ?? config.format,
    colors: options.color ?? config.colors,
    logLevel: flagLogLevel(options) ?? config.log_level,
  };
}

/**
 * Scan one file and write its report: one write per line record, then one
 * for the summary. Nothing is written if the file cannot be read.
 */
export function runCheck(
  filePath: string,
  formatter: IFormatter,
  write: OutputWriter = defaultDependencies.write
): ScanSummary {
  const summary = scanFile(filePath, (snapshot) => {
    const record = formatter.formatLine(snapshot);
    if (record !== null) {
      write(`${record}\n`);
    }
  });
  write(`${formatter.formatSummary(summary)}\n`);
  return summary;
}

function reportFailure(error: unknown): void {
  if (error instanceof BracecheckError) {
    logger.error(`${error.message} [${error.code}]`);
  } else {
    logger.error('Unexpected failure', error instanceof Error ? error : undefined);
  }
}

/**
 * Create the check command.
 */
export function createCheckCommand(deps: Partial<CheckDependencies> = {}): Command {
  const { write, setExitCode, cwd } = { ...defaultDependencies, ...deps };

  return new Command('check')
    .description('Report the running bracket balance of a file, line by line')
    .argument('[file]', 'File to scan (defaults to "target" from the config file)')
    .option('--config <path>', 'Path to config file')
    .addOption(
      new Option('--format <format>', 'Output format').choices(['human', 'json'])
    )
    .option('--color', 'Color the summary line')
    .option('--verbose', 'Show debug output on stderr')
    .option('--quiet', 'Suppress diagnostic output')
    .action(async (file: string | undefined, options: CheckCommandOptions) => {
      let exitCode: number;
      try {
        const flagLevel = flagLogLevel(options);
        if (flagLevel) logger.setLevel(flagLevel);

        const projectRoot = cwd();
        const config = await loadConfig(projectRoot, options.config);
        const settings = resolveCheckSettings(file, options, config, projectRoot);
        logger.setLevel(settings.logLevel);

        logger.debug(`Scanning ${settings.target}`);
        const formatter = createFormatter(settings.format, { colors: settings.colors });
        const summary = runCheck(settings.target, formatter, write);
        logger.debug(
          `Scanned ${summary.lineCount} line(s): ${formatCounts(summary.counts)}`
        );

        exitCode = exitCodeFor(summary);
      } catch (error) {
        reportFailure(error);
        exitCode = FAILURE_EXIT_CODE;
      }
      setExitCode(exitCode);
    });
}
