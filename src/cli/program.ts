/**
 * Command-line interface
 */
import { Command, CommanderError } from 'commander';
import { ZodError } from 'zod';
import { logger, setLogLevel, ConfigError, configErrorFromZod, getErrorCode, getErrorMessage } from '../core/index.js';
import { getConfig, type ConfigManager } from '../config/ConfigManager.js';
import { syncRequestSchema, type SyncRequest } from '../config/schema.js';
import { runSync, type SyncDependencies } from '../sync/SyncRunner.js';
import { formatReport } from './report.js';

export interface CliIO {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
}

const defaultIO: CliIO = {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
};

export function createProgram(io: CliIO = defaultIO): Command {
  return new Command()
    .name('dnssync')
    .description('Copy/sync Designate managed DNS zones from one OpenStack cloud to another')
    .requiredOption('-f, --from-cloud <cloud>', 'source cloud')
    .requiredOption('-t, --to-cloud <cloud>', 'target cloud')
    .option('-a, --all', 'process all zones found in the source cloud')
    .option('-r, --remove', 'remove records in target not found in source')
    .option('-m, --mail <mail>', 'override email address in SOA records')
    .option('-q, --quiet', 'do not print statistics')
    .option('-v, --verbose', 'print progress')
    .option('--strict', 'exit non-zero when any zone fails')
    .argument('[zones...]', 'zone(s) to process, mandatory if --all is not used')
    .exitOverride()
    .configureOutput({
      writeOut: io.stdout,
      writeErr: io.stderr,
    });
}

/**
 * Validate what commander parsed
 */
export function parseSyncRequest(options: Record<string, unknown>, zones: string[], strictDefault: boolean): SyncRequest {
  try {
    return syncRequestSchema.parse({
      fromCloud: options['fromCloud'],
      toCloud: options['toCloud'],
      all: options['all'] ?? false,
      zones,
      remove: options['remove'] ?? false,
      mail: options['mail'],
      quiet: options['quiet'] ?? false,
      verbose: options['verbose'] ?? false,
      strict: options['strict'] ?? strictDefault,
    });
  } catch (error) {
    if (error instanceof ZodError) {
      throw configErrorFromZod('arguments', error);
    }
    throw error;
  }
}

/**
 * Run the CLI and return the process exit status
 */
export async function main(argv: string[], io: CliIO = defaultIO, deps: SyncDependencies = {}): Promise<number> {
  const program = createProgram(io);

  if (argv.length === 0) {
    program.outputHelp({ error: true });
    return 1;
  }

  let request: SyncRequest;
  let config: ConfigManager;
  try {
    program.parse(argv, { from: 'user' });
    config = getConfig();
    request = parseSyncRequest(program.opts(), program.args, config.app.strict);
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    if (error instanceof ConfigError) {
      io.stderr(`ERROR: ${error.message}\n`);
      program.outputHelp({ error: true });
      return 1;
    }
    throw error;
  }

  if (request.verbose) {
    setLogLevel('debug');
  } else if (request.quiet) {
    setLogLevel('warn');
  }

  try {
    const report = await runSync(
      {
        fromCloud: request.fromCloud,
        toCloud: request.toCloud,
        all: request.all,
        zones: request.zones,
        remove: request.remove,
        mail: request.mail,
        strict: request.strict,
        cloudsFile: config.app.cloudsFile,
        defaultTtl: config.app.defaultTtl,
      },
      deps
    );

    if (!request.quiet) {
      io.stdout(formatReport(report));
    }
    return report.exitCode;
  } catch (error) {
    logger.debug({ err: error, code: getErrorCode(error) }, 'Sync aborted');
    io.stderr(`ERROR: ${getErrorMessage(error)}\n`);
    return 1;
  }
}
