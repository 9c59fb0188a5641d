import { extname } from 'node:path';
import { Command, CommanderError, InvalidArgumentError } from 'commander';
import type { WorkbookStore } from '../domain/ports/WorkbookStore.js';
import type { Clock } from '../domain/ports/Clock.js';
import type { Logger } from '../infrastructure/logging/logger.js';
import { BatchGeocoder } from '../BatchGeocoder.js';
import { loadConfig, DEFAULT_SHEET_NAME } from '../infrastructure/config/loadConfig.js';
import { XlsxWorkbook } from '../infrastructure/workbooks/XlsxWorkbook.js';
import { CsvWorkbook } from '../infrastructure/workbooks/CsvWorkbook.js';
import { createLogger, setLogLevel } from '../infrastructure/logging/logger.js';
import { isGeocodeError } from '../domain/errors/GeocodeErrors.js';

export interface CliDeps {
  readonly env: Readonly<Record<string, string | undefined>>;
  readonly logger?: Logger;
  readonly clock?: Clock;
  /** Store factory. Default: CSV for `.csv` files, Excel otherwise. */
  readonly openWorkbook?: (filePath: string, sheetName: string) => WorkbookStore;
}

interface GeocodeOptions {
  readonly sheet?: string;
  readonly addressColumn?: string;
  readonly countrySet?: string;
  readonly batchSize?: number;
  readonly pollFloor?: number;
  readonly pollCeiling?: number;
  readonly verbose?: boolean;
}

export function openWorkbook(filePath: string, sheetName: string): WorkbookStore {
  return extname(filePath).toLowerCase() === '.csv'
    ? new CsvWorkbook(filePath)
    : new XlsxWorkbook(filePath, { sheetName });
}

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!/^\d+$/.test(value.trim()) || !Number.isSafeInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

export function buildProgram(deps: CliDeps): Command {
  const logger = deps.logger ?? createLogger('cli');
  const open = deps.openWorkbook ?? openWorkbook;

  return new Command()
    .name('sheet-geocode')
    .description('Batch-geocode the addresses of a spreadsheet and write coordinates back in place')
    .argument('<file>', 'workbook to update (.xlsx, .xls, .ods or .csv)')
    .option('-s, --sheet <name>', `sheet to read and overwrite (default: "${DEFAULT_SHEET_NAME}")`)
    .option('-a, --address-column <name>', 'column holding the full address')
    .option('-c, --country-set <codes>', 'country filter sent with every query')
    .option('-b, --batch-size <n>', 'addresses per provider job', parsePositiveInt)
    .option('--poll-floor <ms>', 'minimum wait between poll requests', parsePositiveInt)
    .option('--poll-ceiling <ms>', 'give up on a batch after polling this long', parsePositiveInt)
    .option('-v, --verbose', 'log every poll tick')
    .action(async (file: string, options: GeocodeOptions) => {
      if (options.verbose) setLogLevel('debug');

      const config = loadConfig(deps.env, {
        sheetName: options.sheet,
        columns: { address: options.addressColumn },
        client: {
          countrySet: options.countrySet,
          batchSize: options.batchSize,
          pollFloorMs: options.pollFloor,
          pollCeilingMs: options.pollCeiling,
        },
      });

      const store = open(file, config.sheetName);
      const geocoder = new BatchGeocoder({ client: config.client, columns: config.columns, clock: deps.clock }).from(
        store,
      );
      attachProgressLogging(geocoder, logger);

      const summary = await geocoder.run();
      if (summary.backupPath !== undefined) {
        logger.info(`Backup written: ${summary.backupPath}`);
        logger.info(`Updated workbook written: ${store.describe()}`);
      }
    });
}

/** Log per-batch progress and the outcome of a run. */
export function attachProgressLogging(geocoder: BatchGeocoder, logger: Logger): void {
  geocoder
    .on('job:started', (e) => {
      if (e.eligibleRows === 0) {
        logger.info('No addresses to geocode.');
        return;
      }
      logger.info(`Submitting ${String(e.eligibleRows)} addresses in ${String(e.totalBatches)} batch(es)...`);
    })
    .on('batch:submitted', (e) => {
      logger.info(`Batch ${String(e.batchIndex + 1)}/${String(e.totalBatches)} submitted. Polling...`);
    })
    .on('batch:polled', (e) => {
      logger.debug(`Batch ${String(e.batchIndex + 1)} ${e.detail}. Sleeping ${String(e.sleepMs)}ms...`);
    })
    .on('batch:completed', (e) => {
      logger.info(`Batch ${String(e.batchIndex + 1)}/${String(e.totalBatches)} completed.`, {
        matched: e.matchedCount,
        rows: e.rowCount,
      });
    })
    .on('job:completed', (e) => {
      logger.info('Geocoding finished', { ...e.summary });
    });
}

/** Parse `argv` (without node and script) and run. Resolves to the process exit code. */
export async function runCli(argv: readonly string[], deps: CliDeps): Promise<number> {
  const logger = deps.logger ?? createLogger('cli');
  const program = buildProgram({ ...deps, logger }).exitOverride();

  try {
    await program.parseAsync([...argv], { from: 'user' });
    return 0;
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    if (isGeocodeError(error)) {
      logger.error(`${error.code}: ${error.message}`, { context: error.context });
    } else {
      logger.error(error instanceof Error ? error.message : String(error));
    }
    return 1;
  }
}
