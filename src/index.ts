#!/usr/bin/env node

import { realpathSync } from 'fs';
import { pathToFileURL } from 'url';
import { loadAuthorizedClient } from './auth/credentials.js';
import { DriveClient } from './api/driveClient.js';
import { createDriveService } from './api/driveService.js';
import { RateGovernor } from './api/rateGovernor.js';
import { SyncConfigManager } from './config/syncConfig.js';
import { FolderComparison, formatComparisonReport } from './core/sync/FolderComparison.js';
import { estimateRemaining, formatEstimate, formatProgress } from './core/sync/ProgressTracker.js';
import { SyncEngine } from './core/sync/SyncEngine.js';
import { TreePrinter } from './core/sync/TreePrinter.js';
import { ConfigurationError, errorMessage } from './errors/syncErrors.js';
import { attachLogFile, closeLogFile, isLogLevel, log, setLogLevel, type LogLevel } from './utils/logger.js';

export interface CliArgs {
  configPath: string;
  compare: boolean;
  detailed: boolean;
  printStructure: boolean;
  logLevel?: LogLevel;
  help: boolean;
}

export const USAGE = `Usage: drive-sync [options]

Copies every folder and file under the source Drive folder into the destination
folder, skipping files that are already identical. Nothing is ever deleted.

Options:
  -c, --config <path>     configuration file (default ./config.json)
  --compare               compare source and destination without copying
  --detailed              include per-file lists in the comparison
  --print-structure       print both folder trees
  --log-level <level>     debug, info, warn or error
  -h, --help              show this help`;

const PROGRESS_INTERVAL_MS = 5000;

/**
 * Parse command line arguments
 */
export function parseArgs(argv: string[]): CliArgs {
  const result: CliArgs = {
    configPath: SyncConfigManager.DEFAULT_PATH,
    compare: false,
    detailed: false,
    printStructure: false,
    help: false
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case '--config':
      case '-c':
        if (i + 1 >= argv.length) {
          throw new ConfigurationError('--config', '', 'a file path');
        }
        result.configPath = argv[++i];
        break;
      case '--log-level': {
        const level = argv[++i];
        if (!isLogLevel(level)) {
          throw new ConfigurationError('--log-level', level ?? '', 'debug, info, warn or error');
        }
        result.logLevel = level;
        break;
      }
      case '--compare':
        result.compare = true;
        break;
      case '--detailed':
        result.detailed = true;
        break;
      case '--print-structure':
        result.printStructure = true;
        break;
      case '--help':
      case '-h':
        result.help = true;
        break;
      default:
        throw new ConfigurationError('argument', arg, 'a known option (see --help)');
    }
  }
  return result;
}

/**
 * Run the command; resolves to the process exit code
 */
export async function main(argv: string[]): Promise<number> {
  const args = parseArgs(argv);
  if (args.help) {
    console.log(USAGE);
    return 0;
  }

  const config = await SyncConfigManager.loadFromFile(args.configPath);
  setLogLevel(args.logLevel ?? config.logging.logLevel);
  const logFile = attachLogFile(config.logging.logDirectory);
  log.info(`Logging to ${logFile}`);

  try {
    const auth = await loadAuthorizedClient(config.credentials.clientSecretsPath, config.credentials.tokenPath);
    const governor = new RateGovernor({
      rateLimit: config.performance.userRateLimit,
      timeWindowSeconds: config.performance.userTimeWindow,
      maxRetries: config.migration.maxRetries
    });
    const client = new DriveClient(createDriveService(auth), { governor });
    const sourceId = config.source.folderId;
    const destId = config.destination.folderId;

    if (args.printStructure) {
      const printer = new TreePrinter(client);
      console.log('\nSource structure:');
      console.log((await printer.render(sourceId)).join('\n'));
      console.log('\nDestination structure:');
      console.log((await printer.render(destId)).join('\n'));
      if (!args.compare) {
        return 0;
      }
    }

    if (args.compare) {
      const report = await new FolderComparison(client).compare(sourceId, destId, args.detailed ? 'detailed' : 'basic');
      console.log(formatComparisonReport(report));
      return 0;
    }

    const engine = new SyncEngine(client, {
      sourceRootId: sourceId,
      destRootId: destId,
      batchSize: config.migration.batchSize,
      finalValidation: config.migration.finalValidation,
      autoFixMissing: config.migration.autoFixMissing,
      countItemsFirst: config.migration.countItemsFirst
    });

    let lastLogged = 0;
    const unsubscribe = engine.tracker.subscribe((counters, event) => {
      const now = Date.now();
      if (event.type === 'state' || now - lastLogged >= PROGRESS_INTERVAL_MS) {
        lastLogged = now;
        log.info(`Progress: ${formatProgress(counters)} ${formatEstimate(estimateRemaining(counters, now))}`);
      }
    });

    const result = await engine.run();
    unsubscribe();

    console.log(`\nSync ${result.success ? 'completed successfully' : 'finished with errors'}`);
    console.log(formatProgress(result.counters));
    if (result.failures.length > 0) {
      console.log(`Failed items (${result.failures.length}):`);
      for (const failure of result.failures.slice(0, 20)) {
        console.log(`  ${failure}`);
      }
    }
    if (result.incompletePaths.length > 0) {
      console.log(`Source folders that could not be listed (${result.incompletePaths.length}):`);
      for (const path of result.incompletePaths.slice(0, 20)) {
        console.log(`  ${path}`);
      }
    }
    if (result.error) {
      console.log(`Error: ${result.error}`);
    }
    return result.success ? 0 : 1;
  } finally {
    await closeLogFile();
  }
}

function isEntryPoint(): boolean {
  const script = process.argv[1];
  if (!script) {
    return false;
  }
  try {
    return import.meta.url === pathToFileURL(realpathSync(script)).href;
  } catch {
    return false;
  }
}

// Only run if this file is executed directly
if (isEntryPoint()) {
  process.on('SIGINT', () => {
    console.error('\nSync cancelled by user');
    closeLogFile().finally(() => process.exit(1));
  });

  main(process.argv.slice(2)).then(
    code => process.exit(code),
    (error: unknown) => {
      console.error(`[ERROR] ${errorMessage(error)}`);
      process.exit(1);
    }
  );
}
