#!/usr/bin/env node
/**
 * MEPS Reader CLI Entry Point
 *
 * @module meps-reader-cli
 */

import { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { join } from 'node:path';

import { loadConfig, validateConfig } from '../src/cli/lib/config.js';
import { createContext, type CLIContext } from '../src/cli/lib/context.js';
import { EXIT_CODES, exitCodeFor } from '../src/cli/lib/exit-codes.js';
import { createCLILogger } from '../src/cli/lib/logger.js';
import { parseInteger } from '../src/cli/lib/args.js';
import { registerReadCommand } from '../src/cli/commands/read.js';
import { registerDownloadCommand } from '../src/cli/commands/download.js';
import { registerNamesCommand } from '../src/cli/commands/names.js';
import { findPackageRoot } from '../src/core/utils/package-paths.js';

// ============================================================================
// Global State
// ============================================================================

let globalContext: CLIContext | null = null;

function getGlobalContext(): CLIContext {
  if (!globalContext) {
    throw new Error('Global context not initialized. Call initializeContext first.');
  }
  return globalContext;
}

// ============================================================================
// CLI Setup
// ============================================================================

function getVersion(): string {
  try {
    const content = readFileSync(join(findPackageRoot(), 'package.json'), 'utf-8');
    const packageJson: unknown = JSON.parse(content);
    if (
      typeof packageJson === 'object' &&
      packageJson !== null &&
      'version' in packageJson &&
      typeof packageJson.version === 'string'
    ) {
      return packageJson.version;
    }
  } catch (error) {
    console.error(`Could not read package version: ${error instanceof Error ? error.message : String(error)}`);
  }
  return '0.0.0';
}

type GlobalOptions = {
  verbose?: boolean;
  json?: boolean;
  config?: string;
  timeout?: number;
};

function initializeContext(options: GlobalOptions): CLIContext {
  const config = loadConfig({
    configPath: options.config,
    overrides: {
      verbose: options.verbose,
      json: options.json,
      timeout: options.timeout,
    },
  });
  validateConfig(config);

  const logger = createCLILogger({
    level: config.verbose ? 'debug' : 'info',
    json: config.json,
  });

  globalContext = createContext(config, logger);
  return globalContext;
}

function createProgram(): Command {
  const program = new Command();

  program
    .name('meps-reader')
    .description('Load MEPS public use files from a local directory or the MEPS website')
    .version(getVersion(), '-V, --version', 'Output the version number')
    .option('-v, --verbose', 'Enable verbose output')
    .option('--json', 'Output as JSON (machine-readable)')
    .option('--config <path>', 'Path to config file (default: .meps-readerrc)')
    .option('--timeout <ms>', 'Download timeout in milliseconds', parseInteger)
    .hook('preAction', (thisCommand) => {
      try {
        initializeContext(thisCommand.opts<GlobalOptions>());
      } catch (error) {
        console.error(
          `Configuration error: ${error instanceof Error ? error.message : String(error)}`
        );
        process.exit(EXIT_CODES.CONFIG_ERROR);
      }
    });

  registerReadCommand(program, getGlobalContext);
  registerDownloadCommand(program, getGlobalContext);
  registerNamesCommand(program, getGlobalContext);

  return program;
}

// ============================================================================
// Main Entry Point
// ============================================================================

async function main(): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    if (globalContext) {
      globalContext.logger.error('Command failed', {
        error: error instanceof Error ? error.message : String(error),
        ...(error instanceof Error && error.cause instanceof Error && { cause: error.cause.message }),
        duration_ms: Date.now() - globalContext.startTime,
      });
    } else {
      console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    }
    process.exit(exitCodeFor(error));
  }
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(EXIT_CODES.ERRORS);
});
