#!/usr/bin/env node
/**
 * cachekeeper CLI - Composition Root
 *
 * Wires dependencies for each command and interprets the CliResult.
 * All behavior lives in src/cli/commands/*.ts and the application services.
 */

import 'reflect-metadata';
import { Command } from 'commander';
import open from 'open';

import { initializeContainer, container, type ContainerInitOptions } from './di/container.js';
import { DI } from './di/tokens.js';
import { createBootstrapLogger } from './core/logging/index.js';
import type { CacheService } from './application/services/cache-service.js';
import type { CacheRootResolver } from './application/services/cache-root-resolver.js';
import type { InteractiveInputPort } from './ports/interactive-input.port.js';
import type { ProcessTerminator } from './runtime/ports/process-terminator.js';

import { interpretCliResult, interpretCliResultWithoutDI } from './cli/interpret-result.js';
import { failure } from './cli/types/cli-result.js';
import {
  executeTreeCommand,
  executeDeleteCommand,
  executeOpenCommand,
  executeSetRootCommand,
} from './cli/commands/index.js';

// ═══════════════════════════════════════════════════════════════════════════
// WIRING
// ═══════════════════════════════════════════════════════════════════════════

interface Wired {
  readonly terminator: ProcessTerminator;
  readonly cache: CacheService;
  readonly resolver: CacheRootResolver;
  readonly input: InteractiveInputPort;
}

async function wire(options: Omit<ContainerInitOptions, 'runtimeMode' | 'interactive'> = {}): Promise<Wired> {
  try {
    await initializeContainer({
      runtimeMode: { kind: 'cli' },
      interactive: process.stdin.isTTY === true,
      ...options,
    });
  } catch (error) {
    createBootstrapLogger('cli').error({ err: error }, 'Startup failed');
    interpretCliResultWithoutDI(failure(error instanceof Error ? error.message : String(error)));
  }

  return {
    terminator: container.resolve<ProcessTerminator>(DI.Runtime.ProcessTerminator),
    cache: container.resolve<CacheService>(DI.Services.Cache),
    resolver: container.resolve<CacheRootResolver>(DI.Services.CacheRootResolver),
    input: container.resolve<InteractiveInputPort>(DI.Ports.InteractiveInput),
  };
}

// ═══════════════════════════════════════════════════════════════════════════
// PROGRAM DEFINITION
// ═══════════════════════════════════════════════════════════════════════════

const program = new Command();

program
  .name('cachekeeper')
  .description('Browse and prune a versioned cache directory')
  .version('0.1.0')
  .option('--scene <name>', 'scene file name appended to a newly entered cache root');

program
  .command('tree')
  .description('Scan the cache root and print the tree')
  .option('-r, --references <file>', 'JSON file listing the active {identifier, version} references')
  .option('--json', 'print rows as JSON')
  .option('-a, --all', 'show size and date on folder rows too')
  .action(async (options: { references?: string; json?: boolean; all?: boolean }) => {
    const { terminator, cache } = await wire({
      referencesFile: options.references,
      sceneName: program.opts<{ scene?: string }>().scene,
    });

    const result = await executeTreeCommand(
      { refresh: () => cache.refresh(), rows: () => cache.rows() },
      { json: options.json, all: options.all }
    );

    interpretCliResult(result, terminator);
  });

program
  .command('delete [ids...]')
  .description('Delete cache versions by path relative to the cache root (e.g. shot010/fx/v003)')
  .option('-r, --references <file>', 'JSON file listing the active references')
  .option('-y, --yes', 'do not ask for confirmation')
  .action(async (ids: string[], options: { references?: string; yes?: boolean }) => {
    const { terminator, cache, input } = await wire({
      referencesFile: options.references,
      sceneName: program.opts<{ scene?: string }>().scene,
    });

    const result = await executeDeleteCommand(
      ids,
      {
        refresh: () => cache.refresh(),
        confirm: (prompt) => input.confirm(prompt),
        deleteSelected: (targets) => cache.deleteSelected(targets),
      },
      { yes: options.yes }
    );

    interpretCliResult(result, terminator);
  });

program
  .command('open')
  .description('Print the command that opens the cache root in the file manager')
  .option('-l, --launch', 'open the folder instead of printing the command')
  .action(async (options: { launch?: boolean }) => {
    const { terminator, cache } = await wire({ sceneName: program.opts<{ scene?: string }>().scene });

    const result = await executeOpenCommand(
      {
        openCacheFolderCommand: () => cache.openCacheFolderCommand(),
        getRootPath: () => cache.getRootPath(),
        launch: async (target) => {
          await open(target);
        },
      },
      { launch: options.launch }
    );

    interpretCliResult(result, terminator);
  });

program
  .command('set-root <path>')
  .description('Store the cache root in the environment store')
  .action(async (enteredPath: string) => {
    const scene = program.opts<{ scene?: string }>().scene;
    const { terminator, resolver } = await wire({ sceneName: scene });

    const result = await executeSetRootCommand(
      enteredPath,
      {
        variableName: resolver.variableName,
        setRoot: (p, sceneName) => resolver.set(p, sceneName),
      },
      { scene }
    );

    interpretCliResult(result, terminator);
  });

// ═══════════════════════════════════════════════════════════════════════════
// ENTRY POINT
// ═══════════════════════════════════════════════════════════════════════════

await program.parseAsync();
