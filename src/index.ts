#!/usr/bin/env node

/**
 * zone-baseline CLI Entry Point
 * Applies a declarative security and performance baseline to a zone
 */

import chalk from 'chalk';
import { Command } from 'commander';

import { loadCatalog } from './catalog/loader.js';
import type { Bundle, Catalog } from './catalog/schema.js';
import { loadDeployConfig } from './config/deploy-config.js';
import { DeploymentRunner } from './deploy/runner.js';
import { runMenu } from './ui/menu.js';
import { ConsoleReporter, printSummary } from './ui/report.js';
import { type Cell, plainCell, pluralize, printTable } from './util/cli.js';

type GlobalOptions = {
  config?: string;
  catalog?: string;
  verbose?: boolean;
};

type DeployOptions = GlobalOptions & { all?: boolean };

const program = new Command();

program
  .name('zbl')
  .description('Apply a security and performance baseline to a Cloudflare zone')
  .version('0.1.0')
  .option('--config <path>', 'Deployment config file (default: ~/.zone-baseline/config.toml)')
  .option('--catalog <path>', 'Policy catalog file (default: the bundled baseline)')
  .option('--verbose', 'Print every API request');

function fail(error: unknown): never {
  const message = error instanceof Error ? error.message : String(error);
  console.error(chalk.red(`\n✗ Error: ${message}`));
  process.exit(1);
}

/** Ctrl+C inside an @inquirer prompt */
function isPromptExit(error: unknown): boolean {
  return error instanceof Error && error.name === 'ExitPromptError';
}

async function deploy(
  selection: readonly string[] | 'all',
  options: GlobalOptions,
  dryRun: boolean,
  catalog: Catalog = loadCatalog(options.catalog)
): Promise<void> {
  const config = loadDeployConfig({ configPath: options.config });
  const reporter = new ConsoleReporter({ verbose: options.verbose });
  const runner = DeploymentRunner.fromConfig(config, catalog, { reporter, dryRun });
  const summary = await runner.run(selection);
  printSummary(summary);
}

function resolveSelection(bundles: string[], options: DeployOptions): string[] | 'all' {
  if (options.all) {
    if (bundles.length > 0) {
      console.log(chalk.yellow('⚠ --all given; ignoring the listed bundles'));
    }
    return 'all';
  }
  if (bundles.length === 0) {
    program.error('Name at least one bundle, or pass --all. See `zbl catalog` for the list.');
  }
  return bundles;
}

function describeRules(bundle: Bundle): string {
  if (!bundle.rules) return '—';
  return `${pluralize(bundle.rules.entries.length, 'rule')} (${bundle.rules.phase})`;
}

program
  .command('menu', { isDefault: true })
  .description('Pick bundles to apply from an interactive menu')
  .action(async (_options: unknown, command: Command) => {
    const options = command.optsWithGlobals<GlobalOptions>();
    try {
      const catalog = loadCatalog(options.catalog);
      // Fail on a bad config before the first prompt, not after it.
      loadDeployConfig({ configPath: options.config });
      await runMenu({
        catalog,
        execute: (selection) => deploy(selection, options, false, catalog),
      });
    } catch (error) {
      if (isPromptExit(error)) return;
      fail(error);
    }
  });

program
  .command('apply')
  .description('Apply bundles without prompting')
  .argument('[bundles...]', 'Bundle ids, applied in the order given')
  .option('--all', 'Apply every bundle in catalog order')
  .action(async (bundles: string[], _options: unknown, command: Command) => {
    const options = command.optsWithGlobals<DeployOptions>();
    try {
      await deploy(resolveSelection(bundles, options), options, false);
    } catch (error) {
      fail(error);
    }
  });

program
  .command('plan')
  .description('Show what apply would change, without writing anything')
  .argument('[bundles...]', 'Bundle ids, planned in the order given')
  .option('--all', 'Plan every bundle in catalog order')
  .action(async (bundles: string[], _options: unknown, command: Command) => {
    const options = command.optsWithGlobals<DeployOptions>();
    try {
      await deploy(resolveSelection(bundles, options), options, true);
    } catch (error) {
      fail(error);
    }
  });

program
  .command('catalog')
  .description('List the bundles in the policy catalog')
  .option('--json', 'Output the catalog as JSON')
  .action((_options: unknown, command: Command) => {
    const options = command.optsWithGlobals<GlobalOptions & { json?: boolean }>();
    try {
      const catalog = loadCatalog(options.catalog);

      if (options.json) {
        console.log(JSON.stringify(catalog, null, 2));
        return;
      }

      console.log(chalk.blue('Policy bundles:'));
      const header = ['#', 'ID', 'Name', 'Settings', 'Rules'];
      const rows: Cell[][] = catalog.bundles.map((bundle, index) => {
        const rules = describeRules(bundle);
        return [
          plainCell(String(index + 1)),
          { plain: bundle.id, formatted: chalk.cyan(bundle.id) },
          plainCell(bundle.name),
          plainCell(String(bundle.settings.length)),
          { plain: rules, formatted: bundle.rules ? rules : chalk.gray(rules) },
        ];
      });
      printTable(header, rows);
    } catch (error) {
      fail(error);
    }
  });

await program.parseAsync(process.argv);
