/**
 * Console output for deployments
 * Shows a spinner per bundle, one line per entry and a closing summary
 */

import chalk from 'chalk';
import ora, { type Ora } from 'ora';
import type { Bundle } from '../catalog/schema.js';
import type { BundleOutcome, DeploymentSummary, OperationResult } from '../deploy/results.js';
import type { DeploymentReporter, RunnerState } from '../deploy/runner.js';
import type { RequestEvent } from '../remote/http.js';
import { pluralize } from '../util/cli.js';

const PLANNED_VERBS = { created: 'would create', updated: 'would update' } as const;

export function formatResultLine(result: OperationResult): string[] {
  const target = chalk.cyan(result.target);
  const detail = result.detail ? chalk.gray(` (${result.detail})`) : '';

  switch (result.action) {
    case 'skipped':
      return [`  ${chalk.gray('•')} ${target} ${chalk.gray('unchanged')}`];
    case 'failed': {
      const label = result.detail === 'not attempted' ? 'not attempted' : 'failed';
      const message = result.error ? `: ${result.error.message}` : '';
      const lines = [`  ${chalk.red('✗')} ${target} ${chalk.red(`${label}${message}`)}`];
      if (result.error?.hint) lines.push(`    ${chalk.yellow(result.error.hint)}`);
      return lines;
    }
    default:
      if (result.planned) {
        return [`  ${chalk.yellow('→')} ${target} ${PLANNED_VERBS[result.action]}${detail}`];
      }
      return [`  ${chalk.green('✓')} ${target} ${result.action}${detail}`];
  }
}

export function formatRequestLine(event: RequestEvent): string {
  const status = event.status === undefined ? 'no response' : String(event.status);
  const retry = event.attempt > 1 ? `, attempt ${event.attempt}` : '';
  return chalk.dim(`    ${event.method} ${event.path} → ${status} (${event.durationMs}ms${retry})`);
}

function describeOutcome(outcome: BundleOutcome): string {
  const name = `${outcome.bundleName} ${chalk.gray(`(${outcome.bundleId})`)}`;
  switch (outcome.status) {
    case 'applied':
      return `${name} applied`;
    case 'unchanged':
      return `${name} already up to date`;
    case 'failed':
      return `${name} failed${outcome.error ? `: ${outcome.error.message}` : ''}`;
  }
}

export function formatSummary(summary: DeploymentSummary): string[] {
  const { totals } = summary;
  const counts = summary.dryRun
    ? `would create ${totals.created}, would update ${totals.updated}, ` +
      `unchanged ${totals.skipped}, failed ${totals.failed}`
    : `created ${totals.created}, updated ${totals.updated}, ` +
      `skipped ${totals.skipped}, failed ${totals.failed}`;

  const lines = [chalk.blue(summary.dryRun ? 'Plan summary:' : 'Summary:'), `  ${counts}`];

  if (summary.failed) {
    lines.push(chalk.yellow(`⚠ ${pluralize(summary.failedBundles.length, 'bundle')} failed:`));
    for (const failed of summary.failedBundles) {
      const kinds =
        failed.errorKinds.length > 0 ? chalk.gray(` (${failed.errorKinds.join(', ')})`) : '';
      lines.push(`  ${chalk.red('✗')} ${failed.bundleId}${kinds}`);
    }
  } else if (!summary.changed) {
    lines.push(chalk.green('✓ Nothing needed to change'));
  } else {
    lines.push(
      chalk.green(summary.dryRun ? '✓ Plan complete; run apply to make these changes' : '✓ Done')
    );
  }
  return lines;
}

export function printSummary(summary: DeploymentSummary): void {
  console.log();
  for (const line of formatSummary(summary)) console.log(line);
}

export interface ConsoleReporterOptions {
  /** Print every HTTP request */
  verbose?: boolean;
  /** Show an ora spinner while a bundle runs */
  spinner?: boolean;
  write?: (line: string) => void;
}

export class ConsoleReporter implements DeploymentReporter {
  private spinner?: Ora;
  private readonly write: (line: string) => void;

  constructor(private readonly options: ConsoleReporterOptions = {}) {
    this.write = options.write ?? ((line) => console.log(line));
  }

  /** Prints above the spinner without leaving a half-drawn frame behind */
  private print(line: string): void {
    this.spinner?.clear();
    this.write(line);
    this.spinner?.render();
  }

  onBundleStart(bundle: Bundle, index: number, total: number): void {
    this.write('');
    this.write(chalk.blue(`[${index + 1}/${total}] ${bundle.name}`));
    if (this.options.spinner !== false) {
      this.spinner = ora(`Resolving ${bundle.id}...`).start();
    }
  }

  onStateChange(state: RunnerState): void {
    if (!this.spinner) return;
    if (state.phase === 'Resolving') this.spinner.text = `Resolving ${state.bundleId}...`;
    if (state.phase === 'Reconciling') this.spinner.text = `Reconciling ${state.bundleId}...`;
  }

  onResult(_bundle: Bundle, result: OperationResult): void {
    for (const line of formatResultLine(result)) this.print(line);
  }

  onRequest(event: RequestEvent): void {
    if (this.options.verbose) this.print(formatRequestLine(event));
  }

  onBundleEnd(outcome: BundleOutcome): void {
    const text = describeOutcome(outcome);
    const spinner = this.spinner;
    this.spinner = undefined;
    if (!spinner) {
      const icon =
        outcome.status === 'failed'
          ? chalk.red('✗')
          : outcome.status === 'unchanged'
            ? chalk.gray('•')
            : chalk.green('✓');
      this.write(`${icon} ${text}`);
      return;
    }
    if (outcome.status === 'failed') spinner.fail(text);
    else if (outcome.status === 'unchanged') spinner.info(text);
    else spinner.succeed(text);
  }
}
