/**
 * Interactive operator menu
 * Lists the bundles and runs whichever the operator picks until they quit
 */

import { input } from '@inquirer/prompts';
import chalk from 'chalk';
import type { Bundle, Catalog } from '../catalog/schema.js';

export type MenuSelection =
  | { type: 'bundle'; bundleId: string }
  | { type: 'all' }
  | { type: 'quit' };

/**
 * Matches the operator's answer against the fixed set of choices: a bundle id,
 * a bundle's number, "all" or "quit". Case-sensitive; surrounding whitespace
 * is ignored. Anything else yields undefined.
 */
export function parseMenuSelection(
  answer: string,
  bundles: readonly Bundle[]
): MenuSelection | undefined {
  const value = answer.trim();
  if (value === 'quit') return { type: 'quit' };
  if (value === 'all') return { type: 'all' };

  const byId = bundles.find((bundle) => bundle.id === value);
  if (byId) return { type: 'bundle', bundleId: byId.id };

  if (/^[1-9]\d*$/.test(value)) {
    const byNumber = bundles[Number(value) - 1];
    if (byNumber) return { type: 'bundle', bundleId: byNumber.id };
  }
  return undefined;
}

export function formatMenu(bundles: readonly Bundle[]): string[] {
  const width = String(bundles.length).length;
  const lines = [chalk.blue('Zone baseline bundles:')];
  for (const [index, bundle] of bundles.entries()) {
    const number = String(index + 1).padStart(width);
    const description = bundle.description ? chalk.gray(` - ${bundle.description}`) : '';
    lines.push(`  ${number}. ${chalk.cyan(bundle.id)} ${bundle.name}${description}`);
  }
  lines.push(
    chalk.gray(`  Enter a bundle id or number, ${chalk.cyan('all')} or ${chalk.cyan('quit')}`)
  );
  return lines;
}

export interface MenuOptions {
  catalog: Catalog;
  /** Runs the chosen bundles; the menu comes back once it resolves */
  execute: (selection: readonly string[] | 'all') => Promise<void>;
  prompt?: () => Promise<string>;
  write?: (line: string) => void;
}

const defaultPrompt = () => input({ message: 'Bundle to apply:' });

export async function runMenu(options: MenuOptions): Promise<void> {
  const { catalog, execute } = options;
  const prompt = options.prompt ?? defaultPrompt;
  const write = options.write ?? ((line: string) => console.log(line));

  for (;;) {
    for (const line of formatMenu(catalog.bundles)) write(line);

    let selection: MenuSelection | undefined;
    while (!selection) {
      const answer = await prompt();
      selection = parseMenuSelection(answer, catalog.bundles);
      if (!selection) {
        write(chalk.yellow(`⚠ "${answer.trim()}" is not one of the listed choices`));
      }
    }

    if (selection.type === 'quit') return;
    await execute(selection.type === 'all' ? 'all' : [selection.bundleId]);
    write('');
  }
}
