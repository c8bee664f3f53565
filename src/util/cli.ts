import chalk from 'chalk';

export type Cell = { plain: string; formatted: string };

export function printTable(header: string[], rows: Cell[][]): void {
  const widths = header.map((col, i) =>
    Math.max(col.length, ...rows.map((r) => r[i]?.plain.length ?? 0))
  );
  const formatRow = (cells: Cell[]) =>
    cells
      .map(
        (cell, i) => `${cell.formatted}${' '.repeat(Math.max(0, widths[i] - cell.plain.length))}`
      )
      .join('  ')
      .trimEnd();
  console.log(formatRow(header.map((h) => ({ plain: h, formatted: chalk.bold(h) }))));
  rows.forEach((r) => {
    console.log(formatRow(r));
  });
}

export function plainCell(value: string): Cell {
  return { plain: value, formatted: value };
}

/** Formats a count with its noun, e.g. "1 rule", "3 rules" */
export function pluralize(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? '' : 's'}`;
}
