import chalk from 'chalk';
import Table from 'cli-table3';
import type { PackageInfo } from '../config/schema.js';
import { isPrerelease } from '../sources/versions.js';

const PLAIN_CHARS = {
  top: '', 'top-mid': '', 'top-left': '', 'top-right': '',
  bottom: '', 'bottom-mid': '', 'bottom-left': '', 'bottom-right': '',
  left: '  ', 'left-mid': '', mid: '', 'mid-mid': '',
  right: '', 'right-mid': '', middle: chalk.dim(' │ '),
};

/** Render packages as a borderless table. Returns the text so callers decide where it goes. */
export function renderPackageTable(packages: PackageInfo[]): string {
  const table = new Table({
    head: [chalk.dim('Package'), chalk.dim('Version'), chalk.dim('Source'), chalk.dim('Description')],
    chars: PLAIN_CHARS,
    style: { 'padding-left': 0, 'padding-right': 1 },
  });

  for (const pkg of packages) {
    const version = isPrerelease(pkg.version) ? chalk.yellow(pkg.version) : chalk.green(pkg.version);
    table.push([chalk.white.bold(pkg.id), version, chalk.dim(pkg.source), pkg.description ?? '']);
  }
  return table.toString();
}

/** Multi-line detail view for a single package. */
export function renderPackageDetail(pkg: PackageInfo): string {
  const lines = [
    chalk.bold(`\n  ${pkg.id} ${chalk.cyan(pkg.version)}`),
    chalk.dim(`    Source:      ${pkg.source}`),
  ];
  if (pkg.description) lines.push(chalk.dim(`    Description: ${pkg.description}`));
  if (pkg.authors.length > 0) lines.push(chalk.dim(`    Authors:     ${pkg.authors.join(', ')}`));
  if (pkg.frameworks.length > 0) lines.push(chalk.dim(`    Frameworks:  ${pkg.frameworks.join(', ')}`));
  return `${lines.join('\n')}\n`;
}
