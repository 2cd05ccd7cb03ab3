import type { Command } from 'commander';
import chalk from 'chalk';
import { formatPackage, parsePackageIdentifier } from '../config/schema.js';
import { renderPackageDetail } from '../ui/packages.js';
import { action, type SessionProvider } from './context.js';

export function registerGet(program: Command, getSession: SessionProvider): void {
  program
    .command('get <id> <version>')
    .description('Look up one exact package version')
    .action(action(async (id: string, version: string) => {
      const identifier = parsePackageIdentifier(`${id}@${version}`);
      const pkg = await getSession().queries.getSpecificPackage(identifier);
      if (!pkg) {
        console.log(chalk.yellow(`${formatPackage(identifier)} was not found in the active source(s).`));
        process.exitCode = 1;
        return;
      }
      console.log(renderPackageDetail(pkg));
    }));
}
