import type { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { parsePackageIdentifier } from '../config/schema.js';
import { renderPackageTable } from '../ui/packages.js';
import { action, type SessionProvider } from './context.js';

interface UpdatesOptions {
  prerelease: boolean;
  frameworks: string;
  constraints: string;
}

export function registerUpdates(program: Command, getSession: SessionProvider): void {
  program
    .command('updates <packages...>')
    .description('List newer versions for installed packages (given as id@version)')
    .option('--prerelease', 'Consider prerelease versions', false)
    .option('-f, --frameworks <list>', 'Target frameworks, comma separated', '')
    .option('-c, --constraints <range>', 'Semver range updates must satisfy', '')
    .action(action(async (specs: string[], opts: UpdatesOptions) => {
      const installed = specs.map(parsePackageIdentifier);
      const { resolver, queries } = getSession();
      resolver.active();

      const spinner = ora(`Checking ${installed.length} package(s)...`).start();
      const updates = await queries.getUpdates(installed, {
        includePrerelease: opts.prerelease,
        targetFrameworks: opts.frameworks,
        versionConstraints: opts.constraints,
      }).catch((err: unknown) => {
        spinner.fail('Update check failed');
        throw err;
      });
      spinner.stop();

      if (updates.length === 0) {
        console.log(chalk.green('✓ Everything is up to date'));
        return;
      }
      console.log(renderPackageTable(updates));
    }));
}
