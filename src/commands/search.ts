import type { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { renderPackageTable } from '../ui/packages.js';
import { action, parseCount, type SessionProvider } from './context.js';

interface SearchOptions {
  prerelease: boolean;
  take: number;
  skip: number;
}

export function registerSearch(program: Command, getSession: SessionProvider): void {
  program
    .command('search [term]')
    .description('Search the active package source(s); no term lists everything')
    .option('--prerelease', 'Include prerelease versions', false)
    .option('-n, --take <count>', 'Number of results', parseCount, 15)
    .option('--skip <count>', 'Number of results to skip', parseCount, 0)
    .action(action(async (term: string | undefined, opts: SearchOptions) => {
      const { resolver, queries } = getSession();
      // Resolve before the spinner starts so load messages are not drawn over.
      resolver.active();

      const controller = new AbortController();
      const onInterrupt = (): void => controller.abort();
      process.once('SIGINT', onInterrupt);

      const spinner = ora('Searching...').start();
      try {
        const results = await queries.search(
          { term: term ?? '', includePrerelease: opts.prerelease, take: opts.take, skip: opts.skip },
          controller.signal,
        );
        spinner.stop();
        if (results.length === 0) {
          console.log(chalk.yellow('No packages found.'));
          return;
        }
        console.log(renderPackageTable(results));
      } catch (err) {
        spinner.fail('Search failed');
        throw err;
      } finally {
        process.off('SIGINT', onInterrupt);
      }
    }));
}
