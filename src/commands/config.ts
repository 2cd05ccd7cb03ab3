import type { Command } from 'commander';
import chalk from 'chalk';
import { JsonPreferenceStore } from '../config/preferences.js';
import { describeResolution } from '../core/resolve.js';
import { action, parseToggle, type SessionProvider } from './context.js';

interface ConfigOptions {
  show?: boolean;
  verbose?: boolean;
  installFromCache?: boolean;
  repositoryPath?: string;
}

export function registerConfig(program: Command, getSession: SessionProvider): void {
  const configCmd = program
    .command('config')
    .description('View or update settings')
    .option('--show', 'Show current config')
    .option('--verbose <on|off>', 'Verbose logging', parseToggle)
    .option('--install-from-cache <on|off>', 'Install from the local cache when possible', parseToggle)
    .option('--repository-path <dir>', 'Directory packages are installed into')
    .action(action((opts: ConfigOptions) => {
      const session = getSession();
      const config = session.resolver.configuration();
      const changes: string[] = [];

      if (opts.verbose !== undefined) {
        config.setVerbose(opts.verbose);
        changes.push(`verbose ${opts.verbose ? 'on' : 'off'}`);
      }
      if (opts.installFromCache !== undefined) {
        config.setInstallFromCache(opts.installFromCache);
        changes.push(`install from cache ${opts.installFromCache ? 'on' : 'off'}`);
      }
      if (opts.repositoryPath !== undefined) {
        config.setRepositoryPath(opts.repositoryPath);
        changes.push(`repository path ${opts.repositoryPath}`);
      }
      if (changes.length > 0) {
        session.store.save(config);
        console.log(chalk.green(`✓ Updated: ${changes.join(', ')}`));
      }

      if (opts.show || changes.length === 0) {
        const onOff = (v: boolean): string => (v ? chalk.green('on') : chalk.dim('off'));
        console.log(chalk.bold('\n  Current Settings:'));
        console.log(chalk.dim(`    Verbose:            ${onOff(config.verbose)}`));
        console.log(chalk.dim(`    Install from cache: ${onOff(config.installFromCache)}`));
        console.log(chalk.dim(`    Repository path:    ${config.repositoryPath}`));
        console.log(chalk.dim(`    Active source:      ${describeResolution(session.resolver.resolved())}`));
        console.log(chalk.dim(`    Config file:        ${config.filePath}`));
        if (session.preferences instanceof JsonPreferenceStore) {
          console.log(chalk.dim(`    Preferences:        ${session.preferences.path}`));
        }
        console.log();
      }
    }));

  configCmd
    .command('move <directory>')
    .description('Move the config file to another directory under the project root')
    .action(action((directory: string) => {
      const result = getSession().relocator.move(directory);
      if (!result.ok) {
        // Already logged by the relocator; the previous location is still in effect.
        process.exitCode = 1;
        return;
      }
      console.log(
        result.moved
          ? chalk.green(`✓ Moved config to ${result.fullPath}`)
          : chalk.green(`✓ Config now lives at ${result.fullPath}`),
      );
    }));
}
