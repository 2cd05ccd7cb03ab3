import type { Command } from 'commander';
import chalk from 'chalk';
import { select } from '@inquirer/prompts';
import { defineSource } from '../config/schema.js';
import { describeResolution } from '../core/resolve.js';
import type { Session } from '../core/session.js';
import { action, type SessionProvider } from './context.js';

const NO_SOURCE = Symbol('none');

/** Persist the configuration and re-resolve so the active source reflects the edit. */
function commit(session: Session): void {
  session.store.save(session.resolver.configuration());
  session.resolver.reload();
}

export function registerSources(program: Command, getSession: SessionProvider): void {
  const sourcesCmd = program.command('sources').description('Manage package sources');

  sourcesCmd
    .command('list', { isDefault: true })
    .description('List configured sources and the one in use')
    .action(action(() => {
      const { resolver } = getSession();
      const config = resolver.configuration();
      if (config.sources.length === 0) {
        console.log(chalk.yellow('No sources configured. Use: sourcegate sources add <name> <location>'));
      }
      for (const source of config.sources) {
        const marker = source.name === config.activeSourceName ? chalk.green('●') : ' ';
        const auth = source.credentials ? chalk.dim(` (as ${source.credentials.username})`) : '';
        console.log(`  ${marker} ${chalk.white.bold(source.name)} ${chalk.dim(source.location)}${auth}`);
      }
      console.log(chalk.dim(`\n  In use: ${describeResolution(resolver.resolved())}\n`));
    }));

  sourcesCmd
    .command('add <name> <location>')
    .description('Add a source (URL or directory)')
    .option('-u, --username <username>', 'Username for an authenticated registry')
    .option('-p, --password <password>', 'Password for an authenticated registry')
    .action(action((name: string, location: string, opts: { username?: string; password?: string }) => {
      if ((opts.username === undefined) !== (opts.password === undefined)) {
        throw new Error('--username and --password must be given together');
      }
      const credentials =
        opts.username !== undefined && opts.password !== undefined
          ? { username: opts.username, password: opts.password }
          : undefined;

      const session = getSession();
      session.resolver.configuration().addSource(defineSource(name, location, credentials));
      commit(session);
      console.log(chalk.green(`✓ Added source "${name}"`));
    }));

  sourcesCmd
    .command('remove <name>')
    .description('Remove a source')
    .action(action((name: string) => {
      const session = getSession();
      session.resolver.configuration().removeSource(name);
      commit(session);
      console.log(chalk.green(`✓ Removed source "${name}"`));
    }));

  sourcesCmd
    .command('use [name]')
    .description('Designate the active source (prompts when no name is given)')
    .option('--none', 'Clear the designation and query every configured source')
    .action(action(async (name: string | undefined, opts: { none?: boolean }) => {
      const session = getSession();
      const config = session.resolver.configuration();

      let chosen: string | null;
      if (opts.none) {
        chosen = null;
      } else if (name !== undefined) {
        chosen = name;
      } else {
        const picked = await select<string | typeof NO_SOURCE>({
          message: 'Which source should queries use?',
          choices: [
            ...config.sources.map((s) => ({ name: `${s.name}  ${chalk.dim(s.location)}`, value: s.name })),
            { name: chalk.dim('All sources'), value: NO_SOURCE, description: 'Query every configured source in order' },
          ],
          default: config.activeSourceName ?? NO_SOURCE,
        });
        chosen = picked === NO_SOURCE ? null : picked;
      }

      config.setActiveSource(chosen);
      commit(session);
      console.log(chalk.green(`✓ Active source: ${chosen ?? 'all sources'}`));
    }));
}
