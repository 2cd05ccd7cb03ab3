#!/usr/bin/env node
import { Command } from 'commander';
import { APP_NAME, SOURCE_OVERRIDE_MARKERS } from './config/branding.js';
import { stripSourceOverrides } from './core/override-scanner.js';
import { createSession, type Session } from './core/session.js';
import { registerConfig } from './commands/config.js';
import { registerGet } from './commands/get.js';
import { registerSearch } from './commands/search.js';
import { registerSources } from './commands/sources.js';
import { registerUpdates } from './commands/updates.js';

// Source overrides (-Source a b ...) are read straight from the raw arguments
// and hidden from commander, which would otherwise treat them as positionals.
const rawArgs = process.argv.slice(2);

const program = new Command();

program
  .name(APP_NAME)
  .description('Resolve and query the package sources a project uses')
  .version('0.1.0')
  .option('-C, --cwd <dir>', 'Project root', process.cwd())
  .addHelpText(
    'after',
    `\nOverride sources for one run with ${SOURCE_OVERRIDE_MARKERS[0]} <location...> (URLs or directories).`,
  );

let session: Session | null = null;
const getSession = (): Session => {
  session ??= createSession({ projectRoot: program.opts<{ cwd: string }>().cwd, args: rawArgs });
  return session;
};

registerSearch(program, getSession);
registerUpdates(program, getSession);
registerGet(program, getSession);
registerSources(program, getSession);
registerConfig(program, getSession);

await program.parseAsync(stripSourceOverrides(process.argv));
