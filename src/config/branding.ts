import { join } from 'node:path';
import { homedir } from 'node:os';

// ─── Root Brand Primitives ──────────────────────────────────────────

/** This tool's name (CLI command, home subdir, config filename). */
export const APP_NAME = 'sourcegate';

// ─── Derived Brand Constants ────────────────────────────────────────

/** Directory under $HOME for preferences: .sourcegate */
export const CONFIG_PARENT_DIR = `.${APP_NAME}`;

/** Config filename: sourcegate.yaml */
export const CONFIG_FILENAME = `${APP_NAME}.yaml`;

/** Companion file moved alongside the config: sourcegate.yaml.meta */
export const SIDECAR_SUFFIX = '.meta';

/** Preference file inside the tool home. */
export const PREFERENCES_FILENAME = 'preferences.json';

/** Preference key remembering the config directory (relative to the project root). */
export const PREF_CONFIG_DIRECTORY = 'configDirectoryPath';

/** Default home directory: ~/.sourcegate */
export const APP_HOME_DIR = join(homedir(), CONFIG_PARENT_DIR);

/** Human-readable home dir path for messages. */
export const APP_HOME_DIR_DISPLAY = `~/${CONFIG_PARENT_DIR}`;

/** Environment variable overriding the home directory. */
export const ENV_HOME_OVERRIDE = `${APP_NAME.toUpperCase()}_HOME`;

// ─── Command-line overrides ─────────────────────────────────────────

/** Tokens that start a list of source overrides (compared case-insensitively). */
export const SOURCE_OVERRIDE_MARKERS = ['-Source', '--source'] as const;

/** Name prefix of descriptors synthesized from command-line overrides. */
export const OVERRIDE_SOURCE_PREFIX = 'CMD_LINE_SRC_';
