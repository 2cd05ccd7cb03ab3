import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { PREF_CONFIG_DIRECTORY } from '../../src/config/branding.js';
import { YamlConfigStore } from '../../src/config/config-store.js';
import { ConfigLocation } from '../../src/config/location.js';
import { MemoryPreferenceStore } from '../../src/config/preferences.js';
import { RecordingNotifier } from '../../src/core/notifier.js';
import { ConfigRelocator, nodeFileSystem, type RelocationFileSystem } from '../../src/core/relocator.js';
import { SourceResolver } from '../../src/core/resolver.js';
import type { Logger } from '../../src/utils/logger.js';
import { fakeFactory } from '../helpers/fakes.js';

interface Harness {
  root: string;
  prefs: MemoryPreferenceStore;
  location: ConfigLocation;
  resolver: SourceResolver;
  notifier: RecordingNotifier;
  relocator: ConfigRelocator;
  renames: Array<[string, string]>;
}

function recordingLogger(): Logger & { warnings: string[]; errors: string[] } {
  const warnings: string[] = [];
  const errors: string[] = [];
  return {
    warnings,
    errors,
    info: () => {},
    success: () => {},
    warn: (message) => warnings.push(message),
    error: (message) => errors.push(message),
    verbose: () => {},
  };
}

function errorWithCode(message: string, code: string): Error {
  return Object.assign(new Error(message), { code });
}

describe('ConfigRelocator', () => {
  let root: string;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), 'sourcegate-move-'));
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  function harness(overrides: Partial<RelocationFileSystem> = {}, logger?: Logger): Harness {
    const prefs = new MemoryPreferenceStore({ [PREF_CONFIG_DIRECTORY]: '' });
    const location = ConfigLocation.fromPreferences(root, prefs);
    const notifier = new RecordingNotifier();
    const resolver = new SourceResolver({
      store: new YamlConfigStore(),
      location,
      createSource: fakeFactory().factory,
      notifier,
    });
    const renames: Array<[string, string]> = [];
    const fs: RelocationFileSystem = {
      ...nodeFileSystem,
      renameSync: (from, to) => {
        renames.push([from, to]);
        nodeFileSystem.renameSync(from, to);
      },
      ...overrides,
    };
    const relocator = new ConfigRelocator({ location, preferences: prefs, resolver, fs, notifier, logger });
    return { root, prefs, location, resolver, notifier, relocator, renames };
  }

  it('creates a fresh config at the new place when there is nothing to move', () => {
    const h = harness();
    const result = h.relocator.move('settings');

    expect(result).toEqual({ ok: true, moved: false, sidecarMoved: false, fullPath: join(root, 'settings', 'sourcegate.yaml') });
    expect(h.renames).toEqual([]);
    expect(h.location.directoryPath).toBe('settings');
    expect(h.prefs.get(PREF_CONFIG_DIRECTORY, 'unset')).toBe('settings');
    expect(existsSync(join(root, 'settings', 'sourcegate.yaml'))).toBe(true);
    expect(h.notifier.events).toEqual(['plugins:reinitialize', 'assets:rescan']);
  });

  it('moves the config file and updates every path', () => {
    const h = harness();
    const config = h.resolver.configuration();
    const oldPath = join(root, 'sourcegate.yaml');
    const newPath = join(root, 'config', 'sourcegate.yaml');
    const original = readFileSync(oldPath, 'utf-8');

    const result = h.relocator.move('config');

    expect(result).toEqual({ ok: true, moved: true, sidecarMoved: false, fullPath: newPath });
    expect(existsSync(oldPath)).toBe(false);
    expect(readFileSync(newPath, 'utf-8')).toBe(original);
    expect(h.location.fullPath).toBe(newPath);
    expect(h.prefs.get(PREF_CONFIG_DIRECTORY, 'unset')).toBe('config');
    expect(config.filePath).toBe(newPath);
    expect(h.notifier.events).toEqual(['plugins:reinitialize', 'assets:rescan']);
  });

  it('moves the sidecar alongside the config file', () => {
    const h = harness();
    h.resolver.configuration();
    writeFileSync(join(root, 'sourcegate.yaml.meta'), 'guid: 1234\n');

    const result = h.relocator.move('config');

    expect(result).toMatchObject({ ok: true, moved: true, sidecarMoved: true });
    expect(existsSync(join(root, 'sourcegate.yaml.meta'))).toBe(false);
    expect(readFileSync(join(root, 'config', 'sourcegate.yaml.meta'), 'utf-8')).toBe('guid: 1234\n');
    expect(existsSync(join(root, 'config', 'sourcegate.yaml'))).toBe(true);
  });

  it('rolls everything back when the move fails', () => {
    const h = harness({
      renameSync: () => {
        throw errorWithCode('permission denied', 'EACCES');
      },
    });
    h.resolver.configuration();
    const oldPath = join(root, 'sourcegate.yaml');
    const before = readFileSync(oldPath, 'utf-8');

    const result = h.relocator.move('config');

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error).toBeInstanceOf(Error);
    expect(h.location.directoryPath).toBe('');
    expect(h.location.fullPath).toBe(oldPath);
    expect(h.prefs.get(PREF_CONFIG_DIRECTORY, 'unset')).toBe('');
    expect(readFileSync(oldPath, 'utf-8')).toBe(before);
    expect(existsSync(join(root, 'config', 'sourcegate.yaml'))).toBe(false);
    expect(h.resolver.configuration().filePath).toBe(oldPath);
    expect(h.notifier.events).toEqual(['plugins:reinitialize']);
  });

  it('refuses to overwrite an existing file at the destination', () => {
    const h = harness();
    h.resolver.configuration();
    mkdirSync(join(root, 'config'));
    writeFileSync(join(root, 'config', 'sourcegate.yaml'), 'verbose: true\n');
    writeFileSync(join(root, 'sourcegate.yaml'), 'verbose: false\n');

    const result = h.relocator.move('config');

    expect(result.ok).toBe(false);
    expect(readFileSync(join(root, 'sourcegate.yaml'), 'utf-8')).toBe('verbose: false\n');
    expect(readFileSync(join(root, 'config', 'sourcegate.yaml'), 'utf-8')).toBe('verbose: true\n');
    expect(h.location.directoryPath).toBe('');
  });

  it('falls back to copy and delete across devices', () => {
    const h = harness({
      renameSync: () => {
        throw errorWithCode('cross-device link not permitted', 'EXDEV');
      },
    });
    h.resolver.configuration();

    const result = h.relocator.move('config');

    expect(result).toMatchObject({ ok: true, moved: true });
    expect(existsSync(join(root, 'sourcegate.yaml'))).toBe(false);
    expect(existsSync(join(root, 'config', 'sourcegate.yaml'))).toBe(true);
  });

  it('accepts an absolute directory under the project root', () => {
    const h = harness();
    h.resolver.configuration();

    const result = h.relocator.move(join(root, 'abs', 'dir'));

    expect(result.ok).toBe(true);
    expect(h.location.directoryPath).toBe(join('abs', 'dir'));
    expect(existsSync(join(root, 'abs', 'dir', 'sourcegate.yaml'))).toBe(true);
  });

  it('does nothing when the directory is unchanged', () => {
    const h = harness();
    h.resolver.configuration();

    const result = h.relocator.move('.');

    expect(result).toEqual({ ok: true, moved: false, sidecarMoved: false, fullPath: join(root, 'sourcegate.yaml') });
    expect(h.renames).toEqual([]);
    expect(h.notifier.events).toEqual(['plugins:reinitialize']);
  });

  it('points later loads at the new location', () => {
    const h = harness();
    h.resolver.configuration();
    h.relocator.move('config');

    h.resolver.invalidate();
    expect(h.resolver.configuration().filePath).toBe(join(root, 'config', 'sourcegate.yaml'));
    expect(ConfigLocation.fromPreferences(root, h.prefs).fullPath).toBe(join(root, 'config', 'sourcegate.yaml'));
  });

  it('removes the copied file when the source cannot be deleted after a cross-device copy', () => {
    const oldPath = join(root, 'sourcegate.yaml');
    const h = harness({
      renameSync: () => {
        throw errorWithCode('cross-device link not permitted', 'EXDEV');
      },
      unlinkSync: (path) => {
        if (path === oldPath) throw errorWithCode('resource busy', 'EBUSY');
        nodeFileSystem.unlinkSync(path);
      },
    });
    h.resolver.configuration();

    const result = h.relocator.move('config');

    expect(result.ok).toBe(false);
    expect(h.location.directoryPath).toBe('');
    expect(h.prefs.get(PREF_CONFIG_DIRECTORY, 'unset')).toBe('');
    expect(existsSync(oldPath)).toBe(true);
    expect(existsSync(join(root, 'config', 'sourcegate.yaml'))).toBe(false);
  });

  it('rolls back when loading a fresh config at the new place fails', () => {
    mkdirSync(join(root, 'settings'));
    writeFileSync(join(root, 'settings', 'sourcegate.yaml'), 'sources: [unclosed\n');
    const h = harness();

    const result = h.relocator.move('settings');

    expect(result.ok).toBe(false);
    expect(h.location.directoryPath).toBe('');
    expect(h.prefs.get(PREF_CONFIG_DIRECTORY, 'unset')).toBe('');
    expect(existsSync(join(root, 'sourcegate.yaml'))).toBe(false);
    expect(h.notifier.events).toEqual([]);
  });

  it('keeps the primary move when the sidecar cannot be moved', () => {
    const logger = recordingLogger();
    const h = harness(
      {
        renameSync: (from, to) => {
          if (from.endsWith('.meta')) throw errorWithCode('permission denied', 'EACCES');
          nodeFileSystem.renameSync(from, to);
        },
      },
      logger,
    );
    h.resolver.configuration();
    const sidecar = join(root, 'sourcegate.yaml.meta');
    writeFileSync(sidecar, 'guid: 1234\n');

    const result = h.relocator.move('config');

    expect(result).toEqual({
      ok: true,
      moved: true,
      sidecarMoved: false,
      fullPath: join(root, 'config', 'sourcegate.yaml'),
    });
    expect(existsSync(sidecar)).toBe(true);
    expect(logger.warnings).toEqual([`Could not move ${sidecar}: permission denied`]);
    expect(h.prefs.get(PREF_CONFIG_DIRECTORY, 'unset')).toBe('config');
  });

  it('rejects a directory outside the project root', () => {
    const logger = recordingLogger();
    const h = harness({}, logger);
    h.resolver.configuration();
    const outside = join(root, '..', 'elsewhere');

    const result = h.relocator.move(outside);

    expect(result.ok).toBe(false);
    expect(logger.errors).toEqual([`${outside} is outside the project root`]);
    expect(h.location.directoryPath).toBe('');
    expect(h.prefs.get(PREF_CONFIG_DIRECTORY, 'unset')).toBe('');
    expect(existsSync(join(root, 'sourcegate.yaml'))).toBe(true);
    expect(h.relocator.move('../elsewhere').ok).toBe(false);
  });
});
