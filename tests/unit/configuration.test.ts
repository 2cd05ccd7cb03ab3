import { describe, it, expect } from 'vitest';
import { Configuration, createDefaultConfiguration } from '../../src/config/configuration.js';
import { defineSource } from '../../src/config/schema.js';
import { ConfigurationError } from '../../src/utils/errors.js';

describe('Configuration', () => {
  it('starts from the documented defaults', () => {
    const config = createDefaultConfiguration('/p/sourcegate.yaml');
    expect(config.verbose).toBe(false);
    expect(config.installFromCache).toBe(true);
    expect(config.repositoryPath).toBe('Packages');
    expect(config.sources).toEqual([{ name: 'default', location: 'feed' }]);
    expect(config.activeSourceName).toBe('default');
  });

  it('rejects duplicate source names', () => {
    const config = createDefaultConfiguration('/p/sourcegate.yaml');
    expect(() => config.addSource(defineSource('default', 'elsewhere'))).toThrow(ConfigurationError);
  });

  it('only designates configured sources', () => {
    const config = createDefaultConfiguration('/p/sourcegate.yaml');
    expect(() => config.setActiveSource('ghost')).toThrow('Source "ghost" not found');
    expect(config.activeSourceName).toBe('default');
  });

  it('clears the designation when the active source is removed', () => {
    const config = createDefaultConfiguration('/p/sourcegate.yaml');
    config.addSource(defineSource('second', './second'));
    config.removeSource('default');
    expect(config.activeSource).toBeNull();
    expect(config.sources.map((s) => s.name)).toEqual(['second']);
  });

  it('keeps the designation when another source is removed', () => {
    const config = createDefaultConfiguration('/p/sourcegate.yaml');
    config.addSource(defineSource('second', './second'));
    config.removeSource('second');
    expect(config.activeSourceName).toBe('default');
  });

  it('throws when removing an unknown source', () => {
    const config = createDefaultConfiguration('/p/sourcegate.yaml');
    expect(() => config.removeSource('ghost')).toThrow(ConfigurationError);
  });

  it('round-trips credentials through toData', () => {
    const config = new Configuration('/p/sourcegate.yaml', {
      verbose: false,
      install_from_cache: true,
      repository_path: 'Packages',
      active_source: null,
      sources: [{ name: 'private', location: 'https://private.example.test', credentials: { username: 'u', password: 'test-secret' } }],
    });
    expect(config.toData().sources).toEqual([
      { name: 'private', location: 'https://private.example.test', credentials: { username: 'u', password: 'test-secret' } },
    ]);
  });

  it('updates the storage path through its setter', () => {
    const config = createDefaultConfiguration('/p/sourcegate.yaml');
    config.setFilePath('/p/settings/sourcegate.yaml');
    expect(config.filePath).toBe('/p/settings/sourcegate.yaml');
  });
});
