import { describe, it, expect } from 'vitest';
import { ConfigLocation } from '../../src/config/location.js';
import { RecordingNotifier } from '../../src/core/notifier.js';
import { SourceResolver } from '../../src/core/resolver.js';
import { CompositeSource } from '../../src/sources/composite-source.js';
import { CountingConfigStore, FakeSource, fakeFactory } from '../helpers/fakes.js';

const SOURCES = [
  { name: 'main', location: 'https://packages.example.test/v1' },
  { name: 'local', location: './feed' },
];

function setup(args: string[] = [], active: string | null = 'main') {
  const store = new CountingConfigStore({ sources: SOURCES, active_source: active });
  const notifier = new RecordingNotifier();
  const { factory, created } = fakeFactory();
  const location = new ConfigLocation('/tmp/project', 'settings');
  const resolver = new SourceResolver({ store, location, createSource: factory, args, notifier });
  return { store, notifier, created, resolver, location };
}

describe('SourceResolver', () => {
  it('starts unresolved and resolves on first access', () => {
    const { resolver, store } = setup();
    expect(resolver.status).toBe('unresolved');
    expect(resolver.loadedConfiguration()).toBeNull();

    resolver.active();
    expect(resolver.status).toBe('resolved');
    expect(store.loads).toBe(1);
  });

  it('loads from the location full path', () => {
    const { resolver, location } = setup();
    expect(resolver.configuration().filePath).toBe(location.fullPath);
  });

  it('returns the cached source on later reads without parsing again', () => {
    const { resolver, store } = setup();
    const first = resolver.active();
    const second = resolver.active();
    resolver.configuration();
    resolver.resolved();
    expect(second).toBe(first);
    expect(store.loads).toBe(1);
  });

  it('reloads after invalidate', () => {
    const { resolver, store } = setup();
    resolver.active();
    resolver.invalidate();
    expect(resolver.status).toBe('unresolved');
    resolver.active();
    expect(store.loads).toBe(2);
  });

  it('uses the designated config source without overrides', () => {
    const { resolver, created } = setup();
    const source = resolver.active();
    expect(source).toBeInstanceOf(FakeSource);
    expect(source.name).toBe('main');
    expect(created.map((d) => d.name)).toEqual(['main']);
    expect(resolver.configuration().installFromCache).toBe(true);
  });

  it('combines all configured sources when none is designated', () => {
    const { resolver } = setup([], null);
    const source = resolver.active();
    expect(source).toBeInstanceOf(CompositeSource);
    if (source instanceof CompositeSource) {
      expect(source.sources.map((s) => s.name)).toEqual(['main', 'local']);
    }
  });

  it('prefers a single command-line override', () => {
    const { resolver } = setup(['search', '-Source', './ci-feed']);
    const source = resolver.active();
    expect(source.name).toBe('CMD_LINE_SRC_0');
    expect(resolver.resolved().kind).toBe('single');
    expect(resolver.configuration().installFromCache).toBe(false);
  });

  it('builds a composite in scan order for several overrides', () => {
    const { resolver } = setup(['-Source', './a', './b', '-Source', './c']);
    const source = resolver.active();
    expect(source).toBeInstanceOf(CompositeSource);
    if (source instanceof CompositeSource) {
      expect(source.sources.map((s) => s.name)).toEqual(['CMD_LINE_SRC_0', 'CMD_LINE_SRC_1', 'CMD_LINE_SRC_2']);
    }
    expect(resolver.configuration().installFromCache).toBe(false);
  });

  it('notifies plugins on the first resolution only while the result is unchanged', () => {
    const { resolver, notifier } = setup();
    resolver.active();
    resolver.reload();
    resolver.invalidate();
    resolver.active();
    expect(notifier.events).toEqual(['plugins:reinitialize']);
  });

  it('notifies again when the resolved source changes', () => {
    const { resolver, notifier, store } = setup();
    resolver.active();
    store.data = { ...store.data, active_source: 'local' };
    resolver.reload();
    expect(resolver.active().name).toBe('local');
    expect(notifier.events).toEqual(['plugins:reinitialize', 'plugins:reinitialize']);
  });

  it('propagates load failures and stays unresolved', () => {
    const { resolver } = setup();
    const failing = new SourceResolver({
      store: {
        loadOrCreate: () => {
          throw new Error('bad yaml');
        },
        save: () => {},
      },
      location: resolver.location,
      createSource: fakeFactory().factory,
    });
    expect(() => failing.active()).toThrow('bad yaml');
    expect(failing.status).toBe('unresolved');
  });

  it('reports verbose only from an already loaded configuration', () => {
    const store = new CountingConfigStore({ verbose: true });
    const resolver = new SourceResolver({
      store,
      location: new ConfigLocation('/tmp/project'),
      createSource: fakeFactory().factory,
    });
    expect(resolver.isVerbose()).toBe(false);
    expect(store.loads).toBe(0);
    resolver.configuration();
    expect(resolver.isVerbose()).toBe(true);
  });
});
