import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import { z } from 'zod';
import { PREFERENCES_FILENAME } from './branding.js';
import { getHomePath } from '../utils/home.js';

/** Persistent key → string map that outlives a single process. */
export interface PreferenceStore {
  get(key: string, fallback: string): string;
  set(key: string, value: string): void;
}

const PreferencesSchema = z.record(z.string(), z.string());

/**
 * Preferences kept as a JSON object in the tool home
 * (~/.sourcegate/preferences.json). A missing or unreadable file reads as empty.
 */
export class JsonPreferenceStore implements PreferenceStore {
  constructor(private readonly filePath: string = getHomePath(PREFERENCES_FILENAME)) {}

  get(key: string, fallback: string): string {
    return this.read()[key] ?? fallback;
  }

  set(key: string, value: string): void {
    const prefs = { ...this.read(), [key]: value };
    if (!existsSync(dirname(this.filePath))) mkdirSync(dirname(this.filePath), { recursive: true });
    writeFileSync(this.filePath, JSON.stringify(prefs, null, 2), 'utf-8');
  }

  get path(): string {
    return this.filePath;
  }

  private read(): Record<string, string> {
    if (!existsSync(this.filePath)) return {};
    try {
      const parsed = PreferencesSchema.safeParse(JSON.parse(readFileSync(this.filePath, 'utf-8')));
      return parsed.success ? parsed.data : {};
    } catch { return {}; }
  }
}

/** In-process preferences, for tests and embedding hosts that persist elsewhere. */
export class MemoryPreferenceStore implements PreferenceStore {
  private readonly values = new Map<string, string>();

  constructor(initial: Record<string, string> = {}) {
    for (const [key, value] of Object.entries(initial)) this.values.set(key, value);
  }

  get(key: string, fallback: string): string {
    return this.values.get(key) ?? fallback;
  }

  set(key: string, value: string): void {
    this.values.set(key, value);
  }
}
