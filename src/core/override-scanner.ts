import { OVERRIDE_SOURCE_PREFIX, SOURCE_OVERRIDE_MARKERS } from '../config/branding.js';
import { defineSource, type PackageSourceDescriptor } from '../config/schema.js';

const FLAG_PREFIX = '-';

export interface ScanOptions {
  /** Tokens that start collecting source locations. Compared case-insensitively. */
  markers?: readonly string[];
}

type ScanState = 'idle' | 'collecting';

interface ScanStep {
  state: ScanState;
  /** 'marker' and 'location' tokens belong to an override; 'other' does not. */
  role: 'marker' | 'location' | 'other';
}

function isMarker(token: string, markers: readonly string[]): boolean {
  const lowered = token.toLowerCase();
  return markers.some((m) => m.toLowerCase() === lowered);
}

/** Transition function shared by scanning and stripping. */
function step(state: ScanState, token: string, markers: readonly string[]): ScanStep {
  if (token.startsWith(FLAG_PREFIX)) {
    return isMarker(token, markers)
      ? { state: 'collecting', role: 'marker' }
      : { state: 'idle', role: 'other' };
  }
  return state === 'collecting'
    ? { state, role: 'location' }
    : { state, role: 'other' };
}

/**
 * Extract source overrides from invocation arguments.
 *
 * `-Source a b -Source c` yields CMD_LINE_SRC_0..2 for a, b, c. A marker
 * directly followed by another flag contributes nothing.
 */
export function scanSourceOverrides(args: readonly string[], options: ScanOptions = {}): PackageSourceDescriptor[] {
  const markers = options.markers ?? SOURCE_OVERRIDE_MARKERS;
  const found: PackageSourceDescriptor[] = [];
  let state: ScanState = 'idle';

  for (const token of args) {
    const next = step(state, token, markers);
    if (next.role === 'location') {
      found.push(defineSource(`${OVERRIDE_SOURCE_PREFIX}${found.length}`, token));
    }
    state = next.state;
  }
  return found;
}

/** The arguments left once every marker and its locations are removed. */
export function stripSourceOverrides(args: readonly string[], options: ScanOptions = {}): string[] {
  const markers = options.markers ?? SOURCE_OVERRIDE_MARKERS;
  const rest: string[] = [];
  let state: ScanState = 'idle';

  for (const token of args) {
    const next = step(state, token, markers);
    if (next.role === 'other') rest.push(token);
    state = next.state;
  }
  return rest;
}
