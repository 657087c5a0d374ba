/**
 * Pure functions over sidecar filenames.
 *
 * Every repair takes a bare filename (no directory) and returns the canonical
 * filename it maps to, or undefined when the name matches no known pattern.
 */

import { escapeRegExp, joinName, splitName } from '../utils.js';

export const METADATA_MARKER = '.supplemental-metadata';
export const SIDECAR_SUFFIX = `${METADATA_MARKER}.json`;

/** Truncated forms of the marker, in lookup priority order. */
export const ABBREVIATED_MARKERS = [
  '.supplemental-meta',
  '.supplemental-metadat',
  '.supplem'
] as const;

/** Markers tried, in order, when a counter sits after the marker. */
export const COUNTER_MARKERS = [
  METADATA_MARKER,
  '.supplemental-meta',
  '.supplem'
] as const;

const MISPLACED_COUNTER = /^(.+)\((\d+)\)\.json$/;

export function canonicalSidecarName(contentName: string): string {
  return `${contentName}${SIDECAR_SUFFIX}`;
}

export function isCanonicalSidecarName(name: string): boolean {
  return name.endsWith(SIDECAR_SUFFIX) && name.length > SIDECAR_SUFFIX.length;
}

/**
 * `trip.jpg.supplemental-meta.json` -> `trip.jpg.supplemental-metadata.json`
 */
export function repairAbbreviatedName(name: string): string | undefined {
  for (const marker of ABBREVIATED_MARKERS) {
    const suffix = `${marker}.json`;
    if (name.endsWith(suffix) && name.length > suffix.length) {
      return name.slice(0, -suffix.length) + SIDECAR_SUFFIX;
    }
  }
  return undefined;
}

/**
 * True when the name ends in `(<digits>).json`, whether or not the rest of it
 * can be repaired.
 */
export function hasTrailingCounter(name: string): boolean {
  return MISPLACED_COUNTER.test(name);
}

/**
 * `img0002.jpg.supplemental-metadata(3).json` -> `img0002(3).jpg.supplemental-metadata.json`
 */
export function repairMisplacedCounter(name: string): string | undefined {
  const match = MISPLACED_COUNTER.exec(name);
  if (!match) return undefined;

  const [, head, counter] = match;
  for (const marker of COUNTER_MARKERS) {
    if (head.endsWith(marker) && head.length > marker.length) {
      const { base, extension } = splitName(head.slice(0, -marker.length));
      return joinName({ base: `${base}(${counter})`, extension }) + SIDECAR_SUFFIX;
    }
  }
  return undefined;
}

/**
 * Matches `<content-base-name>.*.supplemental-metadata.json`, ignoring case.
 */
export function sidecarPattern(contentName: string): RegExp {
  const { base } = splitName(contentName);
  return new RegExp(`^${escapeRegExp(base)}\\..*${escapeRegExp(SIDECAR_SUFFIX)}$`, 'i');
}

/**
 * Older exports cut the last character of a long base name and dropped both
 * the extension and the marker: `longname.jpg` -> `longnam.json`.
 */
export function legacyTruncatedName(contentName: string): string | undefined {
  // Code points, so a trailing emoji is dropped whole.
  const chars = Array.from(splitName(contentName).base);
  if (chars.length < 2) return undefined;
  return `${chars.slice(0, -1).join('')}.json`;
}

export function abbreviatedSidecarNames(contentName: string): string[] {
  return ABBREVIATED_MARKERS.map(marker => `${contentName}${marker}.json`);
}
