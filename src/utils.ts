import { basename, dirname } from 'path';
import type { FileEntry, NameParts } from './types.js';

/**
 * Utility functions used across the application
 */

/**
 * Split a filename at its last dot.
 *
 * @example
 * splitName("photo.final.jpg") // { base: "photo.final", extension: "jpg" }
 * splitName(".hidden")         // { base: ".hidden", extension: "" }
 */
export function splitName(name: string): NameParts {
  const lastDot = name.lastIndexOf('.');
  if (lastDot <= 0) {
    return { base: name, extension: '' };
  }
  return { base: name.substring(0, lastDot), extension: name.substring(lastDot + 1) };
}

export function joinName(parts: NameParts): string {
  return parts.extension ? `${parts.base}.${parts.extension}` : parts.base;
}

export function isSidecarName(name: string): boolean {
  return name.toLowerCase().endsWith('.json');
}

export function toFileEntry(filePath: string): FileEntry {
  const name = basename(filePath);
  return {
    path: filePath,
    dir: dirname(filePath),
    name,
    kind: isSidecarName(name) ? 'sidecar' : 'content'
  };
}

export function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
