import { promises as fs } from 'fs';
import { dirname, join, resolve } from 'path';
import type { FileEntry } from '../types.js';
import { toFileEntry } from '../utils.js';
import { logger } from '../logger.js';

export interface FileTreeOptions {
  /** Absolute paths left out of every listing (the diagnostic log, the report). */
  ignore?: Iterable<string>;
}

/**
 * Read-through view of the export tree. Nothing is cached: every call lists
 * the disk again. Moves recorded with `recordVirtualMove` (dry-run) are laid
 * over the listing so later phases see what earlier phases would have done.
 */
export class FileTree {
  readonly root: string;
  private readonly ignore: Set<string>;
  private readonly added = new Set<string>();
  private readonly removed = new Set<string>();

  constructor(root: string, options: FileTreeOptions = {}) {
    this.root = resolve(root);
    this.ignore = new Set(Array.from(options.ignore ?? [], p => resolve(p)));
  }

  /**
   * All files under `dir`, depth first, names sorted within each directory.
   */
  async walk(dir: string = this.root): Promise<FileEntry[]> {
    const entries = await fs.readdir(dir, { withFileTypes: true });
    const subdirs = entries
      .filter(entry => entry.isDirectory())
      .map(entry => join(dir, entry.name))
      .sort();

    const files = this.overlay(dir, entries.filter(entry => entry.isFile()).map(entry => entry.name));
    for (const subdir of subdirs) {
      files.push(...await this.walk(subdir));
    }
    return files;
  }

  /**
   * Files directly inside `dir`; a missing directory lists as empty.
   */
  async listDir(dir: string): Promise<FileEntry[]> {
    try {
      const entries = await fs.readdir(dir, { withFileTypes: true });
      return this.overlay(dir, entries.filter(entry => entry.isFile()).map(entry => entry.name));
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return this.overlay(dir, []);
      }
      throw error;
    }
  }

  /**
   * Exact-name lookup, so a case-only rename on a case-insensitive volume
   * does not see its own source as the destination.
   */
  async exists(filePath: string): Promise<boolean> {
    const target = resolve(filePath);
    const siblings = await this.listDir(dirname(target));
    return siblings.some(entry => entry.path === target);
  }

  recordVirtualMove(from: string, to: string): void {
    const source = resolve(from);
    const destination = resolve(to);
    this.added.delete(source);
    this.removed.add(source);
    this.removed.delete(destination);
    this.added.add(destination);
    logger.debug('Recorded virtual move', { from: source, to: destination });
  }

  private overlay(dir: string, names: string[]): FileEntry[] {
    const base = resolve(dir);
    const paths = new Set(names.map(name => join(base, name)));

    for (const removed of this.removed) paths.delete(removed);
    for (const added of this.added) {
      if (dirname(added) === base) paths.add(added);
    }
    for (const ignored of this.ignore) paths.delete(ignored);

    return Array.from(paths).sort().map(toFileEntry);
  }
}
