import { readdir, realpath, stat } from 'node:fs/promises';
import type { Stats } from 'node:fs';
import { isAbsolute, join, sep } from 'node:path';
import { Minimatch } from 'minimatch';
import { ConfigurationError, errorCode } from '../common/errors';
import { getLogger, Logger } from '../common/logger';

export interface SelectionOptions {
  /** Glob patterns relative to the mirror root, e.g. `*.cfg` or `nodes/**\/*.cfg`. */
  patterns: string[];
  exclude?: string[];
  /** Files matching these are kept even when an `exclude` pattern matches. */
  forceInclude?: string[];
  /** Let `*` and `**` match names starting with a dot. */
  dot?: boolean;
}

export interface SelectedFile {
  /** `/`-separated path relative to the mirror root */
  relativePath: string;
  absolutePath: string;
}

function compareCodeUnits(a: string, b: string): number {
  if (a < b) {
    return -1;
  }
  return a > b ? 1 : 0;
}

function isInside(root: string, candidate: string): boolean {
  return candidate === root || candidate.startsWith(root.endsWith(sep) ? root : `${root}${sep}`);
}

export class FileSelector {
  private readonly include: Minimatch[];
  private readonly exclude: Minimatch[];
  private readonly forceInclude: Minimatch[];
  private readonly logger: Logger;

  constructor(options: SelectionOptions, logger?: Logger) {
    this.logger = logger ?? getLogger('selector');
    const dot = options.dot ?? false;
    this.include = this.compile(options.patterns, dot);
    this.exclude = this.compile(options.exclude ?? [], dot);
    this.forceInclude = this.compile(options.forceInclude ?? [], dot);
  }

  /**
   * Files below `root` matching the selection, deduplicated and sorted by
   * relative path. Matches resolving outside `root` are dropped.
   */
  async select(root: string): Promise<SelectedFile[]> {
    let rootStats: Stats;
    try {
      rootStats = await stat(root);
    } catch (error) {
      throw new ConfigurationError(`Mirror root ${root} is not readable`, { root, reason: errorCode(error) }, { cause: error });
    }
    if (!rootStats.isDirectory()) {
      throw new ConfigurationError(`Mirror root ${root} is not a directory`, { root });
    }
    if (this.include.length === 0) {
      return [];
    }

    const realRoot = await realpath(root);
    const found = new Map<string, SelectedFile>();
    await this.walk(root, realRoot, '.', new Set([realRoot]), found);
    return [...found.values()].sort((a, b) => compareCodeUnits(a.relativePath, b.relativePath));
  }

  matches(relativePath: string): boolean {
    if (!this.include.some((matcher) => matcher.match(relativePath))) {
      return false;
    }
    if (!this.exclude.some((matcher) => matcher.match(relativePath))) {
      return true;
    }
    return this.forceInclude.some((matcher) => matcher.match(relativePath));
  }

  private compile(patterns: string[], dot: boolean): Minimatch[] {
    const compiled: Minimatch[] = [];
    for (const raw of patterns) {
      const pattern = raw.trim().replace(/^(\.\/)+/, '');
      if (pattern === '') {
        throw new ConfigurationError('Selection patterns must not be empty', { pattern: raw });
      }
      if (isAbsolute(pattern) || pattern.split('/').includes('..')) {
        this.logger.warn('Ignoring pattern that points outside the mirror', { pattern: raw });
        continue;
      }
      compiled.push(new Minimatch(pattern, { dot }));
    }
    return compiled;
  }

  private async walk(
    root: string,
    realRoot: string,
    relativeDir: string,
    visited: Set<string>,
    found: Map<string, SelectedFile>,
  ): Promise<void> {
    const absoluteDir = join(root, relativeDir);
    const entries = await readdir(absoluteDir, { withFileTypes: true });

    for (const entry of entries) {
      if (entry.name === '.git') {
        continue;
      }
      const relPath = relativeDir === '.' ? entry.name : `${relativeDir}/${entry.name}`;
      const fullPath = join(root, relPath);

      if (entry.isDirectory()) {
        await this.walk(root, realRoot, relPath, visited, found);
        continue;
      }
      if (entry.isFile()) {
        if (this.matches(relPath)) {
          found.set(relPath, { relativePath: relPath, absolutePath: fullPath });
        }
        continue;
      }
      if (entry.isSymbolicLink()) {
        await this.followLink(root, realRoot, relPath, visited, found);
      }
    }
  }

  private async followLink(
    root: string,
    realRoot: string,
    relPath: string,
    visited: Set<string>,
    found: Map<string, SelectedFile>,
  ): Promise<void> {
    const fullPath = join(root, relPath);
    let target: string;
    try {
      target = await realpath(fullPath);
    } catch (error) {
      this.logger.debug('Skipping dangling link', { path: relPath, reason: errorCode(error) });
      return;
    }
    const targetStats = await stat(target);

    if (targetStats.isDirectory()) {
      if (!isInside(realRoot, target)) {
        this.logger.warn('Not following directory link that leaves the mirror', { path: relPath, target });
        return;
      }
      if (visited.has(target)) {
        return;
      }
      visited.add(target);
      await this.walk(root, realRoot, relPath, visited, found);
      return;
    }

    if (!targetStats.isFile() || !this.matches(relPath)) {
      return;
    }
    if (!isInside(realRoot, target)) {
      this.logger.warn('Excluding match that resolves outside the mirror', { path: relPath, target });
      return;
    }
    found.set(relPath, { relativePath: relPath, absolutePath: fullPath });
  }
}

export async function selectFiles(root: string, options: SelectionOptions, logger?: Logger): Promise<SelectedFile[]> {
  return new FileSelector(options, logger).select(root);
}
