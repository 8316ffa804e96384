import { createHash } from 'node:crypto';
import { join, resolve } from 'node:path';
import { ConfigurationError } from '../common/errors';

export interface MirrorLayout {
  /** `<cacheRoot>/<mirrorKey>/<branch>` */
  workDir: string;
  /** git working tree */
  repoDir: string;
  metadataFile: string;
  lockFile: string;
}

const UNSAFE_CHARACTERS = /[^A-Za-z0-9._-]/g;

function validateLocator(value: string, label: string): void {
  if (value.trim() === '') {
    throw new ConfigurationError(`${label} must not be empty`);
  }
  if (/[\s\0]/.test(value)) {
    throw new ConfigurationError(`${label} must not contain whitespace or NUL characters`, { value });
  }
  // would otherwise be read as an option by git
  if (value.startsWith('-')) {
    throw new ConfigurationError(`${label} must not start with "-"`, { value });
  }
}

export function validateReference(reference: string): void {
  validateLocator(reference, 'Repository reference');
}

export function validateBranch(branch: string): void {
  validateLocator(branch, 'Branch');
  if (branch.split('/').some((segment) => segment === '..' || segment === '.')) {
    throw new ConfigurationError('Branch must not contain "." or ".." segments', { branch });
  }
}

function referenceSlug(reference: string): string {
  const trimmed = reference.replace(/[/\\]+$/, '');
  const lastSegment = trimmed.split(/[/\\:]/).pop() ?? '';
  const slug = lastSegment.replace(/\.git$/, '').replace(UNSAFE_CHARACTERS, '_').slice(0, 40);
  return slug === '' || /^\.+$/.test(slug) ? 'repo' : slug;
}

/**
 * Directory name for a repository reference. The same reference always maps
 * to the same key; the hash keeps distinct references apart even when their
 * last path segment is equal.
 */
export function mirrorKey(reference: string): string {
  const hash = createHash('sha256').update(reference).digest('hex').slice(0, 16);
  return `${referenceSlug(reference)}-${hash}`;
}

export function branchDirectoryName(branch: string): string {
  const name = branch.replace(UNSAFE_CHARACTERS, '_');
  if (name === branch && !name.startsWith('.')) {
    return name;
  }
  // "feature/x" and "feature_x" must not share a directory
  const hash = createHash('sha256').update(branch).digest('hex').slice(0, 8);
  return `${name.replace(/^\.+/, '_')}-${hash}`;
}

export function mirrorLayout(cacheRoot: string, reference: string, branch: string): MirrorLayout {
  validateReference(reference);
  validateBranch(branch);
  const workDir = join(resolve(cacheRoot), mirrorKey(reference), branchDirectoryName(branch));
  return {
    workDir,
    repoDir: join(workDir, 'repo'),
    metadataFile: join(workDir, 'cache.json'),
    lockFile: join(workDir, 'mirror.lock'),
  };
}
