/**
 * Revision Resolver
 *
 * Turns requested revisions into identifiers the hosting site can show and
 * builds blob URLs for paths that exist at them. Both lookups are memoized
 * for the life of the process, failures included: the repository is assumed
 * not to change while the filter runs.
 */

import { GitCommandError } from '../../core/errors.js';
import { logger } from '../../core/logger.js';
import type { ResolvedRevision } from '../../models/location.js';
import type { GitService } from '../git/git-service.js';

/**
 * Options for revision resolution
 */
export interface RevisionResolverOptions {
  /** Base URL of the hosted repository */
  hostingRoot: string;
  /** Local name of the hosting remote */
  remote: string;
  /** Always resolve to the full commit id */
  permanent: boolean;
}

/**
 * Revision Resolver Implementation
 */
export class RevisionResolver {
  private revisions: Map<string, ResolvedRevision | null> = new Map();
  private blobUrls: Map<string, string | null> = new Map();

  constructor(
    private readonly git: GitService,
    private readonly options: RevisionResolverOptions
  ) {}

  /**
   * Resolve a revision, or null when it names no local commit
   */
  async resolveRevision(revision: string): Promise<ResolvedRevision | null> {
    const cached = this.revisions.get(revision);
    if (cached !== undefined) {
      return cached;
    }

    const resolved = await this.lookupRevision(revision);
    this.revisions.set(revision, resolved);
    logger.debug('Resolved revision', { revision, resolved });
    return resolved;
  }

  /**
   * URL of a repository path at a resolved revision, or null when the path
   * does not exist there
   */
  async resolveBlobUrl(revision: ResolvedRevision, path: string): Promise<string | null> {
    const key = `${revision.id}\0${path}`;
    const cached = this.blobUrls.get(key);
    if (cached !== undefined) {
      return cached;
    }

    const exists = await this.absorb(false, () => this.git.pathExists(revision.id, path));
    const url = exists ? `${this.options.hostingRoot}/blob/${revision.id}/${path}` : null;
    this.blobUrls.set(key, url);
    return url;
  }

  /**
   * Gets cache statistics
   */
  getStats(): { revisions: number; blobUrls: number; unresolved: number } {
    let unresolved = 0;
    for (const entry of this.revisions.values()) {
      if (entry === null) unresolved++;
    }
    return {
      revisions: this.revisions.size,
      blobUrls: this.blobUrls.size,
      unresolved
    };
  }

  private async lookupRevision(revision: string): Promise<ResolvedRevision | null> {
    const commit = await this.absorb(null, () => this.git.resolveCommit(revision));
    if (commit === null) {
      return null;
    }

    if (this.options.permanent) {
      return { id: commit, kind: 'commit' };
    }

    // an unreachable remote downgrades the link to a commit id
    const heads = await this.absorb([], () => this.git.listRemoteHeads(this.options.remote, revision), 'warn');
    if (heads.includes(revision)) {
      return { id: revision, kind: 'branch' };
    }

    const short = await this.absorb(null, () => this.git.resolveCommit(revision, { short: true }));
    return short === null ? null : { id: short, kind: 'short-commit' };
  }

  /**
   * Run a git query, reading a failed invocation as "not found"
   */
  private async absorb<T>(fallback: T, query: () => Promise<T>, level: 'debug' | 'warn' = 'debug'): Promise<T> {
    try {
      return await query();
    } catch (error) {
      if (error instanceof GitCommandError) {
        logger[level](error.message, { command: error.command });
        return fallback;
      }
      throw error;
    }
  }
}
