// Startup checks: the invocation must happen inside a clone of the hosting repository

import { remoteMatchesHosting, type HostingLocation } from '../../core/config.js';
import { GitCommandError, RepositoryError } from '../../core/errors.js';
import { logger } from '../../core/logger.js';
import type { RepositoryContext } from '../../models/location.js';
import type { GitRemote, GitService } from '../git/git-service.js';

/**
 * Find the remote whose fetch or push URL points at the hosting repository
 */
export function findHostingRemote(remotes: GitRemote[], hosting: HostingLocation): GitRemote | undefined {
  return remotes.find(remote =>
    remoteMatchesHosting(remote.fetchUrl, hosting) || remoteMatchesHosting(remote.pushUrl, hosting)
  );
}

/**
 * Capture remote, branch and prefix once for the whole run
 *
 * @throws RepositoryError when not inside a clone of the hosting repository
 */
export async function loadRepositoryContext(git: GitService, hosting: HostingLocation): Promise<RepositoryContext> {
  if (!await git.isRepository()) {
    throw new RepositoryError('Not inside a git work tree', { hosting: hosting.root });
  }

  try {
    const remotes = await git.listRemotes();
    const remote = findHostingRemote(remotes, hosting);
    if (!remote) {
      throw new RepositoryError(
        `Not a clone of ${hosting.root}: no remote points at ${hosting.host}/${hosting.slug}`,
        { remotes: remotes.map(r => r.name) }
      );
    }

    const branch = await git.currentBranch();
    const prefix = await git.showPrefix();
    logger.debug('Repository context loaded', { remote: remote.name, branch, prefix });

    return { remote: remote.name, branch, prefix };
  } catch (error) {
    if (error instanceof GitCommandError) {
      throw new RepositoryError(`Cannot inspect repository: ${error.message}`, { command: error.command });
    }
    throw error;
  }
}
