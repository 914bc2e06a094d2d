/**
 * Linker configuration
 *
 * Holds the fixed hosting location links are built against and turns the
 * raw command-line flags into validated linker options.
 */

import { UsageError } from './errors.js';
import { HostingRootSchema, safeValidateLinkerOptions, type LinkerOptions } from './schemas.js';

/**
 * Repository on the hosting site that links point into
 */
export const HOSTING_ROOT = 'https://github.com/openssl/openssl';

/**
 * A parsed hosting root
 */
export interface HostingLocation {
  /** Base URL without trailing slash */
  root: string;
  /** Host name, e.g. github.com */
  host: string;
  /** owner/repo */
  slug: string;
}

/**
 * Parse and validate a hosting root URL
 */
export function parseHostingRoot(root: string = HOSTING_ROOT): HostingLocation {
  const result = HostingRootSchema.safeParse(root);
  if (!result.success) {
    throw new UsageError(result.error.issues[0]?.message ?? 'Invalid hosting root', 'hostingRoot');
  }

  const url = new URL(result.data);
  return {
    root: result.data,
    host: url.hostname,
    slug: url.pathname.replace(/^\//, '')
  };
}

/**
 * Whether a remote URL (https, ssh or scp-like) refers to the hosted repository
 */
export function remoteMatchesHosting(remoteUrl: string, hosting: HostingLocation): boolean {
  const trimmed = remoteUrl.trim().replace(/\/+$/, '').replace(/\.git$/, '');

  // scp-like syntax: git@github.com:owner/repo
  const scpLike = /^(?:[^@/]+@)?([^:/]+):(?!\/)(.+)$/.exec(trimmed);
  if (scpLike) {
    return scpLike[1] === hosting.host && scpLike[2] === hosting.slug;
  }

  let url: URL;
  try {
    url = new URL(trimmed);
  } catch {
    return false;
  }
  return url.hostname === hosting.host && url.pathname.replace(/^\//, '') === hosting.slug;
}

/**
 * Validate raw flags from the command line, filling defaults
 */
export function resolveLinkerOptions(raw: Record<string, unknown>): LinkerOptions {
  const result = safeValidateLinkerOptions(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const option = issue?.path.join('.') || undefined;
    throw new UsageError(issue ? issue.message : 'Invalid options', option);
  }
  return result.data;
}
