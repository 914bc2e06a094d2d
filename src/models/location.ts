// Location token and repository context models

import type { RevisionKind } from './types.js';

/**
 * A `[revision:]path[:lineno]` span matched in a line of text
 */
export interface LocationToken {
  /** Matched text, including a consumed trailing colon */
  text: string;
  /** Offset of the match within its line */
  index: number;
  revision?: string;
  path: string;
  lineno?: number;
  /** Whether a separator colon followed the token */
  trailingColon: boolean;
}

/**
 * Facts about the invocation captured once at startup
 */
export interface RepositoryContext {
  /** Local name of the remote pointing at the hosting repository */
  remote: string;
  /** Current branch, used when a token names no revision */
  branch: string;
  /** Repository-relative path of the working directory, '' or ending in '/' */
  prefix: string;
}

/**
 * A revision resolved to something the hosting site can show
 */
export interface ResolvedRevision {
  id: string;
  kind: RevisionKind;
}

/**
 * A token that resolved to a link
 */
export interface ResolvedLocation {
  token: LocationToken;
  revision: ResolvedRevision;
  /** Path from the repository root */
  qualifiedPath: string;
  url: string;
}
