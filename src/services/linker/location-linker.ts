/**
 * Location Linker
 *
 * Rewrites `[revision:]path[:lineno]` references in text into links on the
 * hosting site, or lists only the references that resolve.
 */

import type { LinkFormat } from '../../models/types.js';
import type { LocationToken, RepositoryContext, ResolvedLocation } from '../../models/location.js';
import type { GitService } from '../git/git-service.js';
import { RevisionResolver } from './revision-resolver.js';
import { scanLocations, tokenLabel } from './token-scanner.js';

/**
 * Options for the linker
 */
export interface LocationLinkerOptions {
  /** Base URL of the hosted repository */
  hostingRoot: string;
  format: LinkFormat;
  /** Always link to full commit ids */
  permanent: boolean;
}

/**
 * Location Linker Interface
 */
export interface ILocationLinker {
  resolve(token: LocationToken): Promise<ResolvedLocation | null>;
  render(location: ResolvedLocation): string;
  linkLine(line: string): Promise<string>;
  listLine(line: string): Promise<string[]>;
}

/**
 * Location Linker Implementation
 */
export class LocationLinker implements ILocationLinker {
  private resolver: RevisionResolver;

  constructor(
    git: GitService,
    private readonly context: RepositoryContext,
    private readonly options: LocationLinkerOptions
  ) {
    this.resolver = new RevisionResolver(git, {
      hostingRoot: options.hostingRoot,
      remote: context.remote,
      permanent: options.permanent
    });
  }

  /**
   * Resolve a token to a link, or null when its revision or path is unknown
   */
  async resolve(token: LocationToken): Promise<ResolvedLocation | null> {
    const revision = await this.resolver.resolveRevision(token.revision ?? this.context.branch);
    if (!revision) {
      return null;
    }

    const qualifiedPath = `${this.context.prefix}${token.path}`;
    const blobUrl = await this.resolver.resolveBlobUrl(revision, qualifiedPath);
    if (!blobUrl) {
      return null;
    }

    const url = token.lineno !== undefined ? `${blobUrl}#L${token.lineno}` : blobUrl;
    return { token, revision, qualifiedPath, url };
  }

  /**
   * Text a resolved token is replaced with
   */
  render(location: ResolvedLocation): string {
    if (this.options.format === 'markdown') {
      return `[${tokenLabel(location.token)}](${location.url})`;
    }
    return location.url;
  }

  /**
   * Replace every resolvable token in a line; everything else is kept as is
   */
  async linkLine(line: string): Promise<string> {
    let output = '';
    let cursor = 0;

    for (const token of scanLocations(line)) {
      const location = await this.resolve(token);
      if (!location) {
        continue;
      }

      output += line.slice(cursor, token.index);
      // a separator colon is emitted as a space
      output += this.render(location) + (token.trailingColon ? ' ' : '');
      cursor = token.index + token.text.length;
    }

    return output + line.slice(cursor);
  }

  /**
   * Rendered links for the resolvable tokens of a line, in order
   */
  async listLine(line: string): Promise<string[]> {
    const links: string[] = [];
    for (const token of scanLocations(line)) {
      const location = await this.resolve(token);
      if (location) {
        links.push(this.render(location));
      }
    }
    return links;
  }

  getStats(): ReturnType<RevisionResolver['getStats']> {
    return this.resolver.getStats();
  }
}
