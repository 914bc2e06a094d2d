/**
 * Git Service
 *
 * Read-only queries against the local repository and its remotes.
 * Every failed invocation surfaces as a GitCommandError; callers decide
 * whether that is fatal.
 */

import { simpleGit, type SimpleGit } from 'simple-git';
import { GitCommandError } from '../../core/errors.js';

/**
 * A configured remote
 */
export interface GitRemote {
  name: string;
  fetchUrl: string;
  pushUrl: string;
}

/**
 * Options for revision lookup
 */
export interface ResolveCommitOptions {
  /** Abbreviate the object name */
  short?: boolean;
}

/**
 * Git Service Interface
 */
export interface GitService {
  isRepository(): Promise<boolean>;
  listRemotes(): Promise<GitRemote[]>;
  currentBranch(): Promise<string>;
  /** Path of the working directory relative to the top level, '' or ending in '/' */
  showPrefix(): Promise<string>;
  /** Commit a revision names, or null when it names none */
  resolveCommit(revision: string, options?: ResolveCommitOptions): Promise<string | null>;
  /** Branch names under refs/heads/ that a remote advertises for a name */
  listRemoteHeads(remote: string, branch: string): Promise<string[]>;
  /** Whether `<revision>:<path>` names an object */
  pathExists(revision: string, path: string): Promise<boolean>;
}

const HEADS_PREFIX = 'refs/heads/';

/**
 * Git Service backed by simple-git
 */
export class SimpleGitService implements GitService {
  private git: SimpleGit;

  constructor(baseDir?: string) {
    this.git = simpleGit(baseDir);
  }

  private async run(args: string[], fn: (git: SimpleGit) => Promise<string>): Promise<string> {
    try {
      return (await fn(this.git)).trim();
    } catch (error) {
      throw new GitCommandError(args, error);
    }
  }

  async isRepository(): Promise<boolean> {
    try {
      return await this.git.checkIsRepo();
    } catch {
      // git itself is missing
      return false;
    }
  }

  async listRemotes(): Promise<GitRemote[]> {
    try {
      const remotes = await this.git.getRemotes(true);
      return remotes.map(remote => ({
        name: remote.name,
        fetchUrl: remote.refs.fetch,
        pushUrl: remote.refs.push
      }));
    } catch (error) {
      throw new GitCommandError(['remote', '-v'], error);
    }
  }

  async currentBranch(): Promise<string> {
    const args = ['--abbrev-ref', 'HEAD'];
    return this.run(['rev-parse', ...args], git => git.revparse(args));
  }

  async showPrefix(): Promise<string> {
    const args = ['--show-prefix'];
    return this.run(['rev-parse', ...args], git => git.revparse(args));
  }

  async resolveCommit(revision: string, options: ResolveCommitOptions = {}): Promise<string | null> {
    const args = [...(options.short ? ['--short'] : []), '--verify', `${revision}^{commit}`];
    const output = await this.run(['rev-parse', ...args], git => git.revparse(args));
    return output || null;
  }

  async listRemoteHeads(remote: string, branch: string): Promise<string[]> {
    const args = ['--heads', remote, `${HEADS_PREFIX}${branch}`];
    const output = await this.run(['ls-remote', ...args], git => git.listRemote(args));

    const heads: string[] = [];
    for (const line of output.split('\n')) {
      const ref = line.split('\t')[1]?.trim();
      if (ref?.startsWith(HEADS_PREFIX)) {
        heads.push(ref.slice(HEADS_PREFIX.length));
      }
    }
    return heads;
  }

  async pathExists(revision: string, path: string): Promise<boolean> {
    // -e answers only through the exit status; -t prints the object type
    const args = ['-t', `${revision}:${path}`];
    const output = await this.run(['cat-file', ...args], git => git.catFile(args));
    return output.length > 0;
  }
}
