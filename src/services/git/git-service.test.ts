/**
 * Git Service Tests
 *
 * simple-git is mocked; these tests check the commands issued and how their
 * output is read.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { SimpleGitService } from './git-service.js';
import { GitCommandError } from '../../core/errors.js';

vi.mock('simple-git', () => ({
  simpleGit: vi.fn()
}));

import { simpleGit } from 'simple-git';

describe('SimpleGitService', () => {
  const mockGit = {
    checkIsRepo: vi.fn(),
    getRemotes: vi.fn(),
    revparse: vi.fn(),
    listRemote: vi.fn(),
    catFile: vi.fn()
  };
  let service: SimpleGitService;

  beforeEach(() => {
    vi.clearAllMocks();
    vi.mocked(simpleGit).mockReturnValue(mockGit as unknown as ReturnType<typeof simpleGit>);
    service = new SimpleGitService('/work/openssl');
  });

  it('should open the repository at the given directory', () => {
    expect(simpleGit).toHaveBeenCalledWith('/work/openssl');
  });

  describe('isRepository', () => {
    it('should report a work tree', async () => {
      mockGit.checkIsRepo.mockResolvedValue(true);
      expect(await service.isRepository()).toBe(true);
    });

    it('should report false when git cannot run', async () => {
      mockGit.checkIsRepo.mockRejectedValue(new Error('spawn git ENOENT'));
      expect(await service.isRepository()).toBe(false);
    });
  });

  describe('listRemotes', () => {
    it('should flatten fetch and push URLs', async () => {
      mockGit.getRemotes.mockResolvedValue([
        { name: 'origin', refs: { fetch: 'git@github.com:openssl/openssl.git', push: 'git@github.com:openssl/openssl.git' } }
      ]);
      expect(await service.listRemotes()).toEqual([
        { name: 'origin', fetchUrl: 'git@github.com:openssl/openssl.git', pushUrl: 'git@github.com:openssl/openssl.git' }
      ]);
      expect(mockGit.getRemotes).toHaveBeenCalledWith(true);
    });

    it('should wrap failures', async () => {
      mockGit.getRemotes.mockRejectedValue(new Error('fatal: not a git repository'));
      await expect(service.listRemotes()).rejects.toBeInstanceOf(GitCommandError);
    });
  });

  describe('currentBranch and showPrefix', () => {
    it('should trim rev-parse output', async () => {
      mockGit.revparse.mockResolvedValueOnce('main\n').mockResolvedValueOnce('crypto/\n');
      expect(await service.currentBranch()).toBe('main');
      expect(await service.showPrefix()).toBe('crypto/');
      expect(mockGit.revparse).toHaveBeenNthCalledWith(1, ['--abbrev-ref', 'HEAD']);
      expect(mockGit.revparse).toHaveBeenNthCalledWith(2, ['--show-prefix']);
    });

    it('should return an empty prefix at the top level', async () => {
      mockGit.revparse.mockResolvedValue('\n');
      expect(await service.showPrefix()).toBe('');
    });
  });

  describe('resolveCommit', () => {
    it('should verify the revision names a commit', async () => {
      mockGit.revparse.mockResolvedValue('0123456789abcdef0123456789abcdef01234567\n');
      expect(await service.resolveCommit('main')).toBe('0123456789abcdef0123456789abcdef01234567');
      expect(mockGit.revparse).toHaveBeenCalledWith(['--verify', 'main^{commit}']);
    });

    it('should abbreviate on request', async () => {
      mockGit.revparse.mockResolvedValue('0123456\n');
      expect(await service.resolveCommit('main', { short: true })).toBe('0123456');
      expect(mockGit.revparse).toHaveBeenCalledWith(['--short', '--verify', 'main^{commit}']);
    });

    it('should return null for empty output', async () => {
      mockGit.revparse.mockResolvedValue('');
      expect(await service.resolveCommit('nosuch')).toBeNull();
    });

    it('should raise a GitCommandError naming the command', async () => {
      mockGit.revparse.mockRejectedValue(new Error('fatal: Needed a single revision'));
      const error = await service.resolveCommit('nosuch').catch((e: unknown) => e);
      expect(error).toBeInstanceOf(GitCommandError);
      expect(error).toHaveProperty('command', ['rev-parse', '--verify', 'nosuch^{commit}']);
      expect(error).toHaveProperty(
        'message',
        'git rev-parse --verify nosuch^{commit} failed: fatal: Needed a single revision'
      );
    });
  });

  describe('listRemoteHeads', () => {
    it('should return the branch names the remote advertises', async () => {
      mockGit.listRemote.mockResolvedValue('0123456789abcdef0123456789abcdef01234567\trefs/heads/main\n');
      expect(await service.listRemoteHeads('origin', 'main')).toEqual(['main']);
      expect(mockGit.listRemote).toHaveBeenCalledWith(['--heads', 'origin', 'refs/heads/main']);
    });

    it('should return nothing for an unknown branch', async () => {
      mockGit.listRemote.mockResolvedValue('');
      expect(await service.listRemoteHeads('origin', 'feature')).toEqual([]);
    });
  });

  describe('pathExists', () => {
    it('should ask for the object type at the revision', async () => {
      mockGit.catFile.mockResolvedValue('blob\n');
      expect(await service.pathExists('main', 'crypto/mem.c')).toBe(true);
      expect(mockGit.catFile).toHaveBeenCalledWith(['-t', 'main:crypto/mem.c']);
    });

    it('should report a missing path as a git failure', async () => {
      mockGit.catFile.mockRejectedValue(new Error("fatal: path 'x.c' does not exist in 'main'"));
      await expect(service.pathExists('main', 'x.c')).rejects.toBeInstanceOf(GitCommandError);
    });
  });
});
