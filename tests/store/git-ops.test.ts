import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import * as os from 'node:os';
import { GitOps } from '../../src/store/git-ops.js';
import { StoreError } from '../../src/utils/errors.js';

let gitOps: GitOps;
let storePath: string;

beforeEach(async () => {
  storePath = await fs.mkdtemp(path.join(os.tmpdir(), 'customer-signals-git-'));
  gitOps = new GitOps(storePath);
  await gitOps.init();
});

afterEach(async () => {
  await fs.rm(storePath, { recursive: true, force: true });
});

async function writeAndCommit(relative: string, content: string, message: string): Promise<string | null> {
  await fs.writeFile(path.join(storePath, relative), content);
  await gitOps.addMultiple([relative]);
  return gitOps.commit(message);
}

describe('GitOps', () => {
  describe('init', () => {
    it('should create the directory structure', async () => {
      const dirs = await fs.readdir(storePath);
      expect(dirs).toEqual(expect.arrayContaining(['inputs', 'events', 'registry', 'flags', 'experiments', '.git']));
      expect(await fs.readdir(path.join(storePath, 'inputs'))).toContain('contacts');
    });

    it('should have an initial commit', async () => {
      const log = await gitOps.log({ maxCount: 1 });
      expect(log.all).toHaveLength(1);
      expect(log.all[0].message).toBe('Initial commit');
    });

    it('should not re-initialize on second call', async () => {
      await writeAndCommit('events/feed.json', '[]', 'Add feed');
      await gitOps.init();
      const log = await gitOps.log();
      expect(log.all).toHaveLength(2);
    });

    it('should require init before use', async () => {
      const fresh = new GitOps(storePath);
      await expect(fresh.log()).rejects.toThrow(StoreError);
    });
  });

  describe('commit', () => {
    it('should return the commit hash', async () => {
      const hash = await writeAndCommit('flags/a.json', '[]', 'Add flags');
      expect(hash).toBeTruthy();
    });

    it('should return null when nothing is staged', async () => {
      await writeAndCommit('flags/a.json', '[]', 'Add flags');
      expect(await writeAndCommit('flags/a.json', '[]', 'Same flags')).toBeNull();
    });
  });

  describe('log', () => {
    it('should scope log to a specific file', async () => {
      await writeAndCommit('flags/a.json', '["a"]', 'Commit A');
      await writeAndCommit('events/b.json', '["b"]', 'Commit B');

      const log = await gitOps.log({ file: 'flags/a.json', maxCount: 10 });
      expect(log.all.map(entry => entry.message)).toEqual(['Commit A']);
    });
  });

  describe('revert', () => {
    it('should revert a commit', async () => {
      await writeAndCommit('flags/a.json', 'original', 'Add file');
      await writeAndCommit('flags/a.json', 'changed', 'Change file');

      const log = await gitOps.log({ maxCount: 1 });
      await gitOps.revert(log.all[0].hash);

      expect(await fs.readFile(path.join(storePath, 'flags', 'a.json'), 'utf-8')).toBe('original');
    });
  });

  describe('resetHard', () => {
    it('should restore tracked files and remove new ones', async () => {
      await writeAndCommit('flags/a.json', 'committed', 'Add file');

      await fs.writeFile(path.join(storePath, 'flags', 'a.json'), 'dirty');
      await fs.writeFile(path.join(storePath, 'registry', 'new.json'), 'untracked');
      await fs.writeFile(path.join(storePath, 'inputs', 'family-edges.json'), 'untracked');
      await gitOps.addMultiple(['flags/a.json']);

      await gitOps.resetHard();

      expect(await fs.readFile(path.join(storePath, 'flags', 'a.json'), 'utf-8')).toBe('committed');
      await expect(fs.access(path.join(storePath, 'registry', 'new.json'))).rejects.toThrow();
      await expect(fs.access(path.join(storePath, 'inputs', 'family-edges.json'))).rejects.toThrow();
    });
  });
});
