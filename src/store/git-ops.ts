import { simpleGit, type SimpleGit, type LogResult } from 'simple-git';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { StoreError, logger } from '../utils/index.js';
import { STORE_DIRS } from './file-layout.js';

export class GitOps {
  private client: SimpleGit | null = null;
  readonly storePath: string;

  constructor(storePath: string) {
    this.storePath = storePath;
  }

  private get git(): SimpleGit {
    if (!this.client) throw new StoreError('Store not initialized: call init() first');
    return this.client;
  }

  /** Initialize the git repo and directory structure. */
  async init(): Promise<void> {
    // Create directories first so simpleGit can initialize
    await fs.mkdir(this.storePath, { recursive: true });
    for (const dir of STORE_DIRS) {
      await fs.mkdir(path.join(this.storePath, dir), { recursive: true });
    }

    this.client = simpleGit(this.storePath);

    // Check if already a git repo
    const isRepo = await this.client.checkIsRepo().catch(() => false);
    if (!isRepo) {
      await this.client.init();
      await this.client.addConfig('user.name', 'customer-signals');
      await this.client.addConfig('user.email', 'customer-signals@localhost');
      // Create initial commit so git log doesn't fail
      await fs.writeFile(path.join(this.storePath, '.gitignore'), '.lock\n', 'utf-8');
      await this.client.add('.gitignore');
      await this.client.commit('Initial commit');
      logger.info('Initialized git repository at', this.storePath);
    }
  }

  async addMultiple(filePaths: string[]): Promise<void> {
    if (filePaths.length > 0) {
      await this.git.add(filePaths);
    }
  }

  /** Commit staged changes. Returns null when there was nothing to commit. */
  async commit(message: string): Promise<string | null> {
    const status = await this.git.status();
    const staged = status.files.some(file => file.index !== ' ' && file.index !== '?');
    if (!staged) return null;
    const result = await this.git.commit(message);
    return result.commit;
  }

  async log(options?: { file?: string; maxCount?: number }): Promise<LogResult> {
    const args: Record<string, string | number | null> = {};
    if (options?.maxCount) args['--max-count'] = options.maxCount;

    if (options?.file) {
      return this.git.log({ file: options.file, ...args });
    }
    return this.git.log(args);
  }

  async revert(commitHash: string): Promise<void> {
    await this.git.revert(commitHash, { '--no-edit': null });
  }

  async tag(tagName: string): Promise<void> {
    await this.git.addTag(tagName);
  }

  /** Discard uncommitted changes to tracked files and unstage everything. */
  async resetHard(): Promise<void> {
    await this.git.reset(['--hard', 'HEAD']);
    const roots = [...new Set(STORE_DIRS.map(dir => dir.split('/')[0]))];
    await this.git.raw(['clean', '-fd', '--', ...roots]);
  }
}
