import { execFile } from 'child_process';
import fs from 'fs';
import path from 'path';
import util from 'util';
import { v4 as uuidv4 } from 'uuid';
import { PipelineFailure, errorMessage } from '../errors.js';
import { IGNORED_DIRS, isSupportedFile } from './languages.js';

const execFilePromise = util.promisify(execFile);

export type GitRunner = (args: string[], timeoutMs: number) => Promise<void>;

/**
 * Checkout lifecycle used by the analysis pipeline.
 */
export interface SourceWorkspace {
  clone(repoUrl: string, branch: string): Promise<string>;
  discoverFiles(repoPath: string): Promise<string[]>;
  cleanup(repoPath: string): Promise<void>;
}

export interface RepositoryServiceOptions {
  cloneDir: string;
  cloneTimeoutMs?: number;
  runGit?: GitRunner;
}

const runGitCommand: GitRunner = async (args, timeoutMs) => {
  await execFilePromise('git', args, { timeout: timeoutMs, maxBuffer: 20 * 1024 * 1024 });
};

export class RepositoryService implements SourceWorkspace {
  private readonly cloneDir: string;
  private readonly cloneTimeoutMs: number;
  private readonly runGit: GitRunner;

  constructor(options: RepositoryServiceOptions) {
    this.cloneDir = options.cloneDir;
    this.cloneTimeoutMs = options.cloneTimeoutMs ?? 300_000;
    this.runGit = options.runGit ?? runGitCommand;
  }

  /**
   * Shallow-clone a branch into a fresh directory under the clone root
   */
  async clone(repoUrl: string, branch: string): Promise<string> {
    const repoPath = path.resolve(this.cloneDir, uuidv4());
    await fs.promises.mkdir(repoPath, { recursive: true });

    console.log(`Cloning ${repoUrl} (branch: ${branch}) to ${repoPath}`);
    try {
      await this.runGit(
        ['clone', '--depth', '1', '--branch', branch, '--single-branch', repoUrl, repoPath],
        this.cloneTimeoutMs,
      );
      console.log(`Clone complete: ${repoPath}`);
      return repoPath;
    } catch (error) {
      console.error('Git clone failed:', error);
      await this.cleanup(repoPath);
      throw new PipelineFailure(`Failed to clone repository: ${errorMessage(error)}`, { cause: error });
    }
  }

  /**
   * Walk the checkout and return absolute paths of supported source files,
   * skipping ignored directories at any depth
   */
  async discoverFiles(repoPath: string): Promise<string[]> {
    const files: string[] = [];

    const walk = async (dir: string): Promise<void> => {
      const entries = await fs.promises.readdir(dir, { withFileTypes: true });
      for (const entry of entries) {
        const fullPath = path.join(dir, entry.name);
        if (entry.isDirectory()) {
          if (!IGNORED_DIRS.has(entry.name)) {
            await walk(fullPath);
          }
        } else if (entry.isFile() && isSupportedFile(entry.name)) {
          files.push(fullPath);
        }
      }
    };

    await walk(repoPath);
    files.sort();
    console.log(`Discovered ${files.length} code files in ${repoPath}`);
    return files;
  }

  /**
   * Remove a checkout; a path that is already gone is not an error
   */
  async cleanup(repoPath: string): Promise<void> {
    if (!repoPath) {
      return;
    }
    await fs.promises.rm(repoPath, { recursive: true, force: true });
    console.log(`Cleaned up: ${repoPath}`);
  }
}
