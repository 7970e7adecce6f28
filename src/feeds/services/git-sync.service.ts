import { Inject, Injectable, Logger } from '@nestjs/common';
import { promises as fs } from 'node:fs';
import path from 'node:path';
import {
  GIT_USER_EMAIL,
  GIT_USER_NAME,
  SYNC_ENABLED,
  SYNC_REMOTE_URL,
  SYNC_REPO_PATH,
  SYNC_SSH_KEY_PATH,
} from '../config/feeds.constants';
import { Result, SyncError } from '../types/feeds.types';
import { formatCommitTimestamp } from '../utils/date.util';
import { err, errorMessage, ok } from '../utils/result.util';
import { GIT_RUNNER, GitRunner } from './git-runner';

export interface SyncOutcome {
  committed: boolean;
  pushed: boolean;
}

/**
 * Mirrors the publish directory to a remote git repository:
 * stage everything, commit when something changed, push.
 */
// git runs GIT_SSH_COMMAND through a shell
function quoteShellArg(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

@Injectable()
export class GitSyncService {
  private readonly logger = new Logger(GitSyncService.name);
  private ready = false;
  private hasRemote = false;

  constructor(@Inject(GIT_RUNNER) private readonly runner: GitRunner) {}

  async sync(): Promise<Result<SyncOutcome, SyncError>> {
    if (!SYNC_ENABLED) {
      this.logger.debug('git sync disabled (SYNC_ENABLED=0)');
      return err({ kind: 'disabled', message: 'sync disabled' });
    }

    const setup = await this.ensureRepository();
    if (!setup.ok) {
      this.logger.warn(`git repository unavailable: ${setup.error.message}`);
      return setup;
    }

    try {
      await this.git(['add', '--all']);
      const status = await this.git(['status', '--porcelain']);
      const committed = status.trim().length > 0;
      if (committed) {
        await this.git([
          'commit',
          '-m',
          `Automatic update ${formatCommitTimestamp(new Date())}`,
        ]);
      } else {
        this.logger.log('git sync: nothing to commit');
      }

      if (!this.hasRemote) {
        this.logger.warn('git sync: no origin remote configured, push skipped');
        return ok({ committed, pushed: false });
      }
      await this.git(['push', '-u', 'origin', 'HEAD']);
      this.logger.log(`git push done: committed=${committed}`);
      return ok({ committed, pushed: true });
    } catch (error) {
      const message = errorMessage(error);
      this.logger.error(`git push error: ${message}`);
      return err({ kind: 'command', message });
    }
  }

  private async ensureRepository(): Promise<Result<void, SyncError>> {
    if (this.ready) {
      return ok(undefined);
    }

    try {
      await fs.mkdir(SYNC_REPO_PATH, { recursive: true });
      const topLevel = await this.git(['rev-parse', '--show-toplevel']).then(
        (out) => out.trim(),
        () => '',
      );
      if (!topLevel || path.resolve(topLevel) !== path.resolve(SYNC_REPO_PATH)) {
        this.logger.log(`initialising git repository: ${SYNC_REPO_PATH}`);
        await this.git(['init']);
      }

      const remotes = (await this.git(['remote']))
        .split('\n')
        .map((line) => line.trim())
        .filter(Boolean);
      if (!remotes.includes('origin') && SYNC_REMOTE_URL) {
        await this.git(['remote', 'add', 'origin', SYNC_REMOTE_URL]);
      }
      this.hasRemote = remotes.includes('origin') || Boolean(SYNC_REMOTE_URL);

      await this.git(['config', 'user.name', GIT_USER_NAME]);
      await this.git(['config', 'user.email', GIT_USER_EMAIL]);
      this.ready = true;
      return ok(undefined);
    } catch (error) {
      return err({ kind: 'setup', message: errorMessage(error) });
    }
  }

  private git(args: readonly string[]): Promise<string> {
    const env: Record<string, string> = {};
    if (SYNC_SSH_KEY_PATH) {
      env.GIT_SSH_COMMAND = `ssh -i ${quoteShellArg(SYNC_SSH_KEY_PATH)} -o IdentitiesOnly=yes`;
    }
    return this.runner.run(args, { cwd: SYNC_REPO_PATH, env });
  }
}
