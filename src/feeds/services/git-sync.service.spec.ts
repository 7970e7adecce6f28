import { Logger } from '@nestjs/common';
import { promises as fs } from 'node:fs';
import { SYNC_REPO_PATH } from '../config/feeds.constants';
import { GitRunOptions, GitRunner } from './git-runner';
import { GitSyncService } from './git-sync.service';

jest.mock('../config/feeds.constants', () => ({
  ...jest.requireActual<typeof import('../config/feeds.constants')>(
    '../config/feeds.constants',
  ),
  SYNC_REMOTE_URL: 'git@example.com:feeds/mirror.git',
  SYNC_SSH_KEY_PATH: '/keys/deploy keys/test-key',
}));

class FakeGitRunner implements GitRunner {
  readonly calls: string[][] = [];
  readonly options: GitRunOptions[] = [];
  private readonly responses = new Map<string, string | Error>();

  respond(command: string, response: string | Error): void {
    this.responses.set(command, response);
  }

  async run(args: readonly string[], options: GitRunOptions): Promise<string> {
    this.calls.push([...args]);
    this.options.push(options);
    const response = this.responses.get(args.join(' '));
    if (response instanceof Error) {
      throw response;
    }
    return response ?? '';
  }
}

describe('GitSyncService', () => {
  let runner: FakeGitRunner;
  let service: GitSyncService;

  beforeEach(() => {
    runner = new FakeGitRunner();
    service = new GitSyncService(runner);
    jest.spyOn(fs, 'mkdir').mockResolvedValue(undefined);
    jest.spyOn(Logger.prototype, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('initialises the repository, commits changes and pushes', async () => {
    runner.respond('rev-parse --show-toplevel', new Error('not a git repository'));
    runner.respond('status --porcelain', ' M categorized_feeds/italia_feeds.opml\n');

    const result = await service.sync();

    expect(result).toEqual({ ok: true, value: { committed: true, pushed: true } });
    const commands = runner.calls.map((args) => args.join(' '));
    expect(commands.slice(0, 8)).toEqual([
      'rev-parse --show-toplevel',
      'init',
      'remote',
      'remote add origin git@example.com:feeds/mirror.git',
      'config user.name feed-categorizer',
      'config user.email feed-categorizer@localhost',
      'add --all',
      'status --porcelain',
    ]);
    expect(runner.calls[8][0]).toBe('commit');
    expect(runner.calls[8][2]).toMatch(
      /^Automatic update \d{4}-\d{2}-\d{2} \d{2}:\d{2}$/,
    );
    expect(commands[9]).toBe('push -u origin HEAD');
    expect(runner.options[0]).toEqual({
      cwd: SYNC_REPO_PATH,
      env: {
        GIT_SSH_COMMAND: "ssh -i '/keys/deploy keys/test-key' -o IdentitiesOnly=yes",
      },
    });
  });

  it('reuses an existing repository and skips the commit when nothing changed', async () => {
    runner.respond('rev-parse --show-toplevel', `${SYNC_REPO_PATH}\n`);
    runner.respond('remote', 'origin\n');

    await service.sync();
    const result = await service.sync();

    expect(result).toEqual({ ok: true, value: { committed: false, pushed: true } });
    const commands = runner.calls.map((args) => args.join(' '));
    expect(commands.filter((command) => command === 'init')).toHaveLength(0);
    expect(commands.filter((command) => command.startsWith('remote'))).toEqual([
      'remote',
    ]);
    expect(commands.filter((command) => command.startsWith('commit'))).toHaveLength(0);
    expect(commands.filter((command) => command.startsWith('push'))).toHaveLength(2);
  });

  it('reports push failures without throwing', async () => {
    const errorSpy = jest
      .spyOn(Logger.prototype, 'error')
      .mockImplementation(() => undefined);
    runner.respond('rev-parse --show-toplevel', `${SYNC_REPO_PATH}\n`);
    runner.respond('status --porcelain', '?? usa_feeds.opml\n');
    runner.respond('push -u origin HEAD', new Error('Permission denied (publickey)'));

    const result = await service.sync();

    expect(result).toEqual({
      ok: false,
      error: { kind: 'command', message: 'Permission denied (publickey)' },
    });
    expect(errorSpy).toHaveBeenCalledTimes(1);
  });

  it('reports setup failures and retries setup on the next sync', async () => {
    jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);
    runner.respond('rev-parse --show-toplevel', new Error('not a git repository'));
    runner.respond('init', new Error('git: command not found'));

    const first = await service.sync();
    const second = await service.sync();

    expect(first).toEqual({
      ok: false,
      error: { kind: 'setup', message: 'git: command not found' },
    });
    expect(second.ok).toBe(false);
    expect(runner.calls.filter((args) => args[0] === 'init')).toHaveLength(2);
  });
});
