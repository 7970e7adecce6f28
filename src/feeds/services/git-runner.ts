import { Injectable } from '@nestjs/common';
import { execFile } from 'node:child_process';
import { promisify } from 'node:util';

const execFileAsync = promisify(execFile);

export const GIT_RUNNER = Symbol('GIT_RUNNER');

export interface GitRunOptions {
  cwd: string;
  env?: Record<string, string>;
}

export interface GitRunner {
  run(args: readonly string[], options: GitRunOptions): Promise<string>;
}

@Injectable()
export class ExecFileGitRunner implements GitRunner {
  async run(args: readonly string[], options: GitRunOptions): Promise<string> {
    const { stdout } = await execFileAsync('git', [...args], {
      cwd: options.cwd,
      env: { ...process.env, ...options.env },
      maxBuffer: 4 * 1024 * 1024,
    });
    return stdout;
  }
}
