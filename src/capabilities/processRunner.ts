import { spawnSync } from 'child_process';
import type { ProcessResult, ProcessRunner } from './types.js';

const MAX_BUFFER = 64 * 1024 * 1024;

export const spawnRunner: ProcessRunner = {
  run(command: string, args: string[]): ProcessResult {
    const result = spawnSync(command, args, { encoding: 'utf-8', maxBuffer: MAX_BUFFER });
    return {
      status: result.status,
      stdout: result.stdout ?? '',
      stderr: result.stderr ?? '',
      error: result.error
    };
  }
};
