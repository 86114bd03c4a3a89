/**
 * Repository query port and its dnf implementation.
 */

import { execFile } from 'child_process';
import { DEFAULT_QUERY_COMMAND } from '../../constants/index.js';
import { logger } from '../../utils/logger.js';

/**
 * Outcome of one capability query.
 * `completed` covers every run that finished, whatever its exit status.
 */
export type RepoQueryOutcome =
  | { kind: 'completed'; exitCode: number; stdout: string }
  | { kind: 'timeout'; timeoutMs: number }
  | { kind: 'failed'; reason: string };

export interface RepoQueryRunner {
  query(capability: string, timeoutMs: number): Promise<RepoQueryOutcome>;
}

/**
 * Runs `dnf repoquery --quiet --whatprovides <capability>` (or a configured
 * equivalent) with a hard per-call timeout.
 */
export class DnfRepoQueryRunner implements RepoQueryRunner {
  private readonly command: string;
  private readonly baseArgs: string[];

  constructor(command: readonly string[] = DEFAULT_QUERY_COMMAND) {
    if (command.length === 0) {
      throw new Error('Repository query command must not be empty');
    }
    this.command = command[0];
    this.baseArgs = command.slice(1);
  }

  query(capability: string, timeoutMs: number): Promise<RepoQueryOutcome> {
    const args = [...this.baseArgs, capability];
    logger.debug(`Running ${this.command} ${args.join(' ')}`);

    return new Promise(resolve => {
      execFile(
        this.command,
        args,
        { timeout: timeoutMs, encoding: 'utf8', maxBuffer: 4 * 1024 * 1024 },
        (error, stdout) => {
          if (!error) {
            resolve({ kind: 'completed', exitCode: 0, stdout });
            return;
          }

          if (error.killed) {
            resolve({ kind: 'timeout', timeoutMs });
            return;
          }

          if (typeof error.code === 'number') {
            resolve({ kind: 'completed', exitCode: error.code, stdout });
            return;
          }

          resolve({ kind: 'failed', reason: error.message });
        }
      );
    });
  }
}
