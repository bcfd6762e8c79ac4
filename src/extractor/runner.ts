import { spawnSync } from 'child_process';

export interface RunOptions {
  /** Written to the child's stdin, which is then closed. */
  input?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

export interface ProcessResult {
  status: number | null;
  signal: string | null;
  /** Set when the process could not be spawned at all. */
  error?: Error;
}

/**
 * Runs a command to completion. Implementations must not return before the
 * child has exited.
 */
export type ProcessRunner = (
  command: string,
  args: string[],
  options: RunOptions
) => ProcessResult;

export const spawnRunner: ProcessRunner = (command, args, options) => {
  const result = spawnSync(command, args, {
    input: options.input,
    cwd: options.cwd,
    env: options.env,
    encoding: 'utf-8',
    stdio: [options.input === undefined ? 'inherit' : 'pipe', 'inherit', 'inherit'],
  });

  return {
    status: result.status,
    signal: result.signal,
    error: result.error,
  };
};
