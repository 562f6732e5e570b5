import type { SpawnOptions } from 'node:child_process';

import { spawn } from 'node:child_process';

/**
 * Result of a spawn operation
 */
export interface SpawnResult {
  stdout: string;
  stderr: string;
  /**
   * Exit code. A process terminated by a signal reports 1.
   */
  code: number;
  /**
   * Signal that terminated the process, if any (e.g. 'SIGTERM' after a timeout)
   */
  signal: NodeJS.Signals | null;
}

/**
 * Extended spawn options with output capture control
 */
export interface SpawnAsyncOptions extends SpawnOptions {
  /**
   * Whether to capture stdout (default: true)
   */
  captureStdout?: boolean;

  /**
   * Whether to capture stderr (default: true)
   */
  captureStderr?: boolean;
}

/**
 * Execute a command asynchronously and return the result
 *
 * Used for the poppler and ImageMagick command line tools. The native
 * `timeout` option of SpawnOptions is passed through; a process killed by it
 * resolves with a non-zero code and the terminating signal.
 *
 * @example
 * ```typescript
 * const result = await spawnAsync('pdfinfo', ['guideline.pdf']);
 * if (result.code !== 0) throw new Error(result.stderr);
 *
 * const layout = await spawnAsync(
 *   'pdftotext',
 *   ['-bbox-layout', 'guideline.pdf', '-'],
 *   { timeout: 60_000 },
 * );
 * ```
 */
export function spawnAsync(
  command: string,
  args: string[],
  options: SpawnAsyncOptions = {},
): Promise<SpawnResult> {
  const {
    captureStdout = true,
    captureStderr = true,
    ...spawnOptions
  } = options;

  return new Promise((resolve, reject) => {
    const proc = spawn(command, args, spawnOptions);

    let stdout = '';
    let stderr = '';

    if (captureStdout && proc.stdout) {
      proc.stdout.on('data', (data: Buffer) => {
        stdout += data.toString();
      });
    }

    if (captureStderr && proc.stderr) {
      proc.stderr.on('data', (data: Buffer) => {
        stderr += data.toString();
      });
    }

    proc.on('close', (code: number | null, signal: NodeJS.Signals | null) => {
      resolve({ stdout, stderr, code: code ?? 1, signal });
    });

    proc.on('error', reject);
  });
}
