import { spawn } from 'child_process';

export interface ProcessExecutionResult {
  success: boolean;
  stdout: string;
  stderr: string;
  /** -1 when the process could not be started or was killed on timeout. */
  exitCode: number;
  elapsedMs: number;
  timedOut: boolean;
  pid?: number;
}

export interface RunProcessOptions {
  timeoutMs: number;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** Written to stdin, which is then closed. */
  input?: string;
}

export type ProcessRunner = (
  command: string,
  args: readonly string[],
  options: RunProcessOptions
) => Promise<ProcessExecutionResult>;

/**
 * Runs a command to completion with full output capture. On timeout the process is
 * killed with SIGKILL and the promise resolves only after it has exited.
 * Never rejects.
 */
export const runProcess: ProcessRunner = (command, args, options) =>
  new Promise((resolve) => {
    const startedAt = Date.now();
    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];
    let settled = false;
    let timedOut = false;

    const finish = (result: Omit<ProcessExecutionResult, 'elapsedMs' | 'timedOut'>) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      resolve({ ...result, timedOut, elapsedMs: Date.now() - startedAt });
    };

    const child = spawn(command, [...args], {
      cwd: options.cwd,
      env: options.env,
      stdio: ['pipe', 'pipe', 'pipe'],
      windowsHide: true,
    });

    const timer = setTimeout(() => {
      timedOut = true;
      child.kill('SIGKILL');
    }, options.timeoutMs);

    child.stdout.on('data', (chunk: Buffer) => stdout.push(chunk));
    child.stderr.on('data', (chunk: Buffer) => stderr.push(chunk));
    child.stdin.on('error', () => {
      // The process may exit before reading its input; the exit code reports the outcome.
    });

    child.on('error', (error) => {
      // Spawn failures (ENOENT, EACCES) never produce a 'close' with a running process.
      if (child.pid !== undefined && child.exitCode === null && !timedOut) return;
      finish({
        success: false,
        stdout: Buffer.concat(stdout).toString('utf8'),
        stderr: error.message,
        exitCode: -1,
        pid: child.pid,
      });
    });

    child.on('close', (code) => {
      const output = Buffer.concat(stdout).toString('utf8');
      const errors = Buffer.concat(stderr).toString('utf8');
      if (timedOut) {
        const seconds = Math.round(options.timeoutMs / 100) / 10;
        finish({
          success: false,
          stdout: output,
          stderr: `Process timed out after ${seconds} seconds${errors ? `\n${errors}` : ''}`,
          exitCode: -1,
          pid: child.pid,
        });
        return;
      }
      const exitCode = code ?? -1;
      finish({ success: exitCode === 0, stdout: output, stderr: errors, exitCode, pid: child.pid });
    });

    if (options.input !== undefined) {
      child.stdin.end(options.input, 'utf8');
    } else {
      child.stdin.end();
    }
  });
