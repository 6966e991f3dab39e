/**
 * Command Executor - runs external commands for the local provisioning backend
 */

import { spawn, type SpawnOptions } from 'node:child_process';
import { constants } from 'node:os';
import type { Logger } from 'pino';

export interface CommandOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** Milliseconds before the command is killed; 0 disables the limit */
  timeout?: number;
  /** Bytes of output kept per stream; older output is dropped first */
  maxBuffer?: number;
}

export interface CommandResult {
  stdout: string;
  stderr: string;
  exitCode: number;
  timedOut?: boolean;
}

/**
 * Anything that can run a command to completion
 */
export interface CommandRunner {
  execute(command: string, args?: string[], options?: CommandOptions): Promise<CommandResult>;
}

const SIGNAL_NUMBERS = new Map<string, number>(Object.entries(constants.signals));

/**
 * Exit status as a shell reports it: a process killed by a signal exits with 128 + its number.
 */
export function exitStatus(code: number | null, signal: NodeJS.Signals | null): number {
  if (code !== null) return code;
  const number = signal ? SIGNAL_NUMBERS.get(signal) : undefined;
  return number === undefined ? 1 : 128 + number;
}

export class CommandExecutor implements CommandRunner {
  constructor(
    private readonly logger: Logger,
    private readonly defaults: CommandOptions = {},
  ) {}

  /**
   * Execute a command with arguments. Resolves with the exit code whatever it is; rejects only
   * when the process cannot be spawned.
   */
  async execute(command: string, args: string[] = [], options: CommandOptions = {}): Promise<CommandResult> {
    const {
      cwd = process.cwd(),
      env = process.env,
      timeout = 0,
      maxBuffer = 10 * 1024 * 1024, // 10MB
    } = { ...this.defaults, ...options };

    this.logger.debug({ command, args, cwd }, 'Executing command');

    return new Promise((resolve, reject) => {
      let stdout = '';
      let stderr = '';
      let timedOut = false;
      let timeoutHandle: NodeJS.Timeout | undefined;

      const spawnOptions: SpawnOptions = {
        cwd,
        env,
        shell: false,
      };

      const child = spawn(command, args, spawnOptions);

      if (timeout > 0) {
        timeoutHandle = setTimeout(() => {
          timedOut = true;
          child.kill('SIGTERM');
          setTimeout(() => {
            if (child.exitCode === null) {
              child.kill('SIGKILL');
            }
          }, 5000).unref();
        }, timeout);
      }

      const keepTail = (buffer: string, chunk: string): string => {
        const combined = buffer + chunk;
        return combined.length > maxBuffer ? combined.slice(combined.length - maxBuffer) : combined;
      };

      child.stdout?.on('data', (data: Buffer) => {
        stdout = keepTail(stdout, data.toString());
      });

      child.stderr?.on('data', (data: Buffer) => {
        const chunk = data.toString();
        stderr = keepTail(stderr, chunk);
        this.logger.trace({ command, stderr: chunk }, 'Command stderr');
      });

      child.on('close', (code: number | null, signal: NodeJS.Signals | null) => {
        if (timeoutHandle) {
          clearTimeout(timeoutHandle);
        }

        const exitCode = exitStatus(code, signal);

        this.logger.debug({ command, exitCode, timedOut }, 'Command completed');

        resolve({
          stdout: stdout.trim(),
          stderr: stderr.trim(),
          exitCode,
          timedOut,
        });
      });

      child.on('error', (error: Error) => {
        if (timeoutHandle) {
          clearTimeout(timeoutHandle);
        }

        this.logger.error({ command, error: error.message }, 'Command execution failed');

        reject(error);
      });
    });
  }
}
