import { spawn } from 'child_process';
import type { CommandResult, CommandRunner } from '../types/index.js';

export type { CommandResult, CommandRunner } from '../types/index.js';

/** Thrown when a command exits with a non-zero status. */
export class CommandFailedError extends Error {
  constructor(
    public readonly command: string[],
    public readonly result: CommandResult,
  ) {
    super(`Command '${command.join(' ')}' returned non-zero exit status ${result.exitCode}.`);
    this.name = 'CommandFailedError';
  }
}

function spawnCapture(cmd: string, args: string[], env: NodeJS.ProcessEnv): Promise<CommandResult> {
  return new Promise((resolve, reject) => {
    const start = Date.now();
    const child = spawn(cmd, args, {
      stdio: ['ignore', 'pipe', 'pipe'],
      env,
    });

    let stdout = '';
    let stderr = '';

    // Decode across chunk boundaries so split multi-byte characters survive
    child.stdout.setEncoding('utf8');
    child.stderr.setEncoding('utf8');
    child.stdout.on('data', (d: string) => { stdout += d; });
    child.stderr.on('data', (d: string) => { stderr += d; });

    child.on('close', code => {
      resolve({ stdout, stderr, exitCode: code ?? 1, durationMs: Date.now() - start });
    });

    child.on('error', reject);
  });
}

/**
 * Runs commands as child processes and waits for them to exit, capturing
 * both output streams. A non-zero exit rejects with `CommandFailedError`;
 * a missing executable rejects with the spawn error (code `ENOENT`).
 */
export class ProcessRunner implements CommandRunner {
  async run(command: string[], env: NodeJS.ProcessEnv = process.env): Promise<CommandResult> {
    const [cmd, ...args] = command;
    if (!cmd) throw new Error('Cannot run an empty command');

    const result = await spawnCapture(cmd, args, env);
    if (result.exitCode !== 0) {
      throw new CommandFailedError(command, result);
    }
    return result;
  }
}
