import { spawn } from 'node:child_process';

export type CommandResult = {
  readonly stdout: Buffer;
  readonly stderr: Buffer;
};

export class CommandError extends Error {
  readonly command: string;
  readonly args: readonly string[];
  readonly exitCode: number;
  readonly stderr: string;

  constructor(command: string, args: readonly string[], exitCode: number, stderr: Buffer) {
    super(`${command} exited with code ${exitCode}: ${stderr.toString('utf8').trim() || 'no output'}`);
    this.name = 'CommandError';
    this.command = command;
    this.args = [...args];
    this.exitCode = exitCode;
    this.stderr = stderr.toString('utf8');
  }
}

/** Runs `command` to completion, piping `input` to its stdin when given. */
export const runCommand = async (
  command: string,
  args: readonly string[],
  input?: Uint8Array,
): Promise<CommandResult> => {
  const child = spawn(command, args, {
    stdio: [input ? 'pipe' : 'ignore', 'pipe', 'pipe'],
  });

  const stdout: Buffer[] = [];
  const stderr: Buffer[] = [];
  child.stdout?.on('data', (chunk: Buffer) => stdout.push(chunk));
  child.stderr?.on('data', (chunk: Buffer) => stderr.push(chunk));

  const exited = new Promise<number>((resolve, reject) => {
    child.once('error', reject);
    child.once('close', (code) => resolve(code ?? -1));
    if (input && child.stdin) {
      // EPIPE when the process exits before reading everything; its exit code reports the failure
      child.stdin.once('error', (error: NodeJS.ErrnoException) => {
        if (error.code !== 'EPIPE') reject(error);
      });
      child.stdin.end(input);
    }
  });
  const exitCode = await exited;

  const result = { stdout: Buffer.concat(stdout), stderr: Buffer.concat(stderr) };
  if (exitCode !== 0) {
    throw new CommandError(command, args, exitCode, result.stderr);
  }
  return result;
};
