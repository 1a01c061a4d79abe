// ─── Process Runner Types ───

export interface CommandResult {
  stdout: string;
  stderr: string;
  exitCode: number;
  durationMs: number;
}

export interface CommandRunner {
  run(command: string[], env?: NodeJS.ProcessEnv): Promise<CommandResult>;
}
