interface CommandErrorMessages {
  command: string;
  installHint: string;
  /** Prefix for failures of an installed command; stderr follows it. */
  failurePrefix: string;
}

export function createCommandError(
  error: unknown,
  { command, installHint, failurePrefix }: CommandErrorMessages,
): Error {
  const typed = error as NodeJS.ErrnoException & { stderr?: string };

  if (typed.code === "ENOENT") {
    return new Error(`${command} command not found. ${installHint}`);
  }

  const stderr = typed.stderr?.trim();
  const detail = stderr && stderr.length > 0 ? stderr : typed.message;

  return new Error(`${failurePrefix}: ${detail}`);
}
