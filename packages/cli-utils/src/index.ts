export class CliUsageError extends Error {
  public readonly exitCode = 2;
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

export function usageError(message: string, helpText: string): CliUsageError {
  return new CliUsageError(`${message}\n\n${helpText}`);
}

function exitCodeOf(err: unknown): number | null {
  if (err && typeof err === "object" && "exitCode" in err && typeof err.exitCode === "number") {
    return err.exitCode;
  }
  return null;
}

/** Prints a fatal error and returns the process exit code for it. */
export function reportFatal(err: unknown): number {
  const code = exitCodeOf(err);
  if (code !== null) {
    console.error(err instanceof Error ? err.message : String(err));
    return code;
  }
  console.error(String(err instanceof Error ? err.stack : err));
  return 1;
}

export function runMain(main: () => Promise<void>): void {
  main().catch((err: unknown) => {
    process.exit(reportFatal(err));
  });
}
