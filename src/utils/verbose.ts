// Diagnostic tracing. Off unless VERBOSE is set in the environment or
// enableVerboseLogging() is called.

let verbose = Boolean(process.env.VERBOSE);

export function enableVerboseLogging(): boolean {
  verbose = true;
  return true;
}

export function disableVerboseLogging(): boolean {
  verbose = false;
  return true;
}

export function verboseLoggingStatus(): string {
  return verbose ? 'enabled' : 'disabled';
}

export function trace(scope: string, message: string, ...details: unknown[]): void {
  if (!verbose) return;
  console.log(`[${scope}] ${message}`, ...details);
}
