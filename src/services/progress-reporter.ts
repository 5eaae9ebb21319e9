/**
 * Progress Reporter
 * User-facing status lines for a run, kept apart from the orchestration so the
 * agents can be driven silently (tests, MCP server mode).
 */

export interface ProgressReporter {
  /** Start of a numbered or named stage */
  step(message: string): void;
  /** Outcome or detail within the current stage */
  info(message: string): void;
  /** Degraded outcome; the run continues */
  warn(message: string): void;
}

/**
 * Writes status lines to stdout
 */
export class ConsoleProgressReporter implements ProgressReporter {
  step(message: string): void {
    console.log(`\n${message}`);
  }

  info(message: string): void {
    console.log(`  ${message}`);
  }

  warn(message: string): void {
    console.log(`  ⚠️  ${message}`);
  }
}

export const silentProgress: ProgressReporter = {
  step: () => undefined,
  info: () => undefined,
  warn: () => undefined,
};

/**
 * Records every line in memory, tagged with its kind
 */
export class RecordingProgressReporter implements ProgressReporter {
  readonly lines: string[] = [];

  step(message: string): void {
    this.lines.push(`step: ${message}`);
  }

  info(message: string): void {
    this.lines.push(`info: ${message}`);
  }

  warn(message: string): void {
    this.lines.push(`warn: ${message}`);
  }
}
