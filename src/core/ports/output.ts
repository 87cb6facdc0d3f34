/**
 * Output Port Interface
 *
 * Defines the contract for all user-facing output operations.
 * Core logic and commands use this interface instead of console.log or
 * @clack/prompts directly.
 *
 * Implementations:
 *   - createClackOutput (CLI on a TTY): routes to @clack/prompts
 *   - consoleOutput (piped output, CI): routes to plain console.log
 *   - createRecordingOutput (tests): keeps every line in memory
 */

export interface OutputPort {
  /** Display an informational message */
  info(message: string): void;

  /** Display a step/progress indicator */
  step(message: string): void;

  /** Display a plain message */
  message(message: string): void;

  /** Display a success message */
  success(message: string): void;

  /** Display an error message */
  error(message: string): void;

  /** Display a warning message */
  warn(message: string): void;

  /** Prompt for a yes/no confirmation */
  confirm(message: string, options?: { initial?: boolean }): Promise<boolean>;
}
