/**
 * Failures that end a run. Each one carries the lines shown under the
 * headline of the fatal error block.
 */
export abstract class SetupError extends Error {
  readonly exitCode: number = 1;

  constructor(message: string, readonly hints: string[] = []) {
    super(message);
    this.name = new.target.name;
  }

  abstract headline(): string;
}

/**
 * A command launched by the Command Runner exited non-zero
 */
export class TaskFailedError extends SetupError {
  constructor(
    readonly label: string,
    readonly childExitCode: number,
    readonly logPath?: string
  ) {
    super(
      `Task "${label}" exited with code ${childExitCode}`,
      [
        `Task: ${label}`,
        ...(logPath ? [`Please check the log for details: ${logPath}`] : []),
      ]
    );
  }

  headline(): string {
    return 'A background task failed.';
  }
}

/**
 * A network lookup a step depends on returned nothing usable
 */
export class LookupError extends SetupError {
  headline(): string {
    return `Error: ${this.message}`;
  }
}

/**
 * An installer exited zero but did not produce what it should have
 */
export class VerificationError extends SetupError {
  headline(): string {
    return this.message;
  }
}

/**
 * User input was rejected before any work was done
 */
export class ValidationError extends SetupError {
  headline(): string {
    return `Error: ${this.message}`;
  }
}

/**
 * A search for required files came back empty
 */
export class NotFoundError extends SetupError {
  headline(): string {
    return `Error: ${this.message}`;
  }
}
