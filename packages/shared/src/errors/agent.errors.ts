/**
 * Error taxonomy shared by the agent and the desktop daemon. Every class sets
 * `name` so errors that cross a process boundary can be rebuilt by name.
 */
export abstract class ScreenpilotError extends Error {
  abstract readonly fatal: boolean;

  protected constructor(name: string, message: string) {
    super(message);
    this.name = name;
  }
}

export class NoDisplayFoundError extends ScreenpilotError {
  readonly fatal = true;

  constructor(message = "No display attached") {
    super("NoDisplayFound", message);
  }
}

export class CaptureUnavailableError extends ScreenpilotError {
  readonly fatal = true;

  constructor(message: string) {
    super("CaptureUnavailable", message);
  }
}

export class InferenceUnavailableError extends ScreenpilotError {
  readonly fatal = false;

  constructor(
    message: string,
    readonly status?: number,
  ) {
    super("InferenceUnavailable", message);
  }
}

export class InferenceMalformedError extends ScreenpilotError {
  readonly fatal = false;

  /**
   * @param cost USD already spent on the call that produced the response
   */
  constructor(
    message: string,
    readonly raw?: string,
    readonly cost = 0,
  ) {
    super("InferenceMalformed", message);
  }
}

export class OutOfBoundsCoordinateError extends ScreenpilotError {
  readonly fatal = false;

  constructor(message: string) {
    super("OutOfBoundsCoordinate", message);
  }
}

export class LimitExceededError extends ScreenpilotError {
  readonly fatal = true;

  constructor(
    readonly limit: "iterations" | "elapsed" | "cost",
    message: string,
  ) {
    super("LimitExceeded", message);
  }
}

/**
 * Raised inside the control loop when a task is cancelled. Never reported as a
 * failure.
 */
export class AgentInterrupt extends Error {
  constructor() {
    super("AgentInterrupt");
    this.name = "AgentInterrupt";
  }
}

export function isAgentInterrupt(error: unknown): error is AgentInterrupt {
  return error instanceof Error && error.name === "AgentInterrupt";
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
