export class LighterError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "LighterError";
  }
}

/**
 * Missing or invalid configuration (no file found, unknown keys, no API key).
 */
export class ConfigError extends LighterError {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/**
 * The command line could not be understood.
 */
export class UsageError extends LighterError {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

/**
 * The gateway answered with an HTTP status of 400 or more.
 */
export class GatewayError extends LighterError {
  constructor(
    public readonly method: string,
    public readonly url: string,
    public readonly status: number,
    public readonly body: unknown
  ) {
    super(`gateway answered ${method} ${url} with status ${status}`);
    this.name = "GatewayError";
  }
}

export class StateError extends LighterError {
  constructor(message: string) {
    super(message);
    this.name = "StateError";
  }
}

export class SceneError extends LighterError {
  constructor(message: string) {
    super(message);
    this.name = "SceneError";
  }
}

export class RecipeError extends LighterError {
  constructor(
    public readonly recipe: string,
    public readonly reason: string
  ) {
    super(`${recipe}: ${reason}`);
    this.name = "RecipeError";
  }
}

export function formatError(err: unknown): string {
  if (err instanceof Error) {
    return err.message;
  }
  return String(err);
}
