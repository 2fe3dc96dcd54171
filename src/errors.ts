/** A remote response is missing fields the protocol guarantees. */
export class ProtocolError extends Error {
  readonly code = "PROTOCOL_VIOLATION";

  constructor(
    message: string,
    readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "ProtocolError";
  }
}

/** The Web API answered `ok: false` for a call that cannot continue without it. */
export class SlackApiError extends Error {
  readonly code = "SLACK_API_ERROR";

  constructor(
    readonly method: string,
    readonly error: string,
  ) {
    super(`Slack API ${method} failed: ${error}`);
    this.name = "SlackApiError";
  }
}

export class ConfigError extends Error {
  readonly code = "CONFIG_INVALID";

  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/** An action names a channel or user the identity map has never seen. */
export class UnknownTargetError extends Error {
  readonly code = "UNKNOWN_TARGET";

  constructor(kind: "channel" | "user", value: string) {
    super(`Unknown ${kind}: ${value}`);
    this.name = "UnknownTargetError";
  }
}

export function toError(error: unknown): Error {
  if (error instanceof Error) {
    return error;
  }
  return new Error(String(error));
}
