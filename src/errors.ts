export type BotErrorKind = "config" | "auth" | "platform";

/**
 * 루프 시작 전에만 던지는 치명적 오류. 루프 안의 오류는 전부 흡수한다.
 */
export class BotError extends Error {
  readonly kind: BotErrorKind;

  constructor(kind: BotErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "BotError";
    this.kind = kind;
  }
}

export class ConfigError extends BotError {
  constructor(message: string) {
    super("config", message);
    this.name = "ConfigError";
  }
}

export class AuthError extends BotError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("auth", message, options);
    this.name = "AuthError";
  }
}

export class PlatformError extends BotError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("platform", message, options);
    this.name = "PlatformError";
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
