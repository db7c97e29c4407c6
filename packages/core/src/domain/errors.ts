export type ResponderErrorKind = "load" | "configuration" | "provider" | "internal";

export abstract class ResponderError extends Error {
  abstract readonly kind: ResponderErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Knowledge source missing, unreadable or structurally wrong. */
export class LoadError extends ResponderError {
  readonly kind = "load";
}

/** Required setting (credential, threshold, ...) missing or invalid. */
export class ConfigurationError extends ResponderError {
  readonly kind = "configuration";
}

/** The text-generation call failed. Recovered by falling back to the template. */
export class ProviderError extends ResponderError {
  readonly kind = "provider";
}

export class InternalError extends ResponderError {
  readonly kind = "internal";
}

export function toResponderError(err: unknown): ResponderError {
  if (err instanceof ResponderError) return err;
  return new InternalError(errorMessage(err), { cause: err });
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
