// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

/** A geometry precondition (well-formed rect, positive size, ...) was violated. */
export class GeometryAssertionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "GeometryAssertionError";
  }
}

/** A rect with `min > max` on some axis reached an exhaustive case split. */
export class InvalidRectError extends Error {
  constructor(detail: string) {
    super(`Invalid Rect: ${detail}`);
    this.name = "InvalidRectError";
  }
}

// ---------------------------------------------------------------------------
// Assertion config
// ---------------------------------------------------------------------------

export interface AssertionConfig {
  readonly enabled: boolean;
}

const isProductionEnv = (): boolean =>
  typeof process !== "undefined" && process.env.NODE_ENV === "production";

export const defaultAssertionConfig: AssertionConfig = {
  enabled: !isProductionEnv(),
};

let current: AssertionConfig = defaultAssertionConfig;

export const assertionConfig = (): AssertionConfig => current;

export const configureAssertions = (
  patch: Partial<AssertionConfig>
): AssertionConfig => {
  current = { ...current, ...patch };
  return current;
};

/** Run `fn` with assertions toggled, restoring the previous config afterwards. */
export const withAssertions = <T>(enabled: boolean, fn: () => T): T => {
  const previous = current;
  current = { ...current, enabled };
  try {
    return fn();
  } finally {
    current = previous;
  }
};

/**
 * Checks a precondition when assertions are enabled. `check` is not evaluated
 * at all when they are off.
 */
export const debugAssert = (check: () => boolean, message: string): void => {
  if (!current.enabled) return;
  if (!check()) throw new GeometryAssertionError(message);
};
