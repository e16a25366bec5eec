export class SemantixError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SemantixError';
  }
}

/** A capability is unresolved or its configuration is invalid. */
export class ConfigurationError extends SemantixError {
  constructor(message: string) {
    super(`Configuration error: ${message}`);
    this.name = 'ConfigurationError';
  }
}

/** Config file or environment failed validation. */
export class ConfigError extends ConfigurationError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export class BackendUnavailableError extends ConfigurationError {
  constructor(public readonly capability: string) {
    super(`No backend configured for capability '${capability}'`);
    this.name = 'BackendUnavailableError';
  }
}

export class BackendError extends SemantixError {
  constructor(
    public readonly backendName: string,
    message: string,
    cause?: unknown,
  ) {
    super(`Backend '${backendName}' failed: ${message}`, { cause });
    this.name = 'BackendError';
  }
}

export class ReservedKeywordCollisionError extends SemantixError {
  constructor(public readonly keys: string[]) {
    super(`Reserved keyword collision: ${keys.join(', ')}`);
    this.name = 'ReservedKeywordCollisionError';
  }
}

export class NotFoundError extends SemantixError {
  constructor(
    public readonly kind: string,
    public readonly key: string,
  ) {
    super(`${kind} not found: ${key}`);
    this.name = 'NotFoundError';
  }
}

export class AttributeResolutionError extends SemantixError {
  constructor(
    public readonly attribute: string,
    cause: unknown,
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(
      `Cascading lookup failed, since neither the value nor its payload has attribute '${attribute}'. Original error message: ${reason}`,
      { cause },
    );
    this.name = 'AttributeResolutionError';
  }
}
