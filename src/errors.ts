/** Missing or malformed schedule/configuration. Fatal at startup. */
export class ConfigError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

/** A class cannot be watched (no authenticated page session). The class is skipped for the run. */
export class SessionUnavailableError extends Error {
  constructor(readonly className: string, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'SessionUnavailableError';
  }
}

/** The fallback channel could not send or poll. */
export class ChannelError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ChannelError';
  }
}
