/** Raised when a webhook delivery does not carry the configured secret token. */
export class WebhookSecretError extends Error {
  readonly statusCode = 403;

  constructor(message = 'Invalid webhook secret token') {
    super(message);
    this.name = 'WebhookSecretError';
  }
}

/** Raised when a request body fails schema validation. */
export class PayloadValidationError extends Error {
  readonly statusCode = 400;

  constructor(
    message: string,
    public readonly issues: string[] = [],
  ) {
    super(message);
    this.name = 'PayloadValidationError';
  }
}

/** Missing or malformed settings; fatal at startup, before anything is served. */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/** The agent backend did not answer its availability probe at startup. */
export class AgentUnavailableError extends Error {
  constructor(public readonly baseUrl: string) {
    super(`Agent backend is not reachable at ${baseUrl}. Start it before the gateway.`);
    this.name = 'AgentUnavailableError';
  }
}
