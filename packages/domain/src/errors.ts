/** Context attached to every vendor-facing failure. Never carries the password. */
export interface VendorRequestContext {
  integrationId: string;
  endpoint?: string;
  username?: string;
}

/** Base class: `status` is the HTTP status the action surface answers with. */
export class IntegrationActionError extends Error {
  constructor(
    message: string,
    readonly status: number,
    readonly attentionNeeded: boolean,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Integration setup is incomplete. Fatal for the run; an operator must fix it. */
export class ConfigurationMissingError extends IntegrationActionError {
  constructor(message: string) {
    super(message, 422, true);
  }
}

export class IntegrationNotFoundError extends IntegrationActionError {
  constructor(readonly integrationId: string) {
    super(`Integration '${integrationId}' not found.`, 404, true);
  }
}

/** The vendor answered with something we cannot read; usually a protocol change. */
export class MalformedResponseError extends IntegrationActionError {
  constructor(
    message: string,
    readonly context: VendorRequestContext,
    options?: ErrorOptions,
  ) {
    super(message, 422, true, options);
  }
}

/** Network error, timeout or non-2xx answer. Retryable. */
export class TransientTransportError extends IntegrationActionError {
  constructor(
    message: string,
    readonly statusCode?: number,
    options?: ErrorOptions,
  ) {
    super(message, 502, false, options);
  }
}

/** The group-membership store raised while a pipeline moved a file between states. */
export class StateTransitionError extends IntegrationActionError {
  constructor(
    readonly filename: string,
    message: string,
    options?: ErrorOptions,
  ) {
    super(message, 409, false, options);
  }
}
