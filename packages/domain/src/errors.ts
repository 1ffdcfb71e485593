/**
 * Error taxonomy. Each error carries the HTTP status the API layer responds
 * with; the message is what the client sees.
 */
export abstract class ValuationError extends Error {
  abstract readonly status: number;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Missing or malformed request field. */
export class ValidationError extends ValuationError {
  readonly status = 400;
}

/** Manufacturing date or model could not be parsed into a VehicleRecord. */
export class NormalizationError extends ValuationError {
  readonly status = 400;

  constructor(
    readonly field: string,
    message: string,
  ) {
    super(message);
  }
}

/** A collaborator needed for the request has no credential configured. */
export class CredentialError extends ValuationError {
  readonly status = 401;
}

/**
 * Registration lookup or price discovery failed. The message is safe to return;
 * upstream detail goes in `cause` and the logs only.
 */
export class CollaboratorError extends ValuationError {
  readonly status = 502;

  constructor(
    readonly collaborator: 'rc-lookup' | 'price-discovery',
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}
