export type GatewayErrorKind = 'timeout' | 'rate_limited' | 'invalid_response' | 'upstream';

/**
 * Failure of a single inference call. `invalid_response` covers output that
 * could not be parsed or did not match the requested schema.
 */
export class GatewayError extends Error {
  readonly kind: GatewayErrorKind;
  readonly model: string;

  constructor(kind: GatewayErrorKind, model: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'GatewayError';
    this.kind = kind;
    this.model = model;
  }
}

/** Raised when an evaluation run is asked to start without an application. */
export class PipelineAbortError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PipelineAbortError';
  }
}

/** Broken precondition inside a pure council step. Always a bug. */
export class CouncilInvariantError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CouncilInvariantError';
  }
}

export class StatusTransitionError extends Error {
  readonly from: string;
  readonly to: string;

  constructor(entity: string, from: string, to: string) {
    super(`Illegal ${entity} status transition: ${from} → ${to}`);
    this.name = 'StatusTransitionError';
    this.from = from;
    this.to = to;
  }
}

export class ObservationTransitionError extends StatusTransitionError {
  constructor(from: string, to: string) {
    super('observation', from, to);
    this.name = 'ObservationTransitionError';
  }
}

/** Outcomes can only be recorded for funded (approved or auto-approved) applications. */
export class OutcomeNotApplicableError extends Error {
  constructor(applicationId: string, status: string) {
    super(`Application ${applicationId} is ${status}; outcomes apply only to approved grants`);
    this.name = 'OutcomeNotApplicableError';
  }
}

export class NotFoundError extends Error {
  constructor(kind: string, id: string) {
    super(`${kind} ${id} not found`);
    this.name = 'NotFoundError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
