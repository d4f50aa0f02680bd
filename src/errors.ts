// Doctor Voice Onboarding - Error taxonomy
//
// Every error the engine surfaces carries a stable `code` and the HTTP status
// the API layer should render it with. ExtractionError is the one category the
// engine absorbs itself (the turn is recorded with a fallback reply).

export abstract class VoiceOnboardingError extends Error {
  abstract readonly code: string;
  abstract readonly httpStatus: number;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }

  /** Extra fields for the API error body. */
  details(): Record<string, unknown> | undefined {
    return undefined;
  }
}

export class SessionNotFoundError extends VoiceOnboardingError {
  readonly code = "SESSION_NOT_FOUND";
  readonly httpStatus = 404;

  constructor(readonly sessionId: string) {
    super(`Session not found: ${sessionId}`);
  }
}

export class SessionExpiredError extends VoiceOnboardingError {
  readonly code = "SESSION_EXPIRED";
  readonly httpStatus = 410;

  constructor(readonly sessionId: string) {
    super(`Session expired: ${sessionId}`);
  }
}

export interface MissingField {
  fieldName: string;
  displayName: string;
}

export class SessionNotCompleteError extends VoiceOnboardingError {
  readonly code = "SESSION_INCOMPLETE";
  readonly httpStatus = 400;

  constructor(
    readonly sessionId: string,
    readonly missingFields: MissingField[],
  ) {
    super(
      `Session ${sessionId} is missing ${missingFields.length} required field(s): ` +
      missingFields.map((f) => f.fieldName).join(", "),
    );
  }

  override details(): Record<string, unknown> {
    return { missingFields: this.missingFields };
  }
}

export class ExtractionError extends VoiceOnboardingError {
  readonly code = "EXTRACTION_ERROR";
  readonly httpStatus = 502;
}

export class PersistenceError extends VoiceOnboardingError {
  readonly code = "PERSISTENCE_ERROR";
  readonly httpStatus = 502;
}

export class InvalidTranscriptError extends VoiceOnboardingError {
  readonly code = "INVALID_TRANSCRIPT";
  readonly httpStatus = 400;
}

/** Malformed API request body or parameters. */
export class InvalidRequestError extends VoiceOnboardingError {
  readonly code = "INVALID_REQUEST";
  readonly httpStatus = 400;
}

export class SessionLockError extends VoiceOnboardingError {
  readonly code = "SESSION_BUSY";
  readonly httpStatus = 409;

  constructor(readonly sessionId: string) {
    super(`Session ${sessionId} is being updated by another request`);
  }
}

export class FieldNotFoundError extends VoiceOnboardingError {
  readonly code = "FIELD_NOT_FOUND";
  readonly httpStatus = 500;

  constructor(readonly fieldName: string) {
    super(`Field not found in schema: ${fieldName}`);
  }
}

export class FieldSchemaError extends VoiceOnboardingError {
  readonly code = "FIELD_SCHEMA_ERROR";
  readonly httpStatus = 500;
}

export class ConfigError extends VoiceOnboardingError {
  readonly code = "CONFIGURATION_ERROR";
  readonly httpStatus = 500;
}
