export type RiskErrorCode =
  | "DATA_UNAVAILABLE"
  | "MODEL_NOT_READY"
  | "MALFORMED_RECORD"
  | "INVALID_CUSTOMER_DATA";

export class RiskError extends Error {
  public readonly code: RiskErrorCode;
  public readonly details?: Record<string, unknown>;

  constructor(code: RiskErrorCode, message: string, details?: Record<string, unknown>, options?: ErrorOptions) {
    super(message, options);
    this.code = code;
    this.details = details;
    this.name = "RiskError";
  }
}

/** The customer dataset could not be loaded at startup. */
export class DataUnavailableError extends RiskError {
  constructor(message: string, options?: ErrorOptions) {
    super("DATA_UNAVAILABLE", message, undefined, options);
    this.name = "DataUnavailableError";
  }
}

export class ModelNotReadyError extends RiskError {
  constructor(reason = "No trained model is available") {
    super("MODEL_NOT_READY", reason);
    this.name = "ModelNotReadyError";
  }
}

/** A record carries a missing or non-numeric value in a required field. */
export class MalformedRecordError extends RiskError {
  public readonly fields: string[];

  constructor(fields: string[], context?: string) {
    const where = context ? `${context}: ` : "";
    super("MALFORMED_RECORD", `${where}missing or non-numeric field(s) ${fields.join(", ")}`, { fields });
    this.fields = fields;
    this.name = "MalformedRecordError";
  }
}

export class InvalidCustomerDataError extends RiskError {
  public readonly fields: string[];

  constructor(fields: string[], message?: string) {
    super("INVALID_CUSTOMER_DATA", message ?? `Invalid customer data: ${fields.join(", ")}`, { fields });
    this.fields = fields;
    this.name = "InvalidCustomerDataError";
  }
}

