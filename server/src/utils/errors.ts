export class AppError extends Error {
  readonly status: number;
  readonly code: string;

  constructor(message: string, status: number, code: string) {
    super(message);
    this.name = new.target.name;
    this.status = status;
    this.code = code;
  }
}

/** Raised before anything is rendered when a meeting request breaks one of its invariants. */
export class ValidationError extends AppError {
  readonly field: string;
  readonly reason: string;

  constructor(field: string, reason: string) {
    super(`${field}: ${reason}`, 400, 'validation_failed');
    this.field = field;
    this.reason = reason;
  }
}

/** Credentials were rejected by the mail transport. Refresh them before retrying. */
export class MailAuthError extends AppError {
  readonly transportStatus?: number;

  constructor(message: string, transportStatus?: number) {
    super(message, 502, 'mail_auth_failed');
    this.transportStatus = transportStatus;
  }
}

export class MailDeliveryError extends AppError {
  readonly transportStatus?: number;

  constructor(message: string, transportStatus?: number) {
    super(message, 502, 'mail_delivery_failed');
    this.transportStatus = transportStatus;
  }
}
