export interface ApiErrorPayload {
  code: string;
  message: string;
  details?: unknown;
}

export default class ApiError extends Error {
  public statusCode: number;

  public details?: unknown;

  public code?: string;

  constructor(statusCode: number, message: string, details?: unknown, code?: string) {
    super(message);
    this.name = 'ApiError';
    this.statusCode = statusCode;
    this.details = details;
    this.code = code;
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  toPayload(fallbackCode: string): ApiErrorPayload {
    const payload: ApiErrorPayload = {
      code: this.code ?? fallbackCode,
      message: this.message,
    };
    if (this.details !== undefined) {
      payload.details = this.details;
    }
    return payload;
  }
}
