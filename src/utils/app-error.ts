export class AppError extends Error {
  public statusCode: number;
  public isOperational: boolean;
  public code?: string;
  public details?: unknown;

  constructor(message: string, statusCode: number, code?: string, details?: unknown) {
    super(message);
    this.name = this.constructor.name;
    this.statusCode = statusCode;
    this.isOperational = true;
    this.code = code;
    this.details = details;

    Error.captureStackTrace(this, this.constructor);
  }

  static badRequest(message: string, code?: string, details?: unknown): AppError {
    return new AppError(message, 400, code || 'BAD_REQUEST', details);
  }

  static payloadTooLarge(message: string, code?: string): AppError {
    return new AppError(message, 413, code || 'PAYLOAD_TOO_LARGE');
  }

  static internal(message: string = 'Internal server error', code?: string): AppError {
    return new AppError(message, 500, code || 'INTERNAL_ERROR');
  }
}
