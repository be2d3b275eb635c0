export class AppError extends Error {
  constructor(
    public statusCode: number,
    public message: string,
    public context?: Record<string, unknown>
  ) {
    super(message);
    Object.setPrototypeOf(this, AppError.prototype);
  }
}

export class UnauthorizedError extends AppError {
  constructor(message = 'Unauthorized', context?: Record<string, unknown>) {
    super(401, message, context);
    Object.setPrototypeOf(this, UnauthorizedError.prototype);
  }
}

/** A downstream service failed or answered with something unusable. */
export class DownstreamError extends AppError {
  constructor(
    public service: string,
    message: string,
    context?: Record<string, unknown>
  ) {
    super(502, message, { service, ...context });
    Object.setPrototypeOf(this, DownstreamError.prototype);
  }
}

export class IntrospectionError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(502, message, context);
    Object.setPrototypeOf(this, IntrospectionError.prototype);
  }
}
