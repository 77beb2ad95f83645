/**
 * Envelope for JSON output.
 */
export interface CLIResponse<T = unknown> {
  command: string;
  data?: T;
  error?:
    | {
        code: string;
        message: string;
        stack?: string | undefined;
      }
    | undefined;
  metadata?: Record<string, unknown> | undefined;
  success: boolean;
  /** ISO 8601 */
  timestamp: string;
}

export function createSuccessResponse<T>(
  command: string,
  data: T,
  metadata?: Record<string, unknown>,
  now: Date = new Date()
): CLIResponse<T> {
  const response: CLIResponse<T> = {
    command,
    data,
    success: true,
    timestamp: now.toISOString(),
  };

  if (metadata) {
    response.metadata = metadata;
  }

  return response;
}

export function createErrorResponse(
  command: string,
  error: Error,
  code: string,
  now: Date = new Date()
): CLIResponse<never> {
  const errorObj: { code: string; message: string; stack?: string | undefined } = {
    code,
    message: error.message,
  };

  if (process.env['NODE_ENV'] === 'development' && error.stack) {
    errorObj.stack = error.stack;
  }

  return {
    command,
    error: errorObj,
    success: false,
    timestamp: now.toISOString(),
  };
}
