export enum ErrorCode {
  ValidationError = 'VALIDATION_ERROR',
  Unauthorized = 'UNAUTHORIZED',
  Forbidden = 'FORBIDDEN',
  NotFound = 'NOT_FOUND',
  Conflict = 'CONFLICT',
  RateLimitExceeded = 'RATE_LIMIT_EXCEEDED',
  UpstreamHttpError = 'UPSTREAM_HTTP_ERROR',
  ServiceUnavailable = 'SERVICE_UNAVAILABLE',
  UnknownAnalyzerKind = 'UNKNOWN_ANALYZER_KIND',
  ProgramNotFound = 'PROGRAM_NOT_FOUND',
  AnalyzerExecutionError = 'ANALYZER_EXECUTION_ERROR',
  MalformedAnalyzerOutput = 'MALFORMED_ANALYZER_OUTPUT',
  AnalyzerTimeout = 'ANALYZER_TIMEOUT',
  PersistenceError = 'PERSISTENCE_ERROR',
  InternalError = 'INTERNAL_ERROR',
}

export interface ApiError {
  code: ErrorCode;
  message: string;
  statusCode: number;
  details?: Record<string, unknown>;
}

const statusCodeMap: Record<ErrorCode, number> = {
  [ErrorCode.ValidationError]: 400,
  [ErrorCode.UnknownAnalyzerKind]: 400,
  [ErrorCode.Unauthorized]: 401,
  [ErrorCode.Forbidden]: 403,
  [ErrorCode.NotFound]: 404,
  [ErrorCode.Conflict]: 409,
  [ErrorCode.RateLimitExceeded]: 429,
  [ErrorCode.ProgramNotFound]: 500,
  [ErrorCode.AnalyzerExecutionError]: 500,
  [ErrorCode.MalformedAnalyzerOutput]: 500,
  [ErrorCode.AnalyzerTimeout]: 500,
  [ErrorCode.PersistenceError]: 500,
  [ErrorCode.InternalError]: 500,
  [ErrorCode.UpstreamHttpError]: 502,
  [ErrorCode.ServiceUnavailable]: 503,
};

export function createError(
  code: ErrorCode,
  message: string,
  details?: Record<string, unknown>
): ApiError {
  const result: ApiError = {
    code,
    message,
    statusCode: statusCodeMap[code],
  };

  if (details !== undefined) {
    result.details = details;
  }

  return result;
}

export const toErrorBody = (error: ApiError) => ({
  error: {
    code: error.code,
    message: error.message,
    statusCode: error.statusCode,
    ...(error.details !== undefined && { details: error.details }),
  },
});
