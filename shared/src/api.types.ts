/**
 * Response envelopes and the error codes returned by the contact API.
 */

export enum ApiErrorCode {
  // Admin authentication
  UNAUTHORIZED = "UNAUTHORIZED",
  INVALID_TOKEN = "INVALID_TOKEN",
  FORBIDDEN = "FORBIDDEN",

  // Request shape
  INVALID_REQUEST = "INVALID_REQUEST",
  VALIDATION_FAILED = "VALIDATION_FAILED",
  NOT_FOUND = "NOT_FOUND",

  // Submission gates
  CHALLENGE_FAILED = "CHALLENGE_FAILED",
  RATE_LIMIT_EXCEEDED = "RATE_LIMIT_EXCEEDED",

  // Server side
  INTERNAL_ERROR = "INTERNAL_ERROR",
  SERVICE_UNAVAILABLE = "SERVICE_UNAVAILABLE",
  DATABASE_ERROR = "DATABASE_ERROR",
}

export interface ApiErrorDefinition {
  code: ApiErrorCode
  httpStatus: number
  defaultMessage: string
}

const definition = (code: ApiErrorCode, httpStatus: number, defaultMessage: string): ApiErrorDefinition => ({
  code,
  httpStatus,
  defaultMessage,
})

export const API_ERROR_DEFINITIONS: Record<ApiErrorCode, ApiErrorDefinition> = {
  [ApiErrorCode.UNAUTHORIZED]: definition(ApiErrorCode.UNAUTHORIZED, 401, "Admin token required"),
  [ApiErrorCode.INVALID_TOKEN]: definition(ApiErrorCode.INVALID_TOKEN, 401, "Invalid admin token"),
  [ApiErrorCode.FORBIDDEN]: definition(ApiErrorCode.FORBIDDEN, 403, "Submission refused"),
  [ApiErrorCode.INVALID_REQUEST]: definition(ApiErrorCode.INVALID_REQUEST, 400, "Request payload is invalid"),
  [ApiErrorCode.VALIDATION_FAILED]: definition(ApiErrorCode.VALIDATION_FAILED, 422, "Request failed validation"),
  [ApiErrorCode.NOT_FOUND]: definition(ApiErrorCode.NOT_FOUND, 404, "Resource not found"),
  [ApiErrorCode.CHALLENGE_FAILED]: definition(
    ApiErrorCode.CHALLENGE_FAILED,
    400,
    "Human verification failed or expired"
  ),
  [ApiErrorCode.RATE_LIMIT_EXCEEDED]: definition(ApiErrorCode.RATE_LIMIT_EXCEEDED, 429, "Rate limit exceeded"),
  [ApiErrorCode.INTERNAL_ERROR]: definition(ApiErrorCode.INTERNAL_ERROR, 500, "Unexpected internal error"),
  [ApiErrorCode.SERVICE_UNAVAILABLE]: definition(
    ApiErrorCode.SERVICE_UNAVAILABLE,
    503,
    "Service temporarily unavailable"
  ),
  [ApiErrorCode.DATABASE_ERROR]: definition(ApiErrorCode.DATABASE_ERROR, 500, "Database error"),
}

const isApiErrorCode = (code: string): code is ApiErrorCode =>
  Object.prototype.hasOwnProperty.call(API_ERROR_DEFINITIONS, code)

/** Unknown or missing codes resolve to INTERNAL_ERROR. */
export const getApiErrorDefinition = (code?: ApiErrorCode | string | null): ApiErrorDefinition =>
  code && isApiErrorCode(code) ? API_ERROR_DEFINITIONS[code] : API_ERROR_DEFINITIONS[ApiErrorCode.INTERNAL_ERROR]

export interface ApiSuccessResponse<T> {
  success: true
  data: T
  message?: string
}

export interface ApiErrorResponse {
  success: false
  error: {
    code: ApiErrorCode | string
    message: string
    details?: Record<string, unknown>
    stack?: string // development only
  }
}

export interface PaginationMeta {
  limit: number
  offset: number
  total: number
  hasMore: boolean
}
