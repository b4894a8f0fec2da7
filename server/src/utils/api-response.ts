import type {
  ApiSuccessResponse,
  ApiErrorResponse,
  ApiErrorCode,
  PaginationMeta
} from '@shared/types'

export const success = <T>(data: T, message?: string): ApiSuccessResponse<T> => ({
  success: true,
  data,
  ...(message ? { message } : {})
})

export const failure = (
  code: ApiErrorCode | string,
  message: string,
  details?: Record<string, unknown>
): ApiErrorResponse => ({
  success: false,
  error: {
    code,
    message,
    ...(details ? { details } : {})
  }
})

export const pageMeta = (limit: number, offset: number, returned: number, total: number): PaginationMeta => ({
  limit,
  offset,
  total,
  hasMore: offset + returned < total
})
