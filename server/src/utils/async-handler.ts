import type { NextFunction, Request, RequestHandler, Response } from 'express'

/**
 * Wrap a route handler so thrown errors and rejected promises reach the
 * Express error middleware.
 */
export function asyncHandler(
  handler: (req: Request, res: Response, next: NextFunction) => unknown
): RequestHandler {
  return (req, res, next) => {
    Promise.resolve()
      .then(() => handler(req, res, next))
      .catch(next)
  }
}
