import type { NextFunction, Request, RequestHandler, Response } from 'express';
import type { ZodType, ZodTypeDef } from 'zod';

/**
 * Route handler that receives an already-validated body
 */
export type BodyHandler<Body> = (body: Body, req: Request, res: Response) => void;

/**
 * Validation middleware factory
 *
 * Parses `req.body` with `schema` and calls `handler` with the parsed output,
 * so transforms (base64 decoding) run exactly once. Validation failures and
 * anything the handler throws go to the error handler.
 */
export function validateBody<Body>(
  schema: ZodType<Body, ZodTypeDef, unknown>,
  handler: BodyHandler<Body>
): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    const result = schema.safeParse(req.body);
    if (!result.success) {
      next(result.error);
      return;
    }

    try {
      handler(result.data, req, res);
    } catch (error) {
      next(error);
    }
  };
}
