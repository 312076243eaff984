import { Request, Response, NextFunction } from 'express';
import { AnyZodObject, ZodError, z } from 'zod';
import { createErrorResponse } from '../utils/response-factory';
import { ErrorCode } from '../types/error.types';

// res.locals slot holding the last schema validate() ran and its output
const VALIDATED_REQUEST = 'validatedRequest';

function requestParts(req: Request) {
  return {
    body: req.body,
    params: req.params,
    query: req.query,
  };
}

/**
 * Validation middleware factory
 *
 * Rejects the request with 400 when body, params or query fail the schema:
 * ```typescript
 * router.post('/wash-bays', validate(createWashBaySchema), controller.createWashBay);
 * ```
 */
export const validate = (schema: AnyZodObject) => {
  return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const data = await schema.parseAsync(requestParts(req));
      res.locals[VALIDATED_REQUEST] = { schema, data };
      next();
      return;
    } catch (error) {
      if (error instanceof ZodError) {
        const errorDetails = error.errors.map((err) => ({
          field: err.path.join('.'),
          message: err.message,
        }));

        res.status(400).json(
          createErrorResponse(ErrorCode.VALIDATION_ERROR, 'Validation failed', {
            errors: errorDetails,
          })
        );
        return;
      }
      next(error);
      return;
    }
  };
};

/**
 * Typed, coerced view of the request for controllers. Reuses what validate()
 * produced for the same schema and parses only when the route skipped it.
 */
export function parseRequest<T extends AnyZodObject>(
  schema: T,
  req: Request,
  res: Response
): z.infer<T> {
  const validated = res.locals[VALIDATED_REQUEST];
  if (validated && validated.schema === schema) {
    return validated.data;
  }
  return schema.parse(requestParts(req));
}
