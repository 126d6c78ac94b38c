import type { Request } from 'express';
import type { AnyZodObject, z } from 'zod';

/**
 * Parse the request's params, body and query against a zod schema
 *
 * Throws ZodError, which the error middleware turns into a 400. Returns the
 * parsed (coerced and defaulted) values, so controllers never read raw input.
 *
 * Usage:
 * ```typescript
 * const { params, body } = parseRequest(createRaffleSchema, req);
 * ```
 */
export function parseRequest<T extends AnyZodObject>(schema: T, req: Request): z.infer<T> {
  return schema.parse({
    body: req.body,
    params: req.params,
    query: req.query,
  });
}
