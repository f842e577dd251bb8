import { Request, Response, NextFunction } from 'express';
import { AnyZodObject, ZodError, z } from 'zod';

export function parseRequest<T extends AnyZodObject>(schema: T, req: Request): z.infer<T> {
  return schema.parse({
    body: req.body,
    query: req.query,
    params: req.params,
  });
}

export function validateRequest(schema: AnyZodObject) {
  return (req: Request, res: Response, next: NextFunction): void => {
    try {
      parseRequest(schema, req);
      next();
    } catch (error) {
      if (error instanceof ZodError) {
        const messages = error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
        res.status(400).json({
          success: false,
          error: 'Validation failed',
          details: messages,
        });
        return;
      }
      next(error);
    }
  };
}
