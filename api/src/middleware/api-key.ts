import { timingSafeEqual } from 'crypto';
import { Request, Response, NextFunction, RequestHandler } from 'express';
import { UnauthorizedError } from '../types';

const matches = (provided: string, expected: string): boolean => {
  const a = Buffer.from(provided);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
};

/**
 * Require `header` to carry `apiKey`. Without a configured key every request
 * passes.
 */
export function requireApiKey(apiKey: string | undefined, header: string): RequestHandler {
  return (req: Request, _res: Response, next: NextFunction) => {
    if (!apiKey) {
      return next();
    }

    const provided = req.get(header);
    if (!provided || !matches(provided, apiKey)) {
      return next(new UnauthorizedError());
    }
    next();
  };
}
