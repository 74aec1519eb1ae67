import type { Request, Response, NextFunction } from 'express';
import morgan from 'morgan';
import { ZodError } from 'zod';

export const requestLogger = morgan('dev');

function describeZodError(err: ZodError): string {
  return err.issues.map((issue) => `${issue.path.join('.') || 'request'}: ${issue.message}`).join('; ');
}

// body-parser marks its own failures (malformed JSON, oversized body) with a 4xx status.
function clientStatus(err: unknown): number | null {
  if (err instanceof ZodError) {
    return 400;
  }
  if (err instanceof Error && 'status' in err && typeof err.status === 'number') {
    return err.status >= 400 && err.status < 500 ? err.status : null;
  }
  return null;
}

export function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction) {
  const status = clientStatus(err);
  if (status !== null) {
    const error = err instanceof ZodError ? describeZodError(err) : err instanceof Error ? err.message : String(err);
    return res.status(status).json({ success: false, error });
  }

  console.error('[ERROR]', err);
  res.status(500).json({ success: false, error: 'Internal server error' });
}
