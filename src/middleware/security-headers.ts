import type { NextFunction, Request, Response } from 'express';

interface SecurityHeaderOptions {
  readonly contentSecurityPolicy: string;
  readonly referrerPolicy: string;
}

export function createSecurityHeadersMiddleware(
  options: SecurityHeaderOptions
): (req: Request, res: Response, next: NextFunction) => void {
  return (_req: Request, res: Response, next: NextFunction): void => {
    res.header('Content-Security-Policy', options.contentSecurityPolicy);
    res.header('X-Content-Type-Options', 'nosniff');
    res.header('X-Frame-Options', 'DENY');
    res.header('Referrer-Policy', options.referrerPolicy);
    next();
  };
}
