import { timingSafeEqual } from 'node:crypto';
import type { Request, Response, NextFunction, RequestHandler } from 'express';

export type AuthRejection = 'missing_header' | 'wrong_scheme' | 'invalid_token';

const REJECTION_MESSAGES: Record<AuthRejection, string> = {
  missing_header: 'Authorization header is required',
  wrong_scheme: 'Invalid authorization scheme; use Bearer',
  invalid_token: 'Invalid token',
};

export interface AuthOptions {
  realm?: string;
  onRejected?: (reason: AuthRejection, req: Request) => void;
}

function tokenMatches(presented: string, expected: Buffer): boolean {
  const candidate = Buffer.from(presented, 'utf-8');
  // timingSafeEqual requires same-length buffers
  return candidate.length === expected.length && timingSafeEqual(candidate, expected);
}

/** Bearer-token check for the status API. Every route sits behind it. */
export function createAuthMiddleware(apiToken: string, options: AuthOptions = {}): RequestHandler {
  const expected = Buffer.from(apiToken, 'utf-8');
  const challenge = `Bearer realm="${options.realm ?? 'stepwise'}"`;

  const reject = (reason: AuthRejection, req: Request, res: Response): void => {
    options.onRejected?.(reason, req);
    res.setHeader('WWW-Authenticate', challenge);
    res.status(401).json({ error: REJECTION_MESSAGES[reason], reason });
  };

  return (req: Request, res: Response, next: NextFunction): void => {
    const header = req.headers.authorization;
    if (!header) {
      reject('missing_header', req, res);
      return;
    }

    const match = /^Bearer\s+(.+)$/.exec(header);
    if (!match) {
      reject('wrong_scheme', req, res);
      return;
    }

    if (!tokenMatches(match[1].trim(), expected)) {
      reject('invalid_token', req, res);
      return;
    }

    next();
  };
}
