/**
 * Lending Hub - Authentication Middleware
 * API key validation: operators use the admin key, spoke relayers the hub key
 */

import { Request, Response, NextFunction, RequestHandler } from 'express';
import { AppConfig } from '../../config';

export interface AuthFailure {
  status: 401 | 403 | 500;
  error: string;
}

export function verifyApiKey(header: string | string[] | undefined, expectedKey: string | undefined): AuthFailure | null {
  if (!expectedKey) {
    return { status: 500, error: 'Server misconfiguration' };
  }

  const apiKey = typeof header === 'string' ? header : undefined;
  if (!apiKey) {
    return { status: 401, error: 'Missing API key' };
  }

  if (apiKey !== expectedKey) {
    return { status: 403, error: 'Invalid API key' };
  }

  return null;
}

function apiKeyMiddleware(keyName: string, expectedKey: string | undefined): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    const failure = verifyApiKey(req.headers['x-api-key'], expectedKey);
    if (failure) {
      if (failure.status === 500) console.error(`[Auth] ${keyName} not configured`);
      res.status(failure.status).json({ error: failure.error });
      return;
    }
    next();
  };
}

export function adminAuthMiddleware(config: Pick<AppConfig, 'ADMIN_API_KEY'>): RequestHandler {
  return apiKeyMiddleware('ADMIN_API_KEY', config.ADMIN_API_KEY);
}

export function hubAuthMiddleware(config: Pick<AppConfig, 'HUB_API_KEY'>): RequestHandler {
  return apiKeyMiddleware('HUB_API_KEY', config.HUB_API_KEY);
}
