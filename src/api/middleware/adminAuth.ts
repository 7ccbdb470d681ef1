import * as crypto from 'crypto';
import { Request, Response, NextFunction } from 'express';
import { ErrorCodes } from '../types';

const ADMIN_KEY_HEADER = 'x-admin-key';

/**
 * Admin key from ADMIN_KEY, or the development default
 */
export function getAdminKey(): string {
  return process.env.ADMIN_KEY || 'test-admin-key';
}

function keysMatch(provided: string, expected: string): boolean {
  const a = Buffer.from(provided);
  const b = Buffer.from(expected);
  return a.length === b.length && crypto.timingSafeEqual(a, b);
}

/**
 * Guards endpoints that replace accumulator state (restore, reset)
 */
export function requireAdminKey(req: Request, res: Response, next: NextFunction): void {
  const providedKey = req.header(ADMIN_KEY_HEADER);

  if (!providedKey) {
    res.status(401).json({
      success: false,
      error: 'Missing X-Admin-Key header',
      code: ErrorCodes.MISSING_ADMIN_KEY,
    });
    return;
  }

  if (!keysMatch(providedKey, getAdminKey())) {
    res.status(401).json({
      success: false,
      error: 'Invalid admin key',
      code: ErrorCodes.INVALID_ADMIN_KEY,
    });
    return;
  }

  next();
}
