// src/middleware/authMiddleware.ts
import { Request, Response, NextFunction, RequestHandler } from 'express';
import * as crypto from 'crypto';
import * as jwt from 'jsonwebtoken';
import { config } from '../config';

// Extend Express Request type to include the token subject
declare global {
  namespace Express {
    interface Request {
      subject?: string;
    }
  }
}

export const ACCESS_TOKEN_TTL = '600m';
export const REFRESH_TOKEN_TTL = '7d';

type TokenType = 'access' | 'refresh';

interface VerifiedToken {
  subject: string;
  type: TokenType;
}

/**
 * Verify a token and read its subject and type. Returns null for anything
 * that is not a well-formed token signed with `secret`.
 */
export function verifyToken(token: string, secret: string): VerifiedToken | null {
  try {
    const decoded = jwt.verify(token, secret);
    if (typeof decoded === 'string' || typeof decoded.sub !== 'string') return null;
    const type = decoded.type === 'refresh' ? 'refresh' : 'access';
    return { subject: decoded.sub, type };
  } catch (error) {
    console.error('[authMiddleware] Token verification failed:', (error as Error).message);
    return null;
  }
}

// Generate JWT access token (shorter lived)
export const generateAccessToken = (subject: string, secret: string = config.jwtSecret): string => {
  return jwt.sign({ type: 'access' }, secret, { subject, expiresIn: ACCESS_TOKEN_TTL });
};

// Generate JWT refresh token (longer lived)
export const generateRefreshToken = (subject: string, secret: string = config.jwtSecret): string => {
  return jwt.sign({ type: 'refresh' }, secret, { subject, expiresIn: REFRESH_TOKEN_TTL });
};

export function issueTokens(subject: string, secret: string = config.jwtSecret) {
  return {
    accessToken: generateAccessToken(subject, secret),
    refreshToken: generateRefreshToken(subject, secret),
    expiresIn: ACCESS_TOKEN_TTL
  };
}

/**
 * Constant-time comparison of a presented access key with the configured one.
 */
export function accessKeyMatches(presented: string, expected: string): boolean {
  const a = crypto.createHash('sha256').update(presented).digest();
  const b = crypto.createHash('sha256').update(expected).digest();
  return crypto.timingSafeEqual(a, b);
}

// Middleware to protect routes
export function createProtect(secret: string): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const header = req.headers.authorization;
    if (!header || !header.startsWith('Bearer ')) {
      res.status(401).json({ error: 'Not authorized, no token provided' });
      return;
    }

    const verified = verifyToken(header.slice('Bearer '.length).trim(), secret);
    if (!verified || verified.type !== 'access') {
      res.status(401).json({ error: 'Not authorized, token invalid' });
      return;
    }

    req.subject = verified.subject;
    next();
  };
}

// Rotates both tokens
export function createRefreshHandler(secret: string): RequestHandler {
  return (req: Request, res: Response) => {
    const presented: unknown = req.body?.refreshToken;
    if (typeof presented !== 'string' || !presented) {
      res.status(401).json({ error: 'Refresh token required' });
      return;
    }

    const verified = verifyToken(presented, secret);
    if (!verified || verified.type !== 'refresh') {
      res.status(401).json({ error: 'Invalid refresh token' });
      return;
    }

    res.json(issueTokens(verified.subject, secret));
  };
}
