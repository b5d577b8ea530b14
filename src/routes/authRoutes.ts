// src/routes/authRoutes.ts
import { Router, Request, Response } from 'express';
import { accessKeyMatches, createRefreshHandler, issueTokens } from '../middleware/authMiddleware';
import { sendValidationError, tokenRequestSchema } from './schemas';

export interface AuthSettings {
  jwtSecret: string;
  accessKey?: string;
}

const TOKEN_SUBJECT = 'owner';

export function createAuthRoutes(settings: AuthSettings): Router {
  const authRoutes: Router = Router();

  // Exchange the configured access key for a token pair
  authRoutes.post('/token', (req: Request, res: Response) => {
    if (!settings.accessKey) {
      return res.status(404).json({ error: 'Token issuing is disabled' });
    }

    const parsed = tokenRequestSchema.safeParse(req.body);
    if (!parsed.success) return sendValidationError(res, parsed.error);

    if (!accessKeyMatches(parsed.data.accessKey, settings.accessKey)) {
      console.log('[authRoutes] Rejected access key');
      return res.status(401).json({ error: 'Invalid access key' });
    }

    return res.json(issueTokens(TOKEN_SUBJECT, settings.jwtSecret));
  });

  authRoutes.post('/refresh', createRefreshHandler(settings.jwtSecret));

  return authRoutes;
}
