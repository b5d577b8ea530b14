// src/routes/moodRoutes.ts
import { Router, Request, Response } from 'express';
import { SchedulingService } from '../services/schedulingService';
import { moodSignalSchema, sendValidationError } from './schemas';

export function createMoodRoutes(schedulingService: SchedulingService): Router {
  const moodRoutes: Router = Router();

  // One mood reading recolors the whole backlog
  moodRoutes.post('/', async (req: Request, res: Response) => {
    const parsed = moodSignalSchema.safeParse(req.body);
    if (!parsed.success) return sendValidationError(res, parsed.error);

    try {
      const result = await schedulingService.applyMoodToBacklog(parsed.data);
      return res.json(result);
    } catch (error) {
      return res.status(500).json({ error: (error as Error).message });
    }
  });

  return moodRoutes;
}
