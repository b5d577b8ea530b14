// src/routes/scheduleRoutes.ts
import { Router, Request, Response } from 'express';
import { SchedulingService } from '../services/schedulingService';
import {
  createEntrySchema,
  planTasksSchema,
  resolveScheduleSchema,
  sendValidationError,
  suggestSlotsSchema
} from './schemas';

export function createScheduleRoutes(schedulingService: SchedulingService): Router {
  const scheduleRoutes: Router = Router();

  // Calendar entries, most recent first
  scheduleRoutes.get('/', async (_req: Request, res: Response) => {
    try {
      const entries = await schedulingService.listEntries();
      return res.json(entries);
    } catch (error) {
      return res.status(500).json({ error: (error as Error).message });
    }
  });

  // Manual entry; tasks it now collides with are moved later
  scheduleRoutes.post('/', async (req: Request, res: Response) => {
    const parsed = createEntrySchema.safeParse(req.body);
    if (!parsed.success) return sendValidationError(res, parsed.error);

    try {
      const result = await schedulingService.createEntry(parsed.data);
      return res.status(201).json(result);
    } catch (error) {
      return res.status(500).json({ error: (error as Error).message });
    }
  });

  scheduleRoutes.delete('/:id', async (req: Request, res: Response) => {
    try {
      const result = await schedulingService.deleteEntry(req.params.id);
      if (!result) {
        return res.status(404).json({ error: 'Calendar entry not found' });
      }
      return res.json(result);
    } catch (error) {
      return res.status(500).json({ error: (error as Error).message });
    }
  });

  scheduleRoutes.post('/resolve', async (req: Request, res: Response) => {
    const parsed = resolveScheduleSchema.safeParse(req.body ?? {});
    if (!parsed.success) return sendValidationError(res, parsed.error);

    try {
      const { desiredTimeText, durationMinutes, avoidNaps, autoSchedule } = parsed.data;
      const result = await schedulingService.resolveSchedule(desiredTimeText, durationMinutes, avoidNaps, autoSchedule);
      return res.json(result);
    } catch (error) {
      return res.status(500).json({ error: (error as Error).message });
    }
  });

  scheduleRoutes.post('/suggest', async (req: Request, res: Response) => {
    const parsed = suggestSlotsSchema.safeParse(req.body ?? {});
    if (!parsed.success) return sendValidationError(res, parsed.error);

    try {
      const { baseTime, offsetsMinutes, durationMinutes, avoidNaps } = parsed.data;
      const slots = await schedulingService.suggestSlots(baseTime, offsetsMinutes, durationMinutes, avoidNaps);
      return res.json({ slots });
    } catch (error) {
      return res.status(500).json({ error: (error as Error).message });
    }
  });

  scheduleRoutes.post('/plan', async (req: Request, res: Response) => {
    const parsed = planTasksSchema.safeParse(req.body);
    if (!parsed.success) return sendValidationError(res, parsed.error);

    try {
      const result = await schedulingService.planTasks(parsed.data);
      return res.status(201).json(result);
    } catch (error) {
      return res.status(500).json({ error: (error as Error).message });
    }
  });

  return scheduleRoutes;
}
