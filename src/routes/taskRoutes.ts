// src/routes/taskRoutes.ts
import { Router, Request, Response } from 'express';
import { SchedulingService } from '../services/schedulingService';
import {
  createTaskSchema,
  listTasksQuerySchema,
  rescheduleTaskSchema,
  sendValidationError,
  updateTaskSchema
} from './schemas';

export function createTaskRoutes(schedulingService: SchedulingService): Router {
  const taskRoutes: Router = Router();

  // Create a task; a busy desired time is moved to the next free slot
  taskRoutes.post('/', async (req: Request, res: Response) => {
    const parsed = createTaskSchema.safeParse(req.body);
    if (!parsed.success) return sendValidationError(res, parsed.error);

    try {
      const result = await schedulingService.createTask(parsed.data);
      return res.status(201).json(result);
    } catch (error) {
      return res.status(500).json({ error: (error as Error).message });
    }
  });

  taskRoutes.get('/', async (req: Request, res: Response) => {
    const parsed = listTasksQuerySchema.safeParse(req.query);
    if (!parsed.success) return sendValidationError(res, parsed.error);

    try {
      const tasks = await schedulingService.listTasks(parsed.data.mode);
      return res.json(tasks);
    } catch (error) {
      return res.status(500).json({ error: (error as Error).message });
    }
  });

  taskRoutes.get('/:id', async (req: Request, res: Response) => {
    try {
      const task = await schedulingService.getTask(req.params.id);
      if (!task) {
        return res.status(404).json({ error: 'Task not found' });
      }
      return res.json(task);
    } catch (error) {
      return res.status(500).json({ error: (error as Error).message });
    }
  });

  taskRoutes.put('/:id', async (req: Request, res: Response) => {
    const parsed = updateTaskSchema.safeParse(req.body);
    if (!parsed.success) return sendValidationError(res, parsed.error);

    try {
      const result = await schedulingService.updateTask(req.params.id, parsed.data);
      if (!result) {
        return res.status(404).json({ error: 'Task not found' });
      }
      return res.json(result);
    } catch (error) {
      return res.status(500).json({ error: (error as Error).message });
    }
  });

  // Delete a task together with its calendar entry
  taskRoutes.delete('/:id', async (req: Request, res: Response) => {
    try {
      const result = await schedulingService.deleteTask(req.params.id);
      if (!result) {
        return res.status(404).json({ error: 'Task not found' });
      }
      return res.json(result);
    } catch (error) {
      return res.status(500).json({ error: (error as Error).message });
    }
  });

  // Manually trigger rescheduling
  taskRoutes.post('/:id/reschedule', async (req: Request, res: Response) => {
    const parsed = rescheduleTaskSchema.safeParse(req.body ?? {});
    if (!parsed.success) return sendValidationError(res, parsed.error);

    try {
      const result = await schedulingService.rescheduleTask(req.params.id, parsed.data.durationMinutes);
      if (!result) {
        return res.status(404).json({ error: 'Task not found' });
      }
      return res.json(result);
    } catch (error) {
      return res.status(500).json({ error: (error as Error).message });
    }
  });

  return taskRoutes;
}
