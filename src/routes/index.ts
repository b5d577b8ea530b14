// src/routes/index.ts
import { Router } from 'express';
import { createProtect } from '../middleware/authMiddleware';
import { SchedulingService } from '../services/schedulingService';
import { AuthSettings, createAuthRoutes } from './authRoutes';
import { createMoodRoutes } from './moodRoutes';
import { createScheduleRoutes } from './scheduleRoutes';
import { createTaskRoutes } from './taskRoutes';

export default function createRouter(schedulingService: SchedulingService, auth: AuthSettings): Router {
  const router: Router = Router();
  const protect = createProtect(auth.jwtSecret);

  router.use('/auth', createAuthRoutes(auth));
  router.use('/tasks', protect, createTaskRoutes(schedulingService));
  router.use('/schedule', protect, createScheduleRoutes(schedulingService));
  router.use('/mood', protect, createMoodRoutes(schedulingService));

  return router;
}
