import { Router } from 'express';
import healthRoutes from './health.routes';
import attendanceRoutes from './attendance.routes';

const router = Router();

// Health check routes
router.use('/health', healthRoutes);

// Attendance routes (CSV upload + JSON reconciliation)
router.use('/attendance', attendanceRoutes);

export default router;
