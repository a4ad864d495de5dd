import { Router } from 'express';
import type Database from 'better-sqlite3';
import { pingDatabase } from '../../db/database.js';

/**
 * @openapi
 * /api/health:
 *   get:
 *     tags: [Health]
 *     summary: Liveness check (no auth)
 *     responses:
 *       200:
 *         description: Database reachable
 *       500:
 *         description: Database unavailable
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 */
export function createHealthRoutes(db: Database.Database) {
  const router = Router();

  router.get('/health', (_req, res) => {
    try {
      pingDatabase(db);
      res.status(200).json({ status: 'ok' });
    } catch (error) {
      console.error('Health check failed:', error);
      res.status(500).json({
        code: 'DB_UNAVAILABLE',
        message: 'Database unavailable',
      });
    }
  });

  return router;
}
