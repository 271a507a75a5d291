import { Router } from 'express';

export const API_VERSION = '1.0.0';

/**
 * @openapi
 * /api/v1/health:
 *   get:
 *     tags: [Health]
 *     summary: Liveness check
 *     responses:
 *       200:
 *         description: Service is up
 *         content:
 *           application/json:
 *             schema:
 *               type: object
 *               properties:
 *                 status: { type: string, example: ok }
 *                 version: { type: string, example: 1.0.0 }
 */
export function createHealthRoutes() {
  const router = Router();

  router.get('/health', (_req, res) => {
    res.status(200).json({ status: 'ok', version: API_VERSION });
  });

  return router;
}
