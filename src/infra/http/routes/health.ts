import { Router } from 'express';
import { AuthDependencies } from '../../di/injection.js';
import { asyncHandler } from '../middleware/asyncHandler.js';

/**
 * @openapi
 * /healthz:
 *   get:
 *     tags: [Health]
 *     summary: Reachability of the backing store
 *     responses:
 *       200:
 *         description: Connected
 *         content:
 *           application/json:
 *             schema:
 *               type: object
 *               properties:
 *                 status: { type: string, example: ok }
 *                 checkedAt: { type: string, format: date-time }
 *       503:
 *         description: Backing store unreachable
 *         content:
 *           application/json:
 *             schema:
 *               type: object
 *               properties:
 *                 code: { type: string, example: NO_CONNECTIVITY }
 *                 message: { type: string }
 *                 checkedAt: { type: string, format: date-time }
 */
export function createHealthRoutes(deps: Pick<AuthDependencies, 'checkConnectivity'>) {
  const router = Router();

  router.get(
    '/healthz',
    asyncHandler(async (_req, res) => {
      const status = await deps.checkConnectivity.execute();
      const checkedAt = status.checkedAt.toISOString();
      if (status.connected) {
        res.status(200).json({ status: 'ok', checkedAt });
        return;
      }
      res.status(503).json({
        code: 'NO_CONNECTIVITY',
        message: 'Database unavailable',
        checkedAt,
      });
    })
  );

  return router;
}
