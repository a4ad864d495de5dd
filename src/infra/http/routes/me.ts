import { Router, type Response } from 'express';
import type { TokenVerifier } from '../../../application/auth/tokenVerifier.js';
import { authMiddleware, requireAuth, type AuthRequest } from '../middleware/auth.js';

/**
 * @openapi
 * /me:
 *   get:
 *     tags: [Auth]
 *     summary: Current user
 *     security: [{ bearerAuth: [] }]
 *     responses:
 *       200:
 *         description: The user the bearer token belongs to
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/UserSummary'
 *       401:
 *         description: Missing, invalid or expired token
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/ErrorResponse'
 */
export function createMeRoutes(tokenVerifier: TokenVerifier) {
  const router = Router();

  router.get('/me', authMiddleware(tokenVerifier), (req: AuthRequest, res: Response) => {
    const { email, role } = requireAuth(req);
    res.json({ email, role });
  });

  return router;
}
