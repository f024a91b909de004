import { Router } from 'express';
import { z } from 'zod';
import { AuthDependencies } from '../../di/injection.js';
import { asyncHandler } from '../middleware/asyncHandler.js';
import { authMiddleware, AuthRequest } from '../middleware/auth.js';
import { createCredentialsRateLimiter } from '../middleware/rateLimit.js';
import { validate } from '../middleware/validate.js';
import { issueToken, TokenOptions } from '../token.js';

/**
 * @openapi
 * /api/auth/register:
 *   post:
 *     tags: [Auth]
 *     summary: Register a new user
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [email, password]
 *             properties:
 *               email: { type: string, format: email }
 *               password: { type: string, minLength: 8 }
 *     responses:
 *       201:
 *         description: User created
 *         content:
 *           application/json:
 *             schema:
 *               type: object
 *               properties:
 *                 user: { $ref: '#/components/schemas/User' }
 *       400:
 *         description: Validation error
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/ErrorResponse'
 *       409:
 *         description: Email already exists
 *       503:
 *         description: Backing store unreachable
 *
 * /api/auth/login:
 *   post:
 *     tags: [Auth]
 *     summary: Login and receive JWT
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [email, password]
 *             properties:
 *               email: { type: string, format: email }
 *               password: { type: string }
 *     responses:
 *       200:
 *         description: Authenticated
 *         content:
 *           application/json:
 *             schema:
 *               type: object
 *               properties:
 *                 token: { type: string }
 *                 user: { $ref: '#/components/schemas/User' }
 *       401:
 *         description: Invalid credentials
 *       503:
 *         description: Backing store unreachable
 *
 * /api/auth/me:
 *   get:
 *     tags: [Auth]
 *     summary: Current user
 *     security:
 *       - bearerAuth: []
 *     responses:
 *       200:
 *         description: The authenticated user
 *       401:
 *         description: Missing or invalid token
 *       404:
 *         description: User no longer exists
 *
 * /api/auth/password:
 *   post:
 *     tags: [Auth]
 *     summary: Change password
 *     security:
 *       - bearerAuth: []
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [currentPassword, newPassword]
 *             properties:
 *               currentPassword: { type: string }
 *               newPassword: { type: string, minLength: 8 }
 *     responses:
 *       204:
 *         description: Password changed
 *       401:
 *         description: Current password is incorrect
 */

const credentialsSchema = z.object({
  email: z.string().email(),
  password: z.string().min(8),
});

const loginBodySchema = z.object({
  email: z.string().email(),
  password: z.string().min(1),
});

const changePasswordBodySchema = z.object({
  currentPassword: z.string().min(1),
  newPassword: z.string().min(8),
});

export function createAuthRoutes(deps: AuthDependencies, tokenOptions: TokenOptions) {
  const router = Router();
  const requireAuth = authMiddleware(tokenOptions.secret);
  const credentialsLimiter = createCredentialsRateLimiter();

  router.post(
    '/register',
    credentialsLimiter,
    validate({ body: credentialsSchema }),
    asyncHandler(async (req, res) => {
      const body = credentialsSchema.parse(req.body);
      const user = await deps.register.execute(body);
      res.status(201).json({ user });
    })
  );

  router.post(
    '/login',
    credentialsLimiter,
    validate({ body: loginBodySchema }),
    asyncHandler(async (req, res) => {
      const body = loginBodySchema.parse(req.body);
      const user = await deps.login.execute(body);
      res.status(200).json({ token: issueToken(user, tokenOptions), user });
    })
  );

  router.get(
    '/me',
    requireAuth,
    asyncHandler<AuthRequest>(async (req, res) => {
      const userId = z.number().int().parse(req.userId);
      const user = await deps.getUser.execute({ userId });
      res.status(200).json({ user });
    })
  );

  router.post(
    '/password',
    requireAuth,
    validate({ body: changePasswordBodySchema }),
    asyncHandler<AuthRequest>(async (req, res) => {
      const userId = z.number().int().parse(req.userId);
      const body = changePasswordBodySchema.parse(req.body);
      await deps.changePassword.execute({ userId, ...body });
      res.status(204).end();
    })
  );

  return router;
}
