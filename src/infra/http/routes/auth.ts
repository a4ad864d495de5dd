import { Router } from 'express';
import { z } from 'zod';
import type { RegisterUseCase } from '../../../application/auth/register.js';
import type { LoginUseCase } from '../../../application/auth/login.js';
import { validate } from '../middleware/validate.js';
import { asyncHandler } from '../middleware/asyncHandler.js';

/**
 * @openapi
 * /auth/register:
 *   post:
 *     tags: [Auth]
 *     summary: Register a new user and receive a JWT
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [email, password]
 *             properties:
 *               email: { type: string, format: email }
 *               password: { type: string, minLength: 1 }
 *     responses:
 *       200:
 *         description: User created
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/AuthResult'
 *       400:
 *         description: Validation error
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/ErrorResponse'
 *       409:
 *         description: Email already registered
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/ErrorResponse'
 *
 * /auth/login:
 *   post:
 *     tags: [Auth]
 *     summary: Login and receive a JWT
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
 *               $ref: '#/components/schemas/AuthResult'
 *       400:
 *         description: Validation error
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/ErrorResponse'
 *       401:
 *         description: Invalid credentials
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/ErrorResponse'
 */

const credentialsBodySchema = z.object({
  email: z.string().trim().email(),
  password: z.string().min(1),
});

export interface AuthRouteDeps {
  registerUseCase: RegisterUseCase;
  loginUseCase: LoginUseCase;
}

export function createAuthRoutes({ registerUseCase, loginUseCase }: AuthRouteDeps) {
  const router = Router();

  router.post(
    '/register',
    validate({ body: credentialsBodySchema }),
    asyncHandler(async (req, res) => {
      const body = credentialsBodySchema.parse(req.body);
      const result = await registerUseCase.execute(body);
      res.status(200).json(result);
    })
  );

  router.post(
    '/login',
    validate({ body: credentialsBodySchema }),
    asyncHandler(async (req, res) => {
      const body = credentialsBodySchema.parse(req.body);
      const result = await loginUseCase.execute(body);
      res.status(200).json(result);
    })
  );

  return router;
}
