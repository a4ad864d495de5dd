import { z } from 'zod';
import { ROLES } from '../../domain/auth/user.js';

export const tokenClaimsSchema = z.object({
  userId: z.string().min(1),
  email: z.string(),
  role: z.enum(ROLES),
});

export type TokenClaims = z.infer<typeof tokenClaimsSchema>;
