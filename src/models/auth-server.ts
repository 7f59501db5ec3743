/**
 * Authorization server discovery response (`GET /auth/server`)
 */

import { z } from 'zod';
import { parseWithSchema } from './validation.js';

export const AuthServerInfoSchema = z.object({
  tokenURL: z.string().url(),
});

export type AuthServerInfo = z.infer<typeof AuthServerInfoSchema>;

export function parseAuthServerInfo(input: unknown): AuthServerInfo {
  return parseWithSchema('AuthServerInfo', AuthServerInfoSchema, input);
}
