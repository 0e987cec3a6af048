import jwt from 'jsonwebtoken';
import { z } from 'zod';
import { config } from '../config/env';
import type { OperationContext, Clock } from '../lib/context';
import { systemClock } from '../lib/context';

const jwtPayloadSchema = z.object({
  userId: z.string().min(1),
  companyId: z.string().min(1),
  branchId: z.string().min(1).nullable(),
  username: z.string().optional(),
});

export type JwtPayload = z.infer<typeof jwtPayloadSchema>;

export class AuthService {
  private readonly secret: string;
  private readonly expiresIn: number;

  constructor(secret: string = config.JWT_SECRET, expiresIn: number = config.JWT_EXPIRES_IN) {
    this.secret = secret;
    this.expiresIn = expiresIn;
  }

  signToken(payload: JwtPayload): string {
    return jwt.sign(payload, this.secret, { expiresIn: this.expiresIn });
  }

  verifyToken(token: string): JwtPayload {
    const decoded = jwt.verify(token, this.secret);
    const parsed = jwtPayloadSchema.safeParse(decoded);
    if (!parsed.success) {
      throw new Error('Invalid token payload');
    }
    return parsed.data;
  }

  toContext(payload: JwtPayload, clock: Clock = systemClock): OperationContext {
    return {
      actorId: payload.userId,
      companyId: payload.companyId,
      branchId: payload.branchId,
      clock,
    };
  }
}

export const authService = new AuthService();
