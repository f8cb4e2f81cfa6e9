import jwt from 'jsonwebtoken';
import type { JwtPayload } from 'jsonwebtoken';
import { z } from 'zod';

export interface TokenServiceOptions {
  /** HMAC key shared by every token this service signs or checks. */
  secret: string;
  /** Default lifetime of issued tokens. */
  ttlHours?: number;
  clock?: () => Date;
}

export interface TokenClaims {
  email: string;
  /** Password hash the token was issued against. */
  passwordHashFingerprint: string;
  expiresAt: Date;
}

export type TokenRejection = 'malformed' | 'signature' | 'expired';

export type TokenValidation =
  | { valid: true; claims: TokenClaims }
  | { valid: false; reason: TokenRejection };

const payloadSchema = z.object({
  email: z.string(),
  password: z.string(),
  exp: z.number(),
});

const ALGORITHM = 'HS256';
const SECONDS_PER_HOUR = 60 * 60;

/**
 * Stateless session tokens: HS256 JWTs whose payload binds an email to the
 * password hash current at login. Nothing is stored server side.
 */
export class TokenService {
  private readonly secret: string;
  private readonly ttlHours: number;
  private readonly clock: () => Date;

  constructor(options: TokenServiceOptions) {
    if (options.secret.length === 0) {
      throw new Error('Token secret must not be empty');
    }
    this.secret = options.secret;
    this.ttlHours = options.ttlHours ?? 24;
    this.clock = options.clock ?? (() => new Date());
  }

  issue(email: string, passwordHash: string, durationHours: number = this.ttlHours): string {
    const exp = this.nowSeconds() + Math.floor(durationHours * SECONDS_PER_HOUR);

    return jwt.sign({ email, password: passwordHash, exp }, this.secret, {
      algorithm: ALGORITHM,
      noTimestamp: true,
    });
  }

  validate(token: string): TokenValidation {
    let decoded: string | JwtPayload;
    try {
      decoded = jwt.verify(token, this.secret, {
        algorithms: [ALGORITHM],
        clockTimestamp: this.nowSeconds(),
      });
    } catch (error) {
      if (error instanceof jwt.TokenExpiredError) {
        return { valid: false, reason: 'expired' };
      }
      if (error instanceof jwt.JsonWebTokenError) {
        return {
          valid: false,
          reason: error.message === 'invalid signature' ? 'signature' : 'malformed',
        };
      }
      throw error;
    }

    const payload = payloadSchema.safeParse(decoded);
    if (!payload.success) {
      return { valid: false, reason: 'malformed' };
    }

    return {
      valid: true,
      claims: {
        email: payload.data.email,
        passwordHashFingerprint: payload.data.password,
        expiresAt: new Date(payload.data.exp * 1000),
      },
    };
  }

  private nowSeconds(): number {
    return Math.floor(this.clock().getTime() / 1000);
  }
}
