import { TokenClaims, TokenService } from './token.js';

export type DenialReason = 'bad token' | 'identity mismatch' | 'stale credential';

export type AuthDecision =
  | { authorized: true; claims: TokenClaims }
  | { authorized: false; reason: DenialReason };

/**
 * Decides whether a session token lets its bearer act on a given account.
 *
 * A token passes only if it is correctly signed and unexpired, was issued
 * for the account's email, and carries the account's current password hash.
 * Changing the password therefore revokes every token issued before it.
 */
export class AuthGate {
  constructor(private tokenService: TokenService) {}

  authorize(claimedEmail: string, token: string, currentPasswordHash: string): AuthDecision {
    const validation = this.tokenService.validate(token);
    if (!validation.valid) {
      return { authorized: false, reason: 'bad token' };
    }

    const { claims } = validation;
    if (claims.email !== claimedEmail) {
      return { authorized: false, reason: 'identity mismatch' };
    }

    if (claims.passwordHashFingerprint !== currentPasswordHash) {
      return { authorized: false, reason: 'stale credential' };
    }

    return { authorized: true, claims };
  }
}
