import jwt, { type JwtPayload } from 'jsonwebtoken';
import { z } from 'zod';

const BEARER_PREFIX = 'Bearer ';

/** Who the caller is, as recovered from a verified token. */
export interface Identity {
  userId: number;
  email: string;
}

export type AuthErrorReason = 'missing' | 'malformed' | 'invalid' | 'expired';

export interface AuthError {
  reason: AuthErrorReason;
  message: string;
}

export type VerifyResult =
  | { ok: true; identity: Identity }
  | { ok: false; error: AuthError };

/**
 * Decides whether an Authorization header value admits the request.
 * The HTTP gate only depends on this interface.
 */
export interface TokenVerifier {
  verify(authorizationHeader: string | undefined): VerifyResult;
}

export interface IssuedToken {
  token: string;
  expiresIn: number;
}

export interface TokenIssuer {
  issue(identity: Identity): IssuedToken;
}

const AUTH_ERROR_MESSAGES: Record<AuthErrorReason, string> = {
  missing: 'Authorization header required',
  malformed: 'Invalid authorization header format',
  invalid: 'Invalid token',
  expired: 'Token expired',
};

function reject(reason: AuthErrorReason): VerifyResult {
  return { ok: false, error: { reason, message: AUTH_ERROR_MESSAGES[reason] } };
}

const claimsSchema = z.object({
  sub: z.string().regex(/^[1-9]\d*$/),
  email: z.string().min(1),
});

export interface JwtTokenServiceOptions {
  secret: string;
  ttlSeconds: number;
  /** Clock in milliseconds, injectable for tests. */
  now?: () => number;
}

/**
 * HS256-signed, expiring tokens carrying `sub` (user id) and `email`.
 */
export class JwtTokenService implements TokenIssuer, TokenVerifier {
  private readonly secret: string;
  private readonly ttlSeconds: number;
  private readonly now: () => number;

  constructor(options: JwtTokenServiceOptions) {
    this.secret = options.secret;
    this.ttlSeconds = options.ttlSeconds;
    this.now = options.now ?? Date.now;
  }

  issue(identity: Identity): IssuedToken {
    const token = jwt.sign(
      {
        email: identity.email,
        iat: this.nowSeconds(),
      },
      this.secret,
      {
        algorithm: 'HS256',
        subject: String(identity.userId),
        expiresIn: this.ttlSeconds,
      }
    );
    return { token, expiresIn: this.ttlSeconds };
  }

  verify(authorizationHeader: string | undefined): VerifyResult {
    if (!authorizationHeader) {
      return reject('missing');
    }
    if (!authorizationHeader.startsWith(BEARER_PREFIX)) {
      return reject('malformed');
    }

    const token = authorizationHeader.substring(BEARER_PREFIX.length);
    let decoded: string | JwtPayload;
    try {
      decoded = jwt.verify(token, this.secret, {
        algorithms: ['HS256'],
        clockTimestamp: this.nowSeconds(),
      });
    } catch (error) {
      return reject(error instanceof jwt.TokenExpiredError ? 'expired' : 'invalid');
    }

    const claims = claimsSchema.safeParse(decoded);
    if (!claims.success) {
      return reject('invalid');
    }

    return {
      ok: true,
      identity: {
        userId: Number(claims.data.sub),
        email: claims.data.email,
      },
    };
  }

  private nowSeconds(): number {
    return Math.floor(this.now() / 1000);
  }
}
