import { SignJWT, jwtVerify } from 'jose';
import { randomBytes, randomUUID, createHash } from 'node:crypto';
import { z } from 'zod';
import {
  type TokenService,
  type AccessTokenClaims,
  type VerifiedAccessToken,
  type SignedAccessToken,
} from '@murmur/domain';

interface JwtKey {
  kid: string;
  secret: Uint8Array;
}

export interface TokenServiceConfig {
  activeKid: string;
  keys: Array<{ kid: string; secret: string }>;
  accessTokenTtlSeconds: number;
  issuer: string;
  audience: string;
}

const AccessTokenPayload = z.object({
  sub: z.string().min(1),
  jti: z.string().min(1),
  iat: z.number(),
  exp: z.number(),
  username: z.string(),
  email: z.string(),
  display_name: z.string(),
  is_verified: z.boolean(),
  session_id: z.string().min(1),
  token_type: z.literal('access'),
});

export class JoseTokenService implements TokenService {
  private readonly keys: Map<string, JwtKey>;
  private readonly activeKey: JwtKey;

  constructor(private readonly config: TokenServiceConfig) {
    this.keys = new Map();
    for (const key of config.keys) {
      this.keys.set(key.kid, {
        kid: key.kid,
        secret: new TextEncoder().encode(key.secret),
      });
    }

    const active = this.keys.get(config.activeKid);
    if (!active) {
      throw new Error(`Active JWT key '${config.activeKid}' not found in keys`);
    }
    this.activeKey = active;
  }

  async signAccessToken(claims: AccessTokenClaims): Promise<SignedAccessToken> {
    const issuedAt = Math.floor(Date.now() / 1000);
    const expiresAt = issuedAt + this.config.accessTokenTtlSeconds;

    const token = await new SignJWT({
      username: claims.username,
      email: claims.email,
      display_name: claims.displayName,
      is_verified: claims.isVerified,
      session_id: claims.sessionId,
      token_type: 'access',
    })
      .setProtectedHeader({ alg: 'HS256', kid: this.activeKey.kid })
      .setSubject(claims.userId)
      .setJti(randomUUID())
      .setIssuedAt(issuedAt)
      .setIssuer(this.config.issuer)
      .setAudience(this.config.audience)
      .setExpirationTime(expiresAt)
      .sign(this.activeKey.secret);

    return { token, expiresAt: new Date(expiresAt * 1000) };
  }

  async verifyAccessToken(token: string): Promise<VerifiedAccessToken> {
    const { payload } = await jwtVerify(
      token,
      (header) => {
        const key = header.kid ? this.keys.get(header.kid) : undefined;
        if (!key) {
          throw new Error('Unknown JWT key id');
        }
        return key.secret;
      },
      {
        issuer: this.config.issuer,
        audience: this.config.audience,
        algorithms: ['HS256'],
        clockTolerance: 0,
      },
    );

    const parsed = AccessTokenPayload.safeParse(payload);
    if (!parsed.success) {
      throw new Error('JWT payload is not an access token');
    }
    const claims = parsed.data;

    return {
      userId: claims.sub,
      username: claims.username,
      email: claims.email,
      displayName: claims.display_name,
      isVerified: claims.is_verified,
      sessionId: claims.session_id,
      tokenId: claims.jti,
      issuedAt: new Date(claims.iat * 1000),
      expiresAt: new Date(claims.exp * 1000),
    };
  }

  generateOpaqueToken(): string {
    return randomBytes(32).toString('base64url');
  }

  hashOpaqueToken(token: string): string {
    return createHash('sha256').update(token).digest('hex');
  }
}
