import { SignJWT, jwtVerify } from "jose";
import { z } from "zod";
import { AuthenticationError } from "../errors";
import type { Logger } from "../logger";
import type { Clock } from "../rateLimit";
import type { Principal } from "./credentials";

const ALGORITHM = "HS256";

/** Verified caller identity carried by a bearer token. */
export interface Identity {
  username: string;
  permissions: string[];
}

export interface IssuedToken {
  access_token: string;
  token_type: "bearer";
  /** Seconds until expiry. */
  expires_in: number;
}

export interface TokenServiceOptions {
  secret: string;
  expireMinutes: number;
  now?: Clock;
  logger?: Logger;
}

const claimsSchema = z.object({
  sub: z.string().min(1),
  permissions: z.array(z.string()).default([]),
});

/**
 * Stateless HS256 bearer tokens. Validity is a pure function of signature
 * and `exp` at verification time; there is no revocation list.
 */
export class TokenService {
  private readonly key: Uint8Array;
  private readonly expireSeconds: number;
  private readonly now: Clock;
  private readonly logger?: Logger;

  constructor(options: TokenServiceOptions) {
    if (!options.secret) throw new Error("Token secret must not be empty");
    this.key = new TextEncoder().encode(options.secret);
    this.expireSeconds = options.expireMinutes * 60;
    this.now = options.now ?? Date.now;
    this.logger = options.logger;
  }

  async issue(principal: Pick<Principal, "username" | "permissions">): Promise<IssuedToken> {
    const iat = Math.floor(this.now() / 1000);
    const accessToken = await new SignJWT({ permissions: principal.permissions })
      .setProtectedHeader({ alg: ALGORITHM, typ: "JWT" })
      .setSubject(principal.username)
      .setIssuedAt(iat)
      .setExpirationTime(iat + this.expireSeconds)
      .sign(this.key);

    return { access_token: accessToken, token_type: "bearer", expires_in: this.expireSeconds };
  }

  /**
   * Every failure (bad signature, expired, malformed, missing subject)
   * surfaces as the same AuthenticationError.
   */
  async verify(token: string): Promise<Identity> {
    let payload: unknown;
    try {
      ({ payload } = await jwtVerify(token, this.key, {
        algorithms: [ALGORITHM],
        currentDate: new Date(this.now()),
      }));
    } catch (err) {
      this.logger?.warn("Token verification failed", {
        reason: err instanceof Error ? err.name : String(err),
      });
      throw new AuthenticationError();
    }

    const claims = claimsSchema.safeParse(payload);
    if (!claims.success) {
      this.logger?.warn("Token verification failed", { reason: "invalid claims" });
      throw new AuthenticationError();
    }
    return { username: claims.data.sub, permissions: claims.data.permissions };
  }
}
