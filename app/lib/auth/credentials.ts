import crypto from "crypto";
import { z } from "zod";

export interface Principal {
  username: string;
  email: string;
  permissions: string[];
  active: boolean;
}

/**
 * Looks up a subject by username/password. Returns null for an unknown
 * user or a wrong password; callers must not distinguish the two.
 */
export interface CredentialStore {
  verify(username: string, password: string): Promise<Principal | null>;
}

export const userRecordSchema = z.object({
  username: z.string().min(1),
  email: z.string().default(""),
  password: z.string().min(1),
  permissions: z.array(z.string()).default([]),
  is_active: z.boolean().default(true),
});

export type UserRecord = z.infer<typeof userRecordSchema>;

export const DEMO_USERS: UserRecord[] = [
  {
    username: "admin",
    email: "admin@codebridge.local",
    password: "admin123",
    permissions: ["admin", "read", "write", "delete"],
    is_active: true,
  },
  {
    username: "user",
    email: "user@codebridge.local",
    password: "user123",
    permissions: ["read", "write"],
    is_active: true,
  },
];

/** Parse the AUTH_USERS env value (a JSON array of user records). */
export function parseUserRecords(raw: string): UserRecord[] {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    throw new Error("AUTH_USERS is not valid JSON");
  }
  const parsed = z.array(userRecordSchema).min(1).safeParse(json);
  if (!parsed.success) {
    throw new Error(`AUTH_USERS is invalid: ${parsed.error.issues[0]?.message ?? "unknown issue"}`);
  }
  return parsed.data;
}

const KEY_LENGTH = 32;

interface StoredUser {
  principal: Principal;
  salt: Buffer;
  hash: Buffer;
}

function derive(password: string, salt: Buffer): Buffer {
  return crypto.scryptSync(password, salt, KEY_LENGTH);
}

/**
 * Fixed in-process user table. Passwords are salted and scrypt-hashed when
 * the store is built and compared in constant time.
 */
export class StaticCredentialStore implements CredentialStore {
  private readonly users = new Map<string, StoredUser>();
  // Burned on unknown usernames so lookup time does not reveal which exist.
  private readonly dummy: StoredUser;

  constructor(records: UserRecord[]) {
    for (const r of records) {
      const salt = crypto.randomBytes(16);
      this.users.set(r.username, {
        principal: {
          username: r.username,
          email: r.email,
          permissions: [...r.permissions],
          active: r.is_active,
        },
        salt,
        hash: derive(r.password, salt),
      });
    }
    const salt = crypto.randomBytes(16);
    this.dummy = {
      principal: { username: "", email: "", permissions: [], active: false },
      salt,
      hash: derive(crypto.randomBytes(16).toString("hex"), salt),
    };
  }

  async verify(username: string, password: string): Promise<Principal | null> {
    const user = this.users.get(username);
    const target = user ?? this.dummy;
    const ok = crypto.timingSafeEqual(derive(password, target.salt), target.hash);
    if (!user || !ok) return null;
    return { ...user.principal, permissions: [...user.principal.permissions] };
  }
}
