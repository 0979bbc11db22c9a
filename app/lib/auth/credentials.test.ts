import { describe, it, expect } from "vitest";
import { DEMO_USERS, StaticCredentialStore, parseUserRecords } from "./credentials";

describe("StaticCredentialStore", () => {
  const store = new StaticCredentialStore(DEMO_USERS);

  it("verifies a correct password", async () => {
    await expect(store.verify("admin", "admin123")).resolves.toEqual({
      username: "admin",
      email: "admin@codebridge.local",
      permissions: ["admin", "read", "write", "delete"],
      active: true,
    });
  });

  it("returns null for a wrong password or unknown user", async () => {
    await expect(store.verify("user", "nope")).resolves.toBeNull();
    await expect(store.verify("ghost", "user123")).resolves.toBeNull();
  });

  it("reports inactive accounts without hiding them", async () => {
    const inactive = new StaticCredentialStore([
      { username: "old", email: "", password: "test-password", permissions: ["read"], is_active: false },
    ]);
    const principal = await inactive.verify("old", "test-password");
    expect(principal?.active).toBe(false);
  });
});

describe("parseUserRecords", () => {
  it("applies defaults", () => {
    expect(parseUserRecords('[{"username":"ops","password":"test-password"}]')).toEqual([
      { username: "ops", email: "", password: "test-password", permissions: [], is_active: true },
    ]);
  });

  it("rejects invalid JSON", () => {
    expect(() => parseUserRecords("{oops")).toThrow("AUTH_USERS is not valid JSON");
  });

  it("rejects an empty list", () => {
    expect(() => parseUserRecords("[]")).toThrow(/^AUTH_USERS is invalid: /);
  });
});
