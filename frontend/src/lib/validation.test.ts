import { describe, expect, it } from "vitest";
import { validateCredentials } from "./validation";

describe("validateCredentials", () => {
  it("requires both fields", () => {
    const missing = { ok: false, message: "Username and Password are required." };
    expect(validateCredentials("", "pw1")).toEqual(missing);
    expect(validateCredentials("alice", "")).toEqual(missing);
    expect(validateCredentials("   ", "pw1")).toEqual(missing);
  });

  it("trims the username but not the password", () => {
    expect(validateCredentials("  alice ", " pw1 ")).toEqual({
      ok: true,
      credentials: { username: "alice", password: " pw1 " },
    });
  });

  it("reports bad input as a result instead of throwing", () => {
    expect(() => validateCredentials("", "")).not.toThrow();
    expect(validateCredentials("", "").ok).toBe(false);
  });
});
