import { describe, it, expect } from "vitest";
import { AccessControl } from "../src/access-control.js";

describe("AccessControl", () => {
  it("starts with the configured admin only", () => {
    const access = new AccessControl("admin");
    expect(access.hasRole("admin", "admin")).toBe(true);
    expect(access.hasRole("executor", "admin")).toBe(false);
    expect(access.membersOf("executor")).toEqual([]);
  });

  it("requires an admin to grant", () => {
    const access = new AccessControl("admin");
    expect(() => access.grantRole("eve", "executor", "eve")).toThrow(
      expect.objectContaining({ code: "UNAUTHORIZED", details: { role: "admin", account: "eve" } }),
    );
    expect(access.hasRole("executor", "eve")).toBe(false);
  });

  it("reports whether a grant or revoke changed anything", () => {
    const access = new AccessControl("admin");
    expect(access.grantRole("admin", "admin", "second")).toBe(true);
    expect(access.grantRole("admin", "admin", "second")).toBe(false);
    expect(access.membersOf("admin")).toEqual(["admin", "second"]);
    expect(access.revokeRole("second", "admin", "admin")).toBe(true);
    expect(access.hasRole("admin", "admin")).toBe(false);
  });

  it("rejects an empty admin or account", () => {
    expect(() => new AccessControl("")).toThrow(expect.objectContaining({ code: "INVALID_ADDRESS" }));
    const access = new AccessControl("admin");
    expect(() => access.grantRole("admin", "executor", "")).toThrow(
      expect.objectContaining({ code: "INVALID_ADDRESS" }),
    );
  });
});
