import { describe, it, expect, beforeEach } from "vitest";
import { MembershipRegistry } from "../src/membership.js";
import { CatalogError } from "../src/types.js";
import { accessAs, CURATOR, STEWARD, T0 } from "./fixtures.js";

describe("MembershipRegistry", () => {
  let members: MembershipRegistry;

  beforeEach(() => {
    members = new MembershipRegistry();
  });

  it("grants membership with an optional tier", () => {
    members.grant(accessAs(STEWARD), "member-1", "gold", T0);
    members.grant(accessAs(STEWARD), "member-2", null, T0);
    expect(members.isMember("member-1")).toBe(true);
    expect(members.tierOf("member-1")).toBe("gold");
    expect(members.tierOf("member-2")).toBeUndefined();
    expect(members.count).toBe(2);
  });

  it("re-granting replaces the tier", () => {
    members.grant(accessAs(STEWARD), "member-1", "gold", T0);
    members.grant(accessAs(STEWARD), "member-1", "silver", T0 + 5);
    expect(members.getMembership("member-1")).toEqual({
      account: "member-1",
      tier: "silver",
      grantedAt: T0 + 5,
    });
  });

  it("revokes membership", () => {
    members.grant(accessAs(STEWARD), "member-1", null, T0);
    expect(members.revoke(accessAs(STEWARD), "member-1")).toBe(true);
    expect(members.revoke(accessAs(STEWARD), "member-1")).toBe(false);
    expect(members.isMember("member-1")).toBe(false);
  });

  it("only the steward manages membership", () => {
    expect(() => members.grant(accessAs(CURATOR), "member-1", null, T0)).toThrow(CatalogError);
    expect(() => members.revoke(accessAs(CURATOR), "member-1")).toThrow(/revoke membership/);
  });

  it("rejects an empty account id", () => {
    expect(() => members.grant(accessAs(STEWARD), "", null, T0)).toThrow(/non-empty/);
  });
});
