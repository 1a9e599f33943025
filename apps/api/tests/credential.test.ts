import { describe, it, expect } from "vitest";
import { CredentialParseError } from "../src/core/errors.js";
import { CredentialCell, formatCookie, parseCookie } from "../src/modules/cloud115/credential.js";

describe("parseCookie", () => {
  it("reads the three session tokens", () => {
    expect(parseCookie("UID=1;CID=2;SEID=3")).toEqual({ uid: "1", cid: "2", seid: "3" });
  });

  it("tolerates whitespace, ordering and unrelated pairs", () => {
    expect(parseCookie(" SEID=abc ; acw_tc=x; UID=10_A1_1700000000 ;CID=ff; ")).toEqual({
      uid: "10_A1_1700000000",
      cid: "ff",
      seid: "abc"
    });
  });

  it("names every missing token", () => {
    expect(() => parseCookie("UID=1")).toThrow(CredentialParseError);
    expect(() => parseCookie("UID=1")).toThrow("cookie is missing CID, SEID");
    expect(() => parseCookie("UID=1;CID=;SEID=3")).toThrow("cookie is missing CID");
  });
});

describe("CredentialCell", () => {
  it("swaps the whole credential and formats the cookie", () => {
    const cell = new CredentialCell();
    expect(cell.cookie()).toBeUndefined();

    cell.set({ uid: "1", cid: "2", seid: "3" });
    const first = cell.get();
    cell.set({ uid: "4", cid: "5", seid: "6" });

    expect(first).toEqual({ uid: "1", cid: "2", seid: "3" });
    expect(Object.isFrozen(first)).toBe(true);
    expect(cell.cookie()).toBe("UID=4;CID=5;SEID=6");

    cell.clear();
    expect(cell.get()).toBeNull();
  });

  it("round-trips through formatCookie", () => {
    const credential = { uid: "u", cid: "c", seid: "s" };
    expect(parseCookie(formatCookie(credential))).toEqual(credential);
  });
});
