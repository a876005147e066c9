import { describe, expect, it } from "vitest";
import { WatchMatcher, nameMatches } from "../src/watchMatcher";

describe("nameMatches", () => {
  it("matches a bare surname against the last name", () => {
    expect(nameMatches("John", "Doe", ["Doe"])).toBe(true);
  });

  it("matches a bare surname against the first name too", () => {
    expect(nameMatches("Doe", "Smith", ["doe"])).toBe(true);
  });

  it("ignores case and surrounding whitespace", () => {
    expect(nameMatches("  JOHN ", " DOE", ["  doe JOHN "])).toBe(true);
  });

  it("accepts a configured first name that prefixes the recorded one", () => {
    expect(nameMatches("Johnathan", "Doe", ["Doe John"])).toBe(true);
  });

  it("does not match when the configured first name is longer than the recorded one", () => {
    expect(nameMatches("Jon", "Doe", ["Doe John"])).toBe(false);
  });

  it("matches entries written first name first, exactly", () => {
    expect(nameMatches("John", "Doe", ["John Doe"])).toBe(true);
    expect(nameMatches("Johnny", "Doe", ["John Doe"])).toBe(false);
  });

  it("joins the remaining tokens for multi-word names", () => {
    expect(nameMatches("Mary Ann", "Roe", ["Roe Mary Ann"])).toBe(true);
    expect(nameMatches("Ana", "De La Cruz", ["Ana De La Cruz"])).toBe(true);
  });

  it("returns false for an empty watchlist or blank entries", () => {
    expect(nameMatches("John", "Doe", [])).toBe(false);
    expect(nameMatches("John", "Doe", ["", "   "])).toBe(false);
  });

  it("does not match a different surname", () => {
    expect(nameMatches("John", "Doerr", ["Doe"])).toBe(false);
  });
});

describe("WatchMatcher", () => {
  it("reports the watchlist entry that matched", () => {
    const matcher = new WatchMatcher(["Smith", "Doe John"]);

    expect(matcher.findMatch("Johnathan", "DOE")).toBe("Doe John");
    expect(matcher.findMatch("Jane", "Roe")).toBeNull();
  });

  it("drops blank entries", () => {
    expect(new WatchMatcher(["Doe", " ", ""]).size).toBe(1);
  });
});
