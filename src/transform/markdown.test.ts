import { describe, it, expect } from "vitest";
import { bulletsToDiamonds, extractTitle, headingsToBold } from "./markdown.js";

describe("extractTitle", () => {
  it.each([
    ["Test message", ""],
    ["## Test message", "Test message"],
    ["## Test message \n Test message body", "Test message"],
    ["intro line\n#### Deep heading\n# Later heading", "Deep heading"],
    ["##### Too deep", ""],
    ["#NoSpace", ""],
    ["", ""],
  ])("extracts the title from %j", (content, expected) => {
    expect(extractTitle(content)).toBe(expected);
  });

  it("returns the same title on repeated calls", () => {
    const content = "### 2026-10-18\n\nShipped the release";
    expect(extractTitle(content)).toBe(extractTitle(content));
  });
});

describe("bulletsToDiamonds", () => {
  it.each([
    ["Test message", "Test message"],
    ["## Test message", "## Test message"],
    ["- Test message", ":small_blue_diamond: Test message"],
    ["* Test message", ":small_blue_diamond: Test message"],
    ["-tight", ":small_blue_diamond: tight"],
    ["  - Test message", ":small_orange_diamond: Test message"],
    ["\t* Tabbed", ":small_orange_diamond: Tabbed"],
  ])("rewrites %j", (content, expected) => {
    expect(bulletsToDiamonds(content)).toBe(expected);
  });

  it("handles nested lists line by line", () => {
    const content = "- first\n  - child\n- second";
    expect(bulletsToDiamonds(content)).toBe(
      ":small_blue_diamond: first\n:small_orange_diamond: child\n:small_blue_diamond: second"
    );
  });

  it("keeps blank lines in front of indented bullets", () => {
    expect(bulletsToDiamonds("intro\n\n  - nested")).toBe("intro\n\n:small_orange_diamond: nested");
  });
});

describe("headingsToBold", () => {
  it.each([
    ["Test message", "Test message"],
    ["## Test message", "**Test message**"],
    ["### Test message", "**Test message**"],
    ["#### Test message", "**Test message**"],
    ["##### Test message", "##### Test message"],
    ["# Padded title   ", "**Padded title**"],
  ])("rewrites %j", (content, expected) => {
    expect(headingsToBold(content)).toBe(expected);
  });

  it("rewrites every heading in a note", () => {
    expect(headingsToBold("# One\nbody\n## Two")).toBe("**One**\nbody\n**Two**");
  });
});
