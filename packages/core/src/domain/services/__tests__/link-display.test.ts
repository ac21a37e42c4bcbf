import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { extractLinkDomain, formatLinkTimestamp } from "../link-display";

describe("extractLinkDomain", () => {
  it("returns the host without a leading www", () => {
    assert.strictEqual(extractLinkDomain("https://www.example.com/path"), "example.com");
    assert.strictEqual(extractLinkDomain("https://docs.example.org"), "docs.example.org");
  });

  it("returns an empty string for unparseable urls", () => {
    assert.strictEqual(extractLinkDomain("not a url"), "");
  });
});

describe("formatLinkTimestamp", () => {
  it("formats local timestamps to the minute", () => {
    assert.strictEqual(formatLinkTimestamp("2024-03-05T09:07:00"), "2024-03-05 09:07");
  });

  it("labels links that were never opened", () => {
    assert.strictEqual(formatLinkTimestamp(null), "Never");
  });

  it("labels timestamps it cannot read", () => {
    assert.strictEqual(formatLinkTimestamp("yesterday"), "Invalid");
  });
});
