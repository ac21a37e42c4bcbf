import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { createSystemBrowserOpener, resolveLaunchCommand } from "../browser-opener";

describe("resolveLaunchCommand", () => {
  it("picks the launcher for each platform", () => {
    const url = "https://example.com";

    assert.deepStrictEqual(resolveLaunchCommand("darwin", url), {
      command: "open",
      args: [url]
    });
    assert.deepStrictEqual(resolveLaunchCommand("win32", url), {
      command: "cmd",
      args: ["/c", "start", "", url]
    });
    assert.deepStrictEqual(resolveLaunchCommand("linux", url), {
      command: "xdg-open",
      args: [url]
    });
  });
});

describe("createSystemBrowserOpener", () => {
  it("runs the platform command with the url", async () => {
    const calls: Array<[string, string[]]> = [];
    const opener = createSystemBrowserOpener({
      platform: "linux",
      runCommand: async (command, args) => {
        calls.push([command, args]);
      }
    });

    await opener.open("https://example.com/docs");

    assert.deepStrictEqual(calls, [["xdg-open", ["https://example.com/docs"]]]);
  });

  it("wraps launch failures with the command that failed", async () => {
    const launchError = new Error("spawn open ENOENT");
    const opener = createSystemBrowserOpener({
      platform: "darwin",
      runCommand: async () => {
        throw launchError;
      }
    });

    await assert.rejects(opener.open("https://example.com"), (error: unknown) => {
      assert.ok(error instanceof Error);
      assert.strictEqual(error.message, "Failed to open https://example.com with open");
      assert.strictEqual(error.cause, launchError);
      return true;
    });
  });

  it("refuses an empty url without running anything", async () => {
    let ran = false;
    const opener = createSystemBrowserOpener({
      platform: "linux",
      runCommand: async () => {
        ran = true;
      }
    });

    await assert.rejects(opener.open("  "), /Cannot open an empty URL/);
    assert.strictEqual(ran, false);
  });
});
