import { execFile } from "node:child_process";
import { promisify } from "node:util";
import type { BrowserOpener } from "../models/collaborators";

const execFileAsync = promisify(execFile);

export type CommandRunner = (command: string, args: string[]) => Promise<void>;

export interface LaunchCommand {
  command: string;
  args: string[];
}

export function resolveLaunchCommand(
  platform: NodeJS.Platform,
  url: string
): LaunchCommand {
  switch (platform) {
    case "darwin":
      return { command: "open", args: [url] };
    case "win32":
      // The empty string is the window title `start` expects before the target.
      return { command: "cmd", args: ["/c", "start", "", url] };
    default:
      return { command: "xdg-open", args: [url] };
  }
}

const defaultCommandRunner: CommandRunner = async (command, args) => {
  await execFileAsync(command, args);
};

export interface SystemBrowserOpenerOptions {
  platform?: NodeJS.Platform;
  runCommand?: CommandRunner;
}

export function createSystemBrowserOpener(
  options: SystemBrowserOpenerOptions = {}
): BrowserOpener {
  const platform = options.platform ?? process.platform;
  const runCommand = options.runCommand ?? defaultCommandRunner;

  return {
    async open(url: string): Promise<void> {
      if (url.trim().length === 0) {
        throw new Error("Cannot open an empty URL");
      }

      const { command, args } = resolveLaunchCommand(platform, url);

      try {
        await runCommand(command, args);
      } catch (error) {
        throw new Error(`Failed to open ${url} with ${command}`, {
          cause: error
        });
      }
    }
  };
}
