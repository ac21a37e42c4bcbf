import { homedir } from "node:os";
import { join } from "node:path";
import {
  DEFAULT_BACKUP_SUFFIX,
  DEFAULT_DATA_DIRECTORY_NAME,
  DEFAULT_DATA_FILE_NAME,
  LINK_BACKUP_SUFFIX_ENV,
  LINK_DATA_FILE_ENV,
  type LinkStorageSettings
} from "../models/link-settings";

export function defaultLinkStorageSettings(
  homeDirectory: string = homedir()
): LinkStorageSettings {
  return {
    filePath: join(homeDirectory, DEFAULT_DATA_DIRECTORY_NAME, DEFAULT_DATA_FILE_NAME),
    backupSuffix: DEFAULT_BACKUP_SUFFIX
  };
}

function normalizeSetting(value: unknown): string | undefined {
  if (typeof value !== "string") {
    return undefined;
  }

  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

export function resolveLinkStorageSettings(
  env: Record<string, string | undefined> = process.env,
  homeDirectory: string = homedir()
): LinkStorageSettings {
  const defaults = defaultLinkStorageSettings(homeDirectory);

  return {
    filePath: normalizeSetting(env[LINK_DATA_FILE_ENV]) ?? defaults.filePath,
    backupSuffix:
      normalizeSetting(env[LINK_BACKUP_SUFFIX_ENV]) ?? defaults.backupSuffix
  };
}

export function backupPathFor(settings: LinkStorageSettings): string {
  return `${settings.filePath}${settings.backupSuffix}`;
}
