export interface LinkStorageSettings {
  /** Absolute path of the JSON file holding the collection. */
  filePath: string;
  /** Appended to `filePath` to name the backup copy. */
  backupSuffix: string;
}

export const LINK_DATA_FILE_ENV = "LINK_ORGANIZER_DATA_FILE";
export const LINK_BACKUP_SUFFIX_ENV = "LINK_ORGANIZER_BACKUP_SUFFIX";

export const DEFAULT_BACKUP_SUFFIX = ".bak";
export const DEFAULT_DATA_DIRECTORY_NAME = ".link-organizer";
export const DEFAULT_DATA_FILE_NAME = "links.json";
