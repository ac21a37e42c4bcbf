import {
  copyFile,
  mkdir,
  readFile,
  rename,
  rm,
  writeFile
} from "node:fs/promises";
import { dirname } from "node:path";
import { nanoid } from "nanoid";
import type { Link } from "../models/link";
import type { Clock, IdGenerator } from "../models/collaborators";
import type { LinkStorageSettings } from "../models/link-settings";
import {
  NotFoundError,
  StorageError,
  ValidationError
} from "../models/link-errors";
import {
  parseLinkFile,
  serializeLinks,
  type ParsedLinkFile
} from "./link-schema";
import { backupPathFor } from "./link-settings";
import { cloneLink } from "./link-validation";

export interface LinkRepository {
  load(): Promise<Link[]>;
  save(links: readonly Link[]): Promise<void>;
  add(link: Link): Promise<void>;
  update(link: Link): Promise<void>;
  remove(id: string): Promise<void>;
}

/**
 * The file operations the JSON repository needs. Swapped for an in-memory
 * implementation in tests.
 */
export interface LinkFileSystem {
  readFile(path: string): Promise<string>;
  writeFile(path: string, data: string): Promise<void>;
  rename(from: string, to: string): Promise<void>;
  copyFile(from: string, to: string): Promise<void>;
  mkdir(path: string): Promise<void>;
  remove(path: string): Promise<void>;
}

export const nodeLinkFileSystem: LinkFileSystem = {
  readFile: (path) => readFile(path, "utf8"),
  writeFile: (path, data) => writeFile(path, data, "utf8"),
  rename: (from, to) => rename(from, to),
  copyFile: (from, to) => copyFile(from, to),
  async mkdir(path) {
    await mkdir(path, { recursive: true });
  },
  remove: (path) => rm(path, { force: true })
};

export function isMissingFileError(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    error.code === "ENOENT"
  );
}

export function insertLink(links: readonly Link[], link: Link): Link[] {
  if (links.some((existing) => existing.id === link.id)) {
    throw new ValidationError(`Duplicate link id: ${link.id}`, "id");
  }

  return [...links, link];
}

export function replaceLink(links: readonly Link[], link: Link): Link[] {
  const index = links.findIndex((existing) => existing.id === link.id);

  if (index === -1) {
    throw new NotFoundError(link.id);
  }

  const next = [...links];
  next[index] = link;
  return next;
}

export function withoutLink(links: readonly Link[], id: string): Link[] {
  if (!links.some((existing) => existing.id === id)) {
    throw new NotFoundError(id);
  }

  return links.filter((existing) => existing.id !== id);
}

export interface JsonFileLinkRepositoryOptions {
  settings: LinkStorageSettings;
  fileSystem?: LinkFileSystem;
  /** Assigns ids to legacy records that were stored without one. */
  generateId?: IdGenerator;
  clock?: Clock;
}

export class JsonFileLinkRepository implements LinkRepository {
  private links: Link[] = [];
  private loaded = false;
  private readonly filePath: string;
  private readonly backupPath: string;
  private readonly fileSystem: LinkFileSystem;
  private readonly generateId: IdGenerator;
  private readonly clock: Clock;

  constructor(options: JsonFileLinkRepositoryOptions) {
    this.filePath = options.settings.filePath;
    this.backupPath = backupPathFor(options.settings);
    this.fileSystem = options.fileSystem ?? nodeLinkFileSystem;
    this.generateId = options.generateId ?? (() => nanoid());
    this.clock = options.clock ?? (() => new Date());
  }

  public async load(): Promise<Link[]> {
    const raw = await this.readIfPresent(this.filePath);

    if (raw === null) {
      this.links = [];
      this.loaded = true;
      return [];
    }

    const { links, migratedCount } = this.parse(raw, this.filePath);

    if (migratedCount > 0) {
      // Persist the ids handed to legacy records so later loads agree on them.
      await this.writeAtomically(serializeLinks(links), { backup: true });
    }

    this.links = links;
    this.loaded = true;
    return this.links.map(cloneLink);
  }

  public async save(links: readonly Link[]): Promise<void> {
    await this.writeAtomically(serializeLinks(links), { backup: true });
    this.links = links.map(cloneLink);
    this.loaded = true;
  }

  public async add(link: Link): Promise<void> {
    await this.save(insertLink(await this.current(), link));
  }

  public async update(link: Link): Promise<void> {
    await this.save(replaceLink(await this.current(), link));
  }

  public async remove(id: string): Promise<void> {
    await this.save(withoutLink(await this.current(), id));
  }

  /**
   * Replaces the link file with the contents of its backup and returns the
   * restored links. The backup itself is left in place.
   */
  public async restoreBackup(): Promise<Link[]> {
    const raw = await this.readIfPresent(this.backupPath);

    if (raw === null) {
      throw new StorageError(`No backup found at ${this.backupPath}`, {
        filePath: this.backupPath
      });
    }

    const { links } = this.parse(raw, this.backupPath);
    await this.writeAtomically(serializeLinks(links), { backup: false });
    this.links = links;
    this.loaded = true;
    return links.map(cloneLink);
  }

  // Mutators start from the stored collection, never from an empty cache.
  private async current(): Promise<Link[]> {
    if (!this.loaded) {
      await this.load();
    }

    return this.links;
  }

  private parse(raw: string, path: string): ParsedLinkFile {
    const parsed = parseLinkFile(raw, path, {
      generateId: this.generateId,
      now: this.clock()
    });

    if (parsed.migratedCount > 0) {
      console.warn(
        `Migrated ${parsed.migratedCount} legacy link record(s) from ${path}`
      );
    }

    return parsed;
  }

  private async readIfPresent(path: string): Promise<string | null> {
    try {
      return await this.fileSystem.readFile(path);
    } catch (error) {
      if (isMissingFileError(error)) {
        return null;
      }

      throw new StorageError(`Failed to read link file: ${path}`, {
        filePath: path,
        cause: error
      });
    }
  }

  // The target is only ever replaced by a rename of a fully written file.
  private async writeAtomically(
    contents: string,
    options: { backup: boolean }
  ): Promise<void> {
    const temporaryPath = `${this.filePath}.tmp-${nanoid(8)}`;

    try {
      await this.fileSystem.mkdir(dirname(this.filePath));
      await this.fileSystem.writeFile(temporaryPath, contents);

      if (options.backup) {
        await this.backupExistingFile();
      }

      await this.fileSystem.rename(temporaryPath, this.filePath);
    } catch (error) {
      await this.discardTemporaryFile(temporaryPath);
      throw new StorageError(`Failed to save links to ${this.filePath}`, {
        filePath: this.filePath,
        cause: error
      });
    }
  }

  private async backupExistingFile(): Promise<void> {
    try {
      await this.fileSystem.copyFile(this.filePath, this.backupPath);
    } catch (error) {
      if (!isMissingFileError(error)) {
        throw error;
      }
    }
  }

  private async discardTemporaryFile(path: string): Promise<void> {
    try {
      await this.fileSystem.remove(path);
    } catch (error) {
      console.error("Failed to remove temporary link file", error);
    }
  }
}

export class InMemoryLinkRepository implements LinkRepository {
  private links: Link[];

  constructor(initial: readonly Link[] = []) {
    this.links = initial.map(cloneLink);
  }

  public async load(): Promise<Link[]> {
    return this.links.map(cloneLink);
  }

  public async save(links: readonly Link[]): Promise<void> {
    this.links = links.map(cloneLink);
  }

  public async add(link: Link): Promise<void> {
    await this.save(insertLink(this.links, link));
  }

  public async update(link: Link): Promise<void> {
    await this.save(replaceLink(this.links, link));
  }

  public async remove(id: string): Promise<void> {
    await this.save(withoutLink(this.links, id));
  }
}

export function createJsonLinkRepository(
  settings: LinkStorageSettings,
  options: Omit<JsonFileLinkRepositoryOptions, "settings"> = {}
): JsonFileLinkRepository {
  return new JsonFileLinkRepository({ ...options, settings });
}
