import { z } from "zod";
import type { Link } from "../models/link";
import type { LegacyLinkRecord, LinkRecord } from "../models/link-record";
import { StorageError } from "../models/link-errors";
import {
  isValidLinkUrl,
  normalizeLinkName,
  normalizeLinkUrl,
  normalizeTags
} from "./link-validation";

const isoTimestampSchema = z
  .string()
  .refine((value) => !Number.isNaN(Date.parse(value)), {
    message: "Expected an ISO-8601 timestamp"
  });

export const linkRecordSchema = z.object({
  id: z.string().min(1),
  name: z.string().refine((value) => value.trim().length > 0, {
    message: "Name cannot be empty"
  }),
  url: z.string().refine(isValidLinkUrl, { message: "Invalid URL" }),
  date_added: isoTimestampSchema,
  date_last_opened: isoTimestampSchema.nullable(),
  is_favorite: z.boolean(),
  is_read: z.boolean(),
  tags: z.array(z.string()).default([])
});

export const legacyLinkRecordSchema = z.object({
  name: z.string(),
  url: z.string(),
  favorite: z.boolean().optional(),
  date_added: isoTimestampSchema.nullable().optional(),
  last_opened: isoTimestampSchema.nullable().optional()
});

const linkFileSchema = z.array(z.unknown());

export function toLinkRecord(link: Link): LinkRecord {
  return {
    id: link.id,
    name: link.name,
    url: link.url,
    date_added: link.dateAdded,
    date_last_opened: link.dateLastOpened,
    is_favorite: link.isFavorite,
    is_read: link.isRead,
    tags: [...link.tags]
  };
}

export function fromLinkRecord(record: LinkRecord): Link {
  return {
    id: record.id,
    name: record.name.trim(),
    url: record.url,
    dateAdded: record.date_added,
    dateLastOpened: record.date_last_opened,
    isFavorite: record.is_favorite,
    isRead: record.is_read,
    // Files edited by hand may carry blank or differently cased tags.
    tags: normalizeTags(record.tags.filter((tag) => tag.trim().length > 0))
  };
}

export interface LegacyMigrationContext {
  generateId: () => string;
  now: Date;
}

export function fromLegacyLinkRecord(
  record: LegacyLinkRecord,
  context: LegacyMigrationContext
): Link {
  const url = normalizeLinkUrl(record.url);
  const lastOpened = record.last_opened ?? null;

  return {
    id: context.generateId(),
    name: normalizeLinkName(record.name, url),
    url,
    dateAdded: record.date_added ?? context.now.toISOString(),
    dateLastOpened: lastOpened,
    isFavorite: record.favorite ?? false,
    isRead: lastOpened !== null,
    tags: []
  };
}

export function serializeLinks(links: readonly Link[]): string {
  return `${JSON.stringify(links.map(toLinkRecord), null, 2)}\n`;
}

export interface ParsedLinkFile {
  links: Link[];
  migratedCount: number;
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.join(".");
      return path.length > 0 ? `${path}: ${issue.message}` : issue.message;
    })
    .join("; ");
}

function hasIdField(value: unknown): boolean {
  return typeof value === "object" && value !== null && "id" in value;
}

export function parseLinkFile(
  raw: string,
  filePath: string,
  context: LegacyMigrationContext
): ParsedLinkFile {
  let data: unknown;

  try {
    data = JSON.parse(raw);
  } catch (error) {
    throw new StorageError(`Link file is not valid JSON: ${filePath}`, {
      filePath,
      cause: error
    });
  }

  const file = linkFileSchema.safeParse(data);

  if (!file.success) {
    throw new StorageError(
      `Link file must contain an array of links: ${filePath}`,
      { filePath, cause: file.error }
    );
  }

  const links: Link[] = [];
  const seenIds = new Set<string>();
  let migratedCount = 0;

  file.data.forEach((item, index) => {
    let link: Link;

    if (hasIdField(item)) {
      const record = linkRecordSchema.safeParse(item);

      if (!record.success) {
        throw new StorageError(
          `Invalid link record at index ${index} in ${filePath}: ${describeIssues(record.error)}`,
          { filePath, cause: record.error }
        );
      }

      link = fromLinkRecord(record.data);
    } else {
      const legacy = legacyLinkRecordSchema.safeParse(item);

      if (!legacy.success) {
        throw new StorageError(
          `Invalid link record at index ${index} in ${filePath}: ${describeIssues(legacy.error)}`,
          { filePath, cause: legacy.error }
        );
      }

      try {
        link = fromLegacyLinkRecord(legacy.data, context);
      } catch (error) {
        throw new StorageError(
          `Invalid link record at index ${index} in ${filePath}: ${String(error)}`,
          { filePath, cause: error }
        );
      }

      migratedCount += 1;
    }

    if (seenIds.has(link.id)) {
      throw new StorageError(
        `Duplicate link id "${link.id}" in ${filePath}`,
        { filePath }
      );
    }

    seenIds.add(link.id);
    links.push(link);
  });

  return { links, migratedCount };
}
