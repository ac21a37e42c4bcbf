import type { Link, LinkChanges } from "../models/link";
import { ValidationError } from "../models/link-errors";

const SCHEME_PATTERN = /^[a-z][a-z0-9+.-]*:\/\//i;
const DEFAULT_SCHEME = "https://";

function parseUrl(value: string): URL | null {
  try {
    return new URL(value);
  } catch {
    return null;
  }
}

export function normalizeLinkUrl(raw: string): string {
  const trimmed = raw.trim();

  if (trimmed.length === 0) {
    throw new ValidationError("URL is required", "url");
  }

  const candidate = SCHEME_PATTERN.test(trimmed)
    ? trimmed
    : `${DEFAULT_SCHEME}${trimmed}`;
  const parsed = parseUrl(candidate);

  if (!parsed || parsed.hostname.length === 0) {
    throw new ValidationError(`Invalid URL: ${trimmed}`, "url");
  }

  return candidate;
}

export function isValidLinkUrl(value: string): boolean {
  try {
    return normalizeLinkUrl(value) === value;
  } catch {
    return false;
  }
}

export function deriveLinkName(url: string): string {
  const parsed = parseUrl(url);

  if (!parsed) {
    return url;
  }

  const path = parsed.pathname === "/" ? "" : parsed.pathname;
  return `${parsed.host}${path}`;
}

export function normalizeLinkName(name: string | undefined, url: string): string {
  const trimmed = name?.trim() ?? "";
  return trimmed.length > 0 ? trimmed : deriveLinkName(url);
}

function foldTag(tag: string): string {
  return tag.trim().replace(/\s+/g, " ").toLowerCase();
}

export function normalizeTag(tag: string): string {
  const normalized = foldTag(tag);

  if (normalized.length === 0) {
    throw new ValidationError("Tag cannot be empty", "tag");
  }

  return normalized;
}

export function normalizeTags(tags: readonly string[]): string[] {
  return [...new Set(tags.map(normalizeTag))];
}

export interface NewLinkInput {
  id: string;
  url: string;
  name?: string;
  tags?: readonly string[];
  now: Date;
}

export function createLink(input: NewLinkInput): Link {
  const url = normalizeLinkUrl(input.url);

  return {
    id: input.id,
    name: normalizeLinkName(input.name, url),
    url,
    dateAdded: input.now.toISOString(),
    dateLastOpened: null,
    isFavorite: false,
    isRead: false,
    tags: normalizeTags(input.tags ?? [])
  };
}

export function applyLinkChanges(link: Link, changes: LinkChanges): Link {
  const url = changes.url === undefined ? link.url : normalizeLinkUrl(changes.url);
  let name = link.name;

  if (changes.name !== undefined) {
    name = changes.name.trim();

    if (name.length === 0) {
      throw new ValidationError("Name cannot be empty", "name");
    }
  }

  return {
    ...link,
    name,
    url,
    isFavorite: changes.isFavorite ?? link.isFavorite,
    isRead: changes.isRead ?? link.isRead,
    tags: changes.tags === undefined ? [...link.tags] : normalizeTags(changes.tags)
  };
}

export function cloneLink(link: Link): Link {
  return { ...link, tags: [...link.tags] };
}

export function markLinkOpened(link: Link, now: Date): Link {
  return { ...link, dateLastOpened: now.toISOString(), isRead: true };
}

export function toggleLinkFavorite(link: Link): Link {
  return { ...link, isFavorite: !link.isFavorite };
}

export function toggleLinkRead(link: Link): Link {
  return { ...link, isRead: !link.isRead };
}

export function linkHasTag(link: Link, tag: string): boolean {
  const folded = foldTag(tag);
  return link.tags.some((candidate) => candidate === folded);
}

export function isSameLink(a: Pick<Link, "id">, b: Pick<Link, "id">): boolean {
  return a.id === b.id;
}
