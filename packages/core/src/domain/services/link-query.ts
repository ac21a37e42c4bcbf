import type { Link, LinkSort, LinkSortField, LinkStats } from "../models/link";
import type { RandomSource } from "../models/collaborators";
import { linkHasTag } from "./link-validation";

export function searchLinks(links: readonly Link[], query: string): Link[] {
  const normalizedQuery = query.trim().toLowerCase();

  if (normalizedQuery.length === 0) {
    return [...links];
  }

  return links.filter((link) => {
    return (
      link.name.toLowerCase().includes(normalizedQuery) ||
      link.url.toLowerCase().includes(normalizedQuery) ||
      link.tags.some((tag) => tag.includes(normalizedQuery))
    );
  });
}

function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

function timestampOf(value: string | null): number | null {
  if (value === null) {
    return null;
  }

  const parsed = Date.parse(value);
  return Number.isNaN(parsed) ? null : parsed;
}

type SortKey = string | number | null;

function sortKeyOf(link: Link, field: LinkSortField): SortKey {
  switch (field) {
    case "name":
      return link.name.toLowerCase();
    case "url":
      return link.url.toLowerCase();
    case "dateAdded":
      return timestampOf(link.dateAdded);
    case "dateLastOpened":
      return timestampOf(link.dateLastOpened);
    case "isFavorite":
      return link.isFavorite ? 1 : 0;
    case "tags":
      return [...link.tags].sort(compareText).join(", ");
  }
}

function compareKeys(a: SortKey, b: SortKey): number {
  if (typeof a === "number" && typeof b === "number") {
    return a - b;
  }

  return compareText(String(a), String(b));
}

/**
 * Orders a copy of `links` by `field`. Links without a value for the field
 * (never opened, say) go last in either direction, and equal keys fall back
 * to ascending id.
 */
export function sortLinks(
  links: readonly Link[],
  field: LinkSortField,
  ascending: boolean = true
): Link[] {
  const direction = ascending ? 1 : -1;

  return [...links].sort((left, right) => {
    const leftKey = sortKeyOf(left, field);
    const rightKey = sortKeyOf(right, field);

    if (leftKey === null || rightKey === null) {
      if (leftKey !== rightKey) {
        return leftKey === null ? 1 : -1;
      }
    } else {
      const byKey = compareKeys(leftKey, rightKey);
      if (byKey !== 0) {
        return byKey * direction;
      }
    }

    return compareText(left.id, right.id);
  });
}

export function applyLinkSort(links: readonly Link[], sort?: LinkSort): Link[] {
  return sort ? sortLinks(links, sort.field, sort.ascending) : [...links];
}

export function filterLinksByTags(
  links: readonly Link[],
  tags: readonly string[],
  matchAll: boolean = true
): Link[] {
  if (tags.length === 0) {
    return [...links];
  }

  return links.filter((link) =>
    matchAll
      ? tags.every((tag) => linkHasTag(link, tag))
      : tags.some((tag) => linkHasTag(link, tag))
  );
}

export function listTags(links: readonly Link[]): string[] {
  const tags = new Set<string>();

  for (const link of links) {
    link.tags.forEach((tag) => tags.add(tag));
  }

  return [...tags].sort(compareText);
}

export function countTagUsage(links: readonly Link[]): Map<string, number> {
  const counts = new Map<string, number>();

  for (const link of links) {
    for (const tag of link.tags) {
      counts.set(tag, (counts.get(tag) ?? 0) + 1);
    }
  }

  return counts;
}

export function pickRandomLink(
  links: readonly Link[],
  unreadOnly: boolean,
  random: RandomSource
): Link | null {
  const eligible = unreadOnly ? links.filter((link) => !link.isRead) : links;

  if (eligible.length === 0) {
    return null;
  }

  const index = Math.min(
    Math.floor(random() * eligible.length),
    eligible.length - 1
  );
  return eligible[index];
}

export function computeLinkStats(links: readonly Link[]): LinkStats {
  return {
    total: links.length,
    favorites: links.filter((link) => link.isFavorite).length,
    unread: links.filter((link) => !link.isRead).length
  };
}
