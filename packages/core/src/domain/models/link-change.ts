import type { Link } from "./link";

export type LinkChangeType =
  | "added"
  | "edited"
  | "deleted"
  | "favorite-toggled"
  | "read-toggled"
  | "opened"
  | "tags-changed";

export interface LinkChangeEvent {
  type: LinkChangeType;
  linkIds: string[];
  /** Full collection after the change, in collection order. */
  links: readonly Link[];
}

export type LinkObserver = (event: LinkChangeEvent) => void;
