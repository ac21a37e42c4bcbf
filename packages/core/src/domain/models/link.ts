export interface Link {
  id: string;
  name: string;
  url: string;
  dateAdded: string;
  dateLastOpened: string | null;
  isFavorite: boolean;
  isRead: boolean;
  tags: string[];
}

export type LinkSortField =
  | "name"
  | "url"
  | "dateAdded"
  | "dateLastOpened"
  | "isFavorite"
  | "tags";

export interface LinkSort {
  field: LinkSortField;
  ascending: boolean;
}

/**
 * Fields a caller may change on an existing link. `id` and `dateAdded` are
 * fixed at creation.
 */
export interface LinkChanges {
  name?: string;
  url?: string;
  isFavorite?: boolean;
  isRead?: boolean;
  tags?: string[];
}

export interface LinkStats {
  total: number;
  favorites: number;
  unread: number;
}
