/**
 * On-disk shape of a link. The JSON file holds a top-level array of these.
 */
export interface LinkRecord {
  id: string;
  name: string;
  url: string;
  date_added: string;
  date_last_opened: string | null;
  is_favorite: boolean;
  is_read: boolean;
  tags: string[];
}

/**
 * Record shape written by earlier releases, before links carried ids or a
 * separate read flag.
 */
export interface LegacyLinkRecord {
  name: string;
  url: string;
  favorite?: boolean;
  date_added?: string | null;
  last_opened?: string | null;
}
