import type { Link } from "../../../models/link";
import type {
  BrowserOpener,
  Clock,
  IdGenerator
} from "../../../models/collaborators";

export const FIXED_NOW = "2024-06-01T12:00:00.000Z";

export function fixedClock(iso: string = FIXED_NOW): Clock {
  return () => new Date(iso);
}

export function sequentialIds(prefix: string = "link"): IdGenerator {
  let counter = 0;
  return () => {
    counter += 1;
    return `${prefix}-${counter}`;
  };
}

export function makeLink(overrides: Partial<Link> & Pick<Link, "id">): Link {
  return {
    name: `Link ${overrides.id}`,
    url: `https://${overrides.id}.example`,
    dateAdded: "2024-01-01T00:00:00.000Z",
    dateLastOpened: null,
    isFavorite: false,
    isRead: false,
    tags: [],
    ...overrides
  };
}

export interface RecordingBrowser extends BrowserOpener {
  opened: string[];
  failingUrls: Set<string>;
}

export function recordingBrowser(): RecordingBrowser {
  const opened: string[] = [];
  const failingUrls = new Set<string>();

  return {
    opened,
    failingUrls,
    async open(url: string): Promise<void> {
      if (failingUrls.has(url)) {
        throw new Error(`launch failed for ${url}`);
      }

      opened.push(url);
    }
  };
}
