import { nanoid } from "nanoid";
import type {
  Link,
  LinkChanges,
  LinkSort,
  LinkSortField,
  LinkStats
} from "../models/link";
import type {
  LinkChangeEvent,
  LinkChangeType,
  LinkObserver
} from "../models/link-change";
import type {
  BrowserOpener,
  Clock,
  IdGenerator,
  RandomSource
} from "../models/collaborators";
import { NotFoundError, ValidationError } from "../models/link-errors";
import type { LinkRepository } from "./link-repository";
import { replaceLink } from "./link-repository";
import { parseLinkLines, type LinkBatchEntry } from "./link-import";
import {
  applyLinkSort,
  computeLinkStats,
  countTagUsage,
  filterLinksByTags,
  listTags,
  pickRandomLink,
  searchLinks,
  sortLinks
} from "./link-query";
import {
  applyLinkChanges,
  cloneLink,
  createLink,
  markLinkOpened,
  normalizeLinkUrl,
  normalizeTag,
  toggleLinkFavorite,
  toggleLinkRead
} from "./link-validation";

export interface LinkServiceDependencies {
  repository: LinkRepository;
  browser: BrowserOpener;
  clock?: Clock;
  generateId?: IdGenerator;
  random?: RandomSource;
}

export interface AddLinksFailure {
  index: number;
  entry: LinkBatchEntry;
  error: ValidationError;
}

export interface AddLinksResult {
  added: Link[];
  failed: AddLinksFailure[];
}

export interface LinkBatchResult {
  updatedIds: string[];
  missingIds: string[];
}

export interface DeleteLinksResult {
  deletedCount: number;
  deletedIds: string[];
  missingIds: string[];
}

export interface OpenLinkFailure {
  id: string;
  error: unknown;
}

export interface OpenLinksResult {
  openedIds: string[];
  failed: OpenLinkFailure[];
  missingIds: string[];
}

interface PartitionedIds {
  found: Link[];
  missingIds: string[];
}

function validateEntryUrl(entry: LinkBatchEntry): string | ValidationError {
  try {
    return normalizeLinkUrl(entry.url);
  } catch (error) {
    if (error instanceof ValidationError) {
      return error;
    }

    throw error;
  }
}

/**
 * Owns the in-memory link collection for a session. Every mutation runs on a
 * single queue: the next collection is computed, handed to the repository,
 * and only swapped in (and announced to observers) once the save succeeds.
 * A failed save leaves the collection as it was.
 */
export class LinkService {
  private links: Link[];
  private readonly observers = new Set<LinkObserver>();
  private queue: Promise<void> = Promise.resolve();
  private readonly repository: LinkRepository;
  private readonly browser: BrowserOpener;
  private readonly clock: Clock;
  private readonly generateId: IdGenerator;
  private readonly random: RandomSource;

  constructor(
    dependencies: LinkServiceDependencies,
    initialLinks: readonly Link[] = []
  ) {
    this.repository = dependencies.repository;
    this.browser = dependencies.browser;
    this.clock = dependencies.clock ?? (() => new Date());
    this.generateId = dependencies.generateId ?? (() => nanoid());
    this.random = dependencies.random ?? Math.random;
    this.links = initialLinks.map(cloneLink);
  }

  public subscribe(observer: LinkObserver): () => void {
    this.observers.add(observer);
    return () => this.unsubscribe(observer);
  }

  public unsubscribe(observer: LinkObserver): void {
    this.observers.delete(observer);
  }

  public getLinks(): Link[] {
    return this.links.map(cloneLink);
  }

  public getLink(id: string): Link | null {
    const link = this.findLink(id);
    return link ? cloneLink(link) : null;
  }

  public reload(): Promise<Link[]> {
    return this.enqueue(async () => {
      this.links = await this.repository.load();
      return this.getLinks();
    });
  }

  public addLink(name: string | undefined, url: string): Promise<Link> {
    return this.enqueue(async () => {
      const link = createLink({
        id: this.nextId(this.takenIds()),
        name,
        url,
        now: this.clock()
      });

      await this.commit([...this.links, link], "added", [link.id]);
      return cloneLink(link);
    });
  }

  /**
   * Adds every valid entry in one save. Invalid entries are reported in
   * `failed` and do not stop the rest; a storage failure rejects the whole
   * batch.
   */
  public addLinks(entries: readonly LinkBatchEntry[]): Promise<AddLinksResult> {
    return this.enqueue(async () => {
      const taken = this.takenIds();
      const now = this.clock();
      const added: Link[] = [];
      const failed: AddLinksFailure[] = [];

      entries.forEach((entry, index) => {
        const url = validateEntryUrl(entry);

        if (url instanceof ValidationError) {
          failed.push({ index, entry, error: url });
          return;
        }

        const link = createLink({
          id: this.nextId(taken),
          name: entry.name,
          url,
          now
        });
        taken.add(link.id);
        added.push(link);
      });

      if (added.length > 0) {
        await this.commit(
          [...this.links, ...added],
          "added",
          added.map((link) => link.id)
        );
      }

      return { added: added.map(cloneLink), failed };
    });
  }

  public addLinksFromText(text: string): Promise<AddLinksResult> {
    return this.addLinks(parseLinkLines(text));
  }

  public editLink(id: string, changes: LinkChanges): Promise<Link> {
    return this.enqueue(async () => {
      const current = this.findLink(id);

      if (!current) {
        throw new NotFoundError(id);
      }

      const updated = applyLinkChanges(current, changes);
      await this.commit(replaceLink(this.links, updated), "edited", [id]);
      return cloneLink(updated);
    });
  }

  public deleteLinks(ids: readonly string[]): Promise<DeleteLinksResult> {
    return this.enqueue(async () => {
      const { found, missingIds } = this.partition(ids);
      const deletedIds = found.map((link) => link.id);

      if (deletedIds.length > 0) {
        const doomed = new Set(deletedIds);
        await this.commit(
          this.links.filter((link) => !doomed.has(link.id)),
          "deleted",
          deletedIds
        );
      }

      return { deletedCount: deletedIds.length, deletedIds, missingIds };
    });
  }

  public toggleFavorite(ids: readonly string[]): Promise<LinkBatchResult> {
    return this.updateEach(ids, "favorite-toggled", toggleLinkFavorite);
  }

  public toggleRead(ids: readonly string[]): Promise<LinkBatchResult> {
    return this.updateEach(ids, "read-toggled", toggleLinkRead);
  }

  public async addTag(ids: readonly string[], tag: string): Promise<LinkBatchResult> {
    const normalized = normalizeTag(tag);

    return this.updateEach(ids, "tags-changed", (link) =>
      link.tags.includes(normalized)
        ? link
        : { ...link, tags: [...link.tags, normalized] }
    );
  }

  public async removeTag(
    ids: readonly string[],
    tag: string
  ): Promise<LinkBatchResult> {
    const normalized = normalizeTag(tag);

    return this.updateEach(ids, "tags-changed", (link) => ({
      ...link,
      tags: link.tags.filter((candidate) => candidate !== normalized)
    }));
  }

  public clearTags(ids: readonly string[]): Promise<LinkBatchResult> {
    return this.updateEach(ids, "tags-changed", (link) => ({ ...link, tags: [] }));
  }

  /**
   * Opens each link through the browser collaborator. A failed launch is
   * reported and skipped; only links that actually opened get a new
   * `dateLastOpened`.
   */
  public openLinks(ids: readonly string[]): Promise<OpenLinksResult> {
    return this.enqueue(() => {
      const { found, missingIds } = this.partition(ids);
      return this.openAll(found, missingIds);
    });
  }

  /** Picks and opens in one queued step, so the pick sees pending deletes. */
  public openRandomLink(
    unreadOnly: boolean = false
  ): Promise<OpenLinksResult | null> {
    return this.enqueue(async () => {
      const link = pickRandomLink(this.links, unreadOnly, this.random);
      return link ? this.openAll([link], []) : null;
    });
  }

  public search(query: string, sort?: LinkSort): Link[] {
    return applyLinkSort(searchLinks(this.links, query), sort).map(cloneLink);
  }

  public sort(field: LinkSortField, ascending: boolean = true): Link[] {
    return sortLinks(this.links, field, ascending).map(cloneLink);
  }

  public randomLink(unreadOnly: boolean = false): Link | null {
    const link = pickRandomLink(this.links, unreadOnly, this.random);
    return link ? cloneLink(link) : null;
  }

  public filterByTags(tags: readonly string[], matchAll: boolean = true): Link[] {
    return filterLinksByTags(this.links, tags, matchAll).map(cloneLink);
  }

  public listTags(): string[] {
    return listTags(this.links);
  }

  public countTagUsage(): Map<string, number> {
    return countTagUsage(this.links);
  }

  public getStats(): LinkStats {
    return computeLinkStats(this.links);
  }

  private async openAll(
    links: readonly Link[],
    missingIds: string[]
  ): Promise<OpenLinksResult> {
    const openedIds: string[] = [];
    const failed: OpenLinkFailure[] = [];

    for (const link of links) {
      try {
        await this.browser.open(link.url);
        openedIds.push(link.id);
      } catch (error) {
        console.error(`Failed to open link ${link.id}`, error);
        failed.push({ id: link.id, error });
      }
    }

    if (openedIds.length > 0) {
      const opened = new Set(openedIds);
      const now = this.clock();
      await this.commit(
        this.links.map((link) =>
          opened.has(link.id) ? markLinkOpened(link, now) : link
        ),
        "opened",
        openedIds
      );
    }

    return { openedIds, failed, missingIds };
  }

  private findLink(id: string): Link | undefined {
    return this.links.find((link) => link.id === id);
  }

  private enqueue<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task);
    // The caller sees the failure through `run`; the queue only needs to
    // keep going.
    this.queue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  private updateEach(
    ids: readonly string[],
    type: LinkChangeType,
    transform: (link: Link) => Link
  ): Promise<LinkBatchResult> {
    return this.enqueue(async () => {
      const { found, missingIds } = this.partition(ids);
      const updatedIds = found.map((link) => link.id);

      if (updatedIds.length > 0) {
        const targets = new Set(updatedIds);
        await this.commit(
          this.links.map((link) => (targets.has(link.id) ? transform(link) : link)),
          type,
          updatedIds
        );
      }

      return { updatedIds, missingIds };
    });
  }

  private async commit(
    next: Link[],
    type: LinkChangeType,
    linkIds: string[]
  ): Promise<void> {
    await this.repository.save(next);
    this.links = next;
    this.notify({ type, linkIds, links: this.getLinks() });
  }

  private notify(event: LinkChangeEvent): void {
    for (const observer of [...this.observers]) {
      try {
        observer(event);
      } catch (error) {
        console.error("Link observer failed", error);
      }
    }
  }

  private partition(ids: readonly string[]): PartitionedIds {
    const byId = new Map(this.links.map((link) => [link.id, link]));
    const found: Link[] = [];
    const missingIds: string[] = [];

    for (const id of new Set(ids)) {
      const link = byId.get(id);

      if (link) {
        found.push(link);
      } else {
        missingIds.push(id);
      }
    }

    return { found, missingIds };
  }

  private takenIds(): Set<string> {
    return new Set(this.links.map((link) => link.id));
  }

  private nextId(taken: ReadonlySet<string>): string {
    let id = this.generateId();

    while (taken.has(id)) {
      id = this.generateId();
    }

    return id;
  }
}

export async function openLinkService(
  dependencies: LinkServiceDependencies
): Promise<LinkService> {
  const links = await dependencies.repository.load();
  return new LinkService(dependencies, links);
}
