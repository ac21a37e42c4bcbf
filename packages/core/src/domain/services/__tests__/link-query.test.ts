import { describe, it } from "node:test";
import assert from "node:assert/strict";

import type { Link } from "../../models/link";
import {
  computeLinkStats,
  countTagUsage,
  filterLinksByTags,
  listTags,
  pickRandomLink,
  searchLinks,
  sortLinks
} from "../link-query";
import { makeLink } from "./helpers/fixtures";

function ids(links: Link[]): string[] {
  return links.map((link) => link.id);
}

const library: Link[] = [
  makeLink({
    id: "c",
    name: "TypeScript Tutorial",
    url: "https://ts.example/tutorial",
    dateAdded: "2024-01-03T00:00:00.000Z",
    dateLastOpened: "2024-02-01T00:00:00.000Z",
    isRead: true,
    tags: ["typescript", "docs"]
  }),
  makeLink({
    id: "a",
    name: "javascript guide",
    url: "https://js.example",
    dateAdded: "2024-01-01T00:00:00.000Z",
    isFavorite: true,
    tags: ["docs"]
  }),
  makeLink({
    id: "b",
    name: "Advanced",
    url: "https://advanced-TYPESCRIPT.example",
    dateAdded: "2024-01-02T00:00:00.000Z",
    dateLastOpened: "2024-03-01T00:00:00.000Z"
  }),
  makeLink({
    id: "d",
    name: "JavaScript Guide",
    url: "https://js.example/v2",
    dateAdded: "2024-01-02T00:00:00.000Z",
    tags: ["reference"]
  })
];

describe("searchLinks", () => {
  it("returns the whole collection in order for a blank query", () => {
    assert.deepStrictEqual(ids(searchLinks(library, "")), ["c", "a", "b", "d"]);
    assert.deepStrictEqual(ids(searchLinks(library, "   ")), ["c", "a", "b", "d"]);
  });

  it("matches names and urls case-insensitively", () => {
    assert.deepStrictEqual(ids(searchLinks(library, "typescript")), ["c", "b"]);
    assert.deepStrictEqual(ids(searchLinks(library, " GUIDE ")), ["a", "d"]);
  });

  it("matches tags", () => {
    assert.deepStrictEqual(ids(searchLinks(library, "refer")), ["d"]);
  });

  it("returns nothing when no link matches", () => {
    assert.deepStrictEqual(searchLinks(library, "rust"), []);
  });
});

describe("sortLinks", () => {
  it("sorts names case-insensitively and breaks ties by id", () => {
    assert.deepStrictEqual(ids(sortLinks(library, "name")), ["b", "a", "d", "c"]);
    assert.deepStrictEqual(ids(sortLinks(library, "name", false)), ["c", "a", "d", "b"]);
  });

  it("sorts by url", () => {
    assert.deepStrictEqual(ids(sortLinks(library, "url")), ["b", "a", "d", "c"]);
  });

  it("sorts by date added with ties by id in both directions", () => {
    assert.deepStrictEqual(ids(sortLinks(library, "dateAdded")), ["a", "b", "d", "c"]);
    assert.deepStrictEqual(ids(sortLinks(library, "dateAdded", false)), ["c", "b", "d", "a"]);
  });

  it("keeps never-opened links last regardless of direction", () => {
    assert.deepStrictEqual(ids(sortLinks(library, "dateLastOpened")), ["c", "b", "a", "d"]);
    assert.deepStrictEqual(
      ids(sortLinks(library, "dateLastOpened", false)),
      ["b", "c", "a", "d"]
    );
  });

  it("sorts favorites", () => {
    assert.deepStrictEqual(ids(sortLinks(library, "isFavorite", false)), ["a", "b", "c", "d"]);
  });

  it("sorts by the joined tag list with untagged links first", () => {
    assert.deepStrictEqual(ids(sortLinks(library, "tags")), ["b", "a", "c", "d"]);
    assert.deepStrictEqual(ids(sortLinks(library, "tags", false)), ["d", "c", "a", "b"]);
  });

  it("does not reorder the input", () => {
    sortLinks(library, "name");
    assert.deepStrictEqual(ids(library), ["c", "a", "b", "d"]);
  });
});

describe("tag queries", () => {
  it("filters by all or any of the given tags", () => {
    assert.deepStrictEqual(ids(filterLinksByTags(library, ["docs", "typescript"])), ["c"]);
    assert.deepStrictEqual(
      ids(filterLinksByTags(library, ["TypeScript", "reference"], false)),
      ["c", "d"]
    );
    assert.deepStrictEqual(ids(filterLinksByTags(library, [])), ["c", "a", "b", "d"]);
  });

  it("lists unique tags alphabetically", () => {
    assert.deepStrictEqual(listTags(library), ["docs", "reference", "typescript"]);
  });

  it("counts how many links use each tag", () => {
    assert.deepStrictEqual(
      [...countTagUsage(library).entries()],
      [
        ["typescript", 1],
        ["docs", 2],
        ["reference", 1]
      ]
    );
  });
});

describe("pickRandomLink", () => {
  it("maps the random value onto the eligible links", () => {
    assert.strictEqual(pickRandomLink(library, false, () => 0)?.id, "c");
    assert.strictEqual(pickRandomLink(library, false, () => 0.99)?.id, "d");
  });

  it("only considers unread links when asked", () => {
    assert.strictEqual(pickRandomLink(library, true, () => 0)?.id, "a");
  });

  it("returns null when nothing is eligible", () => {
    assert.strictEqual(pickRandomLink([], false, () => 0.5), null);
    assert.strictEqual(
      pickRandomLink([makeLink({ id: "x", isRead: true })], true, () => 0.5),
      null
    );
  });
});

describe("computeLinkStats", () => {
  it("counts totals, favorites and unread links", () => {
    assert.deepStrictEqual(computeLinkStats(library), { total: 4, favorites: 1, unread: 3 });
  });
});
