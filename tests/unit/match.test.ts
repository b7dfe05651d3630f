import { describe, it, expect } from "vitest";
import {
  buildTitleIndex,
  getAliasesList,
  getAllTitlePatterns,
  matchList,
  matchTorrent,
  mergeAlias,
} from "../../src/database/match.js";
import {
  createMemoryBangumiStore,
  makeBangumi,
} from "../helpers/memoryStore.js";

const ANI_TITLE =
  "[ANi] 29 岁单身中坚冒险家的日常 - 07 [1080P][Baha][WEB-DL][AAC AVC][CHT][MP4]";

describe("getAliasesList", () => {
  it("drops null entries", () => {
    expect(getAliasesList({ title_aliases: "[null]" })).toEqual([]);
    expect(
      getAliasesList({
        title_aliases: '[null, "valid_alias", null, "another"]',
      })
    ).toEqual(["valid_alias", "another"]);
  });

  it("drops empty strings and non-strings", () => {
    expect(getAliasesList({ title_aliases: '["", 3, "ok"]' })).toEqual(["ok"]);
  });

  it("returns an empty list for missing or broken data", () => {
    expect(getAliasesList({ title_aliases: null })).toEqual([]);
    expect(getAliasesList({ title_aliases: "not json" })).toEqual([]);
    expect(getAliasesList({ title_aliases: '{"a":1}' })).toEqual([]);
  });
});

describe("getAllTitlePatterns", () => {
  it("returns nothing for a null title and no aliases", () => {
    expect(
      getAllTitlePatterns({ title_raw: null, title_aliases: null })
    ).toEqual([]);
  });

  it("lists title_raw first without duplicates", () => {
    expect(
      getAllTitlePatterns({
        title_raw: "Frieren",
        title_aliases: '["Frieren", "芙莉莲"]',
      })
    ).toEqual(["Frieren", "芙莉莲"]);
  });
});

describe("mergeAlias", () => {
  const bangumi = { title_raw: "Frieren", title_aliases: '["芙莉莲"]' };

  it("rejects null, empty and duplicate aliases", () => {
    expect(mergeAlias(bangumi, null)).toBeNull();
    expect(mergeAlias(bangumi, undefined)).toBeNull();
    expect(mergeAlias(bangumi, "  ")).toBeNull();
    expect(mergeAlias(bangumi, "芙莉莲")).toBeNull();
    expect(mergeAlias(bangumi, "Frieren")).toBeNull();
  });

  it("appends a new alias", () => {
    expect(mergeAlias(bangumi, "葬送的芙莉莲")).toBe('["芙莉莲","葬送的芙莉莲"]');
  });
});

describe("buildTitleIndex", () => {
  it("prefers the longest pattern", () => {
    const short = makeBangumi({ id: 1, title_raw: "Frieren" });
    const long = makeBangumi({ id: 2, title_raw: "Sousou no Frieren" });
    const index = buildTitleIndex([short, long]);
    expect(index.patterns).toEqual(["Sousou no Frieren", "Frieren"]);
    expect(index.match("[Grp] Sousou no Frieren - 03")?.id).toBe(2);
    expect(index.match("[Grp] Frieren - 03")?.id).toBe(1);
  });

  it("skips deleted records", () => {
    const index = buildTitleIndex([
      makeBangumi({ id: 1, title_raw: "Frieren", deleted: true }),
    ]);
    expect(index.patterns).toEqual([]);
    expect(index.match("[Grp] Frieren - 03")).toBeNull();
  });

  it("keeps the first owner of a shared pattern", () => {
    const index = buildTitleIndex([
      makeBangumi({ id: 1, title_raw: "Frieren" }),
      makeBangumi({ id: 2, title_raw: "Other", title_aliases: '["Frieren"]' }),
    ]);
    expect(index.get("Frieren")?.id).toBe(1);
  });
});

describe("matchTorrent", () => {
  it("ignores a record with no usable names", async () => {
    const store = createMemoryBangumiStore([
      makeBangumi({ id: 1, title_raw: null, title_aliases: "[null]" }),
    ]);
    expect(await matchTorrent(store, ANI_TITLE)).toBeNull();
  });

  it("matches by title_raw", async () => {
    const store = createMemoryBangumiStore([
      makeBangumi({ id: 1, title_raw: "[ANi] 29岁单身冒险家的日常" }),
    ]);
    const bangumi = await matchTorrent(
      store,
      "[ANi] 29岁单身冒险家的日常 - 07 [1080P][Baha][WEB-DL][AAC AVC][CHT][MP4]"
    );
    expect(bangumi?.id).toBe(1);
  });

  it("matches by alias", async () => {
    const store = createMemoryBangumiStore([
      makeBangumi({
        id: 4,
        title_raw: "Sousou no Frieren",
        title_aliases: '["葬送的芙莉莲"]',
      }),
    ]);
    expect((await matchTorrent(store, "[Grp] 葬送的芙莉莲 - 03"))?.id).toBe(4);
  });
});

describe("matchList", () => {
  const feed = "https://example.com/rss/test";

  it("separates matched and unmatched items", async () => {
    const store = createMemoryBangumiStore([
      makeBangumi({ id: 1, title_raw: null, title_aliases: "[null]" }),
      makeBangumi({ id: 2, title_raw: "Sousou no Frieren" }),
    ]);
    const frieren = { title: "[Grp] Sousou no Frieren - 03 [1080p]" };
    const ani = { title: ANI_TITLE };

    const result = await matchList(store, [frieren, ani], feed);
    expect(result.matched).toHaveLength(1);
    expect(result.matched[0].item).toBe(frieren);
    expect(result.matched[0].bangumi.id).toBe(2);
    expect(result.unmatched).toEqual([ani]);
  });

  it("records the feed on matched records once", async () => {
    const store = createMemoryBangumiStore([
      makeBangumi({
        id: 2,
        title_raw: "Sousou no Frieren",
        rss_link: "https://example.com/rss/other",
      }),
    ]);
    const items = [
      { title: "[Grp] Sousou no Frieren - 03" },
      { title: "[Grp] Sousou no Frieren - 04" },
    ];
    await matchList(store, items, feed);
    await matchList(store, items, feed);
    expect(store.rows.get(2)?.rss_link).toBe(
      "https://example.com/rss/other,https://example.com/rss/test"
    );
  });

  it("returns empty results for no items", async () => {
    const store = createMemoryBangumiStore();
    expect(await matchList(store, [], feed)).toEqual({
      matched: [],
      unmatched: [],
    });
  });
});

describe("BangumiStore.addTitleAlias", () => {
  it("stores valid aliases only", async () => {
    const store = createMemoryBangumiStore([
      makeBangumi({ id: 1, title_raw: "Frieren" }),
    ]);
    expect(await store.addTitleAlias(1, null)).toBe(false);
    expect(await store.addTitleAlias(1, "")).toBe(false);
    expect(await store.addTitleAlias(1, "芙莉莲")).toBe(true);
    expect(await store.addTitleAlias(1, "芙莉莲")).toBe(false);
    expect(store.rows.get(1)?.title_aliases).toBe('["芙莉莲"]');
  });
});
