import { describe, it, expect } from "vitest";
import {
  bangumiIdFromTags,
  genPath,
  parseEpisodeFile,
  parseSubtitleFile,
  RENAMED_TAG,
  renameTorrents,
  seasonFromPath,
  subtitleLanguage,
} from "../../src/anime/renamer.js";
import { createMockDownloader } from "../../src/qBittorrent/mock.js";
import type { EpisodeFile } from "../../src/types/anime.js";
import {
  createMemoryBangumiStore,
  makeBangumi,
} from "../helpers/memoryStore.js";

function episode(fields: Partial<EpisodeFile> = {}): EpisodeFile {
  return {
    media_path: "Test/test.mkv",
    title: "Test",
    season: 1,
    episode: 1,
    suffix: ".mkv",
    ...fields,
  };
}

describe("genPath", () => {
  it.each([0, 1, -12])("keeps episode 0 with offset %d", (offset) => {
    const file = episode({ title: "Fate strange Fake", episode: 0 });
    expect(genPath(file, "Fate strange Fake", "pn", offset)).toBe(
      "Fate strange Fake S01E00.mkv"
    );
  });

  it("applies a negative offset", () => {
    expect(genPath(episode({ episode: 13 }), "Test", "pn", -12)).toBe(
      "Test S01E01.mkv"
    );
  });

  it("keeps the original episode when the offset goes below 1", () => {
    expect(genPath(episode({ episode: 5 }), "Test", "pn", -12)).toBe(
      "Test S01E05.mkv"
    );
  });

  it("uses the bangumi name for advance", () => {
    expect(
      genPath(episode({ episode: 0 }), "Bangumi Name", "advance", 0)
    ).toBe("Bangumi Name S01E00.mkv");
  });

  it("adds the subtitle language", () => {
    const file = { ...episode({ suffix: ".ass" }), language: "zh-tw" };
    expect(genPath(file, "Bangumi Name", "subtitle_pn")).toBe(
      "Test S01E01.zh-tw.ass"
    );
    expect(genPath(file, "Bangumi Name", "subtitle_advance")).toBe(
      "Bangumi Name S01E01.zh-tw.ass"
    );
  });

  it("keeps the path for none and normal", () => {
    expect(genPath(episode(), "Test", "none")).toBe("Test/test.mkv");
    expect(genPath(episode(), "Test", "normal")).toBe("Test/test.mkv");
  });
});

describe("seasonFromPath", () => {
  it.each([
    ["Season 2/x.mkv", 2],
    ["Show/S03/x.mkv", 3],
    ["Show\\Season 4\\x.mkv", 4],
  ])("%s -> %d", (p, season) => {
    expect(seasonFromPath(p)).toBe(season);
  });

  it("returns undefined without a season folder", () => {
    expect(seasonFromPath("x.mkv")).toBeUndefined();
    expect(seasonFromPath("Show/x.mkv")).toBeUndefined();
  });
});

describe("subtitleLanguage", () => {
  it("detects traditional Chinese first", () => {
    expect(subtitleLanguage("show.cht.ass")).toBe("zh-tw");
    expect(subtitleLanguage("show.繁.ass")).toBe("zh-tw");
  });

  it("defaults to simplified Chinese", () => {
    expect(subtitleLanguage("show.chs.ass")).toBe("zh");
    expect(subtitleLanguage("show.ass")).toBe("zh");
  });
});

describe("parseEpisodeFile", () => {
  it("reads the season from the folder", () => {
    expect(
      parseEpisodeFile(
        "Season 2/[Lilith-Raws] Sousou no Frieren - 03 [Baha][WEB-DL][1080p][AVC AAC][CHT].mp4"
      )
    ).toEqual({
      media_path:
        "Season 2/[Lilith-Raws] Sousou no Frieren - 03 [Baha][WEB-DL][1080p][AVC AAC][CHT].mp4",
      group: "Lilith-Raws",
      title: "Sousou no Frieren",
      season: 2,
      episode: 3,
      suffix: ".mp4",
    });
  });

  it("prefers the requested language", () => {
    const name =
      "[LoliHouse] 葬送的芙莉莲_Sousou no Frieren - 03 [WebRip 1080p].mkv";
    expect(parseEpisodeFile(name, "zh")?.title).toBe("葬送的芙莉莲");
    expect(parseEpisodeFile(name, "en")?.title).toBe("Sousou no Frieren");
  });

  it("returns null for unparseable names", () => {
    expect(parseEpisodeFile("random.mkv")).toBeNull();
  });

  it("reads the subtitle language", () => {
    expect(
      parseSubtitleFile("[Grp] Some Show - 05 [1080p].cht.ass")?.language
    ).toBe("zh-tw");
  });
});

describe("bangumiIdFromTags", () => {
  it("reads the id tag", () => {
    expect(bangumiIdFromTags(["foo", "ab:12"])).toBe(12);
    expect(bangumiIdFromTags(["ab:x"])).toBeUndefined();
    expect(bangumiIdFromTags([])).toBeUndefined();
  });
});

describe("renameTorrents", () => {
  it("renames media and subtitles in completed torrents", async () => {
    const downloader = createMockDownloader();
    const bangumiStore = createMemoryBangumiStore([
      makeBangumi({ id: 1, official_title: "葬送的芙莉莲" }),
      makeBangumi({ id: 2, official_title: "Some Show", offset: -12 }),
    ]);

    const frieren = downloader.addMockTorrent("Frieren", {
      category: "Bangumi",
      tags: ["ab:1"],
      files: [
        {
          name: "Frieren/[Lilith-Raws] Sousou no Frieren - 03 [Baha][WEB-DL][1080p][AVC AAC][CHT].mp4",
          size: 1,
        },
        {
          name: "Frieren/[Lilith-Raws] Sousou no Frieren - 03 [1080p].cht.ass",
          size: 1,
        },
        { name: "Frieren/葬送的芙莉莲 S01E04.mp4", size: 1 },
        { name: "Frieren/readme.txt", size: 1 },
      ],
    });
    const someShow = downloader.addMockTorrent("Some Show", {
      category: "Bangumi",
      tags: ["ab:2"],
      files: [{ name: "[Grp] Some Show - 13 [1080p].mkv", size: 1 }],
    });
    const untagged = downloader.addMockTorrent("Another Show", {
      category: "Bangumi",
      files: [{ name: "[Grp] Another Show - 05 [1080p].mkv", size: 1 }],
    });
    const other = downloader.addMockTorrent("Other", {
      category: "Other",
      files: [{ name: "[Grp] Other Show - 05 [1080p].mkv", size: 1 }],
    });
    const downloading = downloader.addMockTorrent("Downloading", {
      category: "Bangumi",
      progress: 0.5,
      files: [{ name: "[Grp] Slow Show - 05 [1080p].mkv", size: 1 }],
    });

    const renamed = await renameTorrents({
      downloader,
      bangumiStore,
      method: "advance",
      language: "zh",
    });

    expect(renamed).toBe(4);
    const names = async (hash: string) =>
      (await downloader.getTorrentFiles(hash)).map((f) => f.name);
    expect(await names(frieren)).toEqual([
      "Frieren/葬送的芙莉莲 S01E03.mp4",
      "Frieren/葬送的芙莉莲 S01E03.zh-tw.ass",
      "Frieren/葬送的芙莉莲 S01E04.mp4",
      "Frieren/readme.txt",
    ]);
    expect(await names(someShow)).toEqual(["Some Show S01E01.mkv"]);
    expect(await names(untagged)).toEqual(["Another Show S01E05.mkv"]);
    expect(await names(other)).toEqual(["[Grp] Other Show - 05 [1080p].mkv"]);
    expect(await names(downloading)).toEqual([
      "[Grp] Slow Show - 05 [1080p].mkv",
    ]);
  });

  it.each([
    [1, "Show S01E13.mkv"],
    [-1, "Show S01E11.mkv"],
  ])("applies offset %d only once across passes", async (offset, expected) => {
    const downloader = createMockDownloader();
    const bangumiStore = createMemoryBangumiStore([
      makeBangumi({ id: 1, official_title: "Show", offset }),
    ]);
    const hash = downloader.addMockTorrent("Show", {
      category: "Bangumi",
      tags: ["ab:1"],
      files: [{ name: "[Grp] Show - 12 [1080p].mkv", size: 1 }],
    });
    const deps = {
      downloader,
      bangumiStore,
      method: "pn" as const,
      language: "zh" as const,
    };

    expect(await renameTorrents(deps)).toBe(1);
    expect(await renameTorrents(deps)).toBe(0);
    expect(await renameTorrents(deps)).toBe(0);

    const files = await downloader.getTorrentFiles(hash);
    expect(files.map((f) => f.name)).toEqual([expected]);
    expect(downloader.getState().torrents[hash].tags).toEqual([
      "ab:1",
      RENAMED_TAG,
    ]);
  });

  it("retries torrents whose files could not be renamed", async () => {
    const mock = createMockDownloader();
    const downloader = { ...mock, renameFile: async () => false };
    const hash = mock.addMockTorrent("Show", {
      category: "Bangumi",
      files: [{ name: "[Grp] Show - 12 [1080p].mkv", size: 1 }],
    });

    const renamed = await renameTorrents({
      downloader,
      bangumiStore: createMemoryBangumiStore(),
      method: "pn",
      language: "zh",
    });

    expect(renamed).toBe(0);
    expect(mock.getState().torrents[hash].tags).toEqual([]);
  });
});
