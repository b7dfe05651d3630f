import logger from "../log/index.js";
import type {
  DownloadClient,
  TorrentFile,
  TorrentInfo,
} from "../types/torrent.js";

type MockTorrent = TorrentInfo & {
  /** 添加时使用的下载地址 */
  source?: string;
  files: TorrentFile[];
};

export type MockTorrentOptions = {
  category?: string;
  tags?: string[];
  savePath?: string;
  state?: string;
  progress?: number;
  files?: TorrentFile[];
};

/** 内存中的下载器，用于开发与测试 */
export type MockDownloader = DownloadClient & {
  /** 直接放入一个种子，返回其 hash */
  addMockTorrent(name: string, options?: MockTorrentOptions): string;
  /** 当前状态的快照 */
  getState(): {
    torrents: Record<string, MockTorrent>;
    categories: string[];
  };
};

/**
 * 创建模拟下载器，所有操作只修改内存状态
 */
export function createMockDownloader(): MockDownloader {
  const torrents = new Map<string, MockTorrent>();
  const categories = new Set(["Bangumi", "BangumiCollection"]);
  let counter = 0;

  function nextHash() {
    counter++;
    return counter.toString(16).padStart(40, "0");
  }

  function put(name: string, options: MockTorrentOptions, source?: string) {
    const hash = nextHash();
    const category = options.category ?? "";
    if (category) categories.add(category);
    torrents.set(hash, {
      hash,
      name,
      category,
      tags: options.tags ?? [],
      save_path: options.savePath ?? "",
      state: options.state ?? "uploading",
      progress: options.progress ?? 1,
      files: options.files ?? [],
      source,
    });
    return hash;
  }

  function snapshot(torrent: MockTorrent): TorrentInfo {
    return {
      hash: torrent.hash,
      name: torrent.name,
      category: torrent.category,
      tags: [...torrent.tags],
      save_path: torrent.save_path,
      state: torrent.state,
      progress: torrent.progress,
    };
  }

  return {
    async auth() {
      return true;
    },

    async checkConnection() {
      return "v4.6.0 (mock)";
    },

    async addTorrents({ urls, files, savePath, category, tags }) {
      const tagList = tags ? tags.split(",").filter(Boolean) : [];
      const options = {
        category,
        savePath,
        tags: tagList,
        state: "downloading",
        progress: 0,
      };
      for (const url of urls ?? []) {
        put(url, options, url);
      }
      for (const file of files ?? []) {
        put(`torrent-${file.length}`, options);
      }
      logger.debug(
        `模拟下载器添加种子 ${(urls?.length ?? 0) + (files?.length ?? 0)} 个`
      );
      return true;
    },

    async getTorrents(filter = {}) {
      const status = filter.status ?? "all";
      return [...torrents.values()]
        .filter((t) => !filter.category || t.category === filter.category)
        .filter((t) => !filter.tag || t.tags.includes(filter.tag))
        .filter((t) => {
          if (status === "completed") return t.progress >= 1;
          if (status === "downloading") return t.progress < 1;
          return true;
        })
        .map(snapshot);
    },

    async getTorrentFiles(hash) {
      const torrent = torrents.get(hash);
      return torrent ? torrent.files.map((f) => ({ ...f })) : [];
    },

    async renameFile(hash, oldPath, newPath) {
      const file = torrents.get(hash)?.files.find((f) => f.name === oldPath);
      if (!file) return false;
      file.name = newPath;
      return true;
    },

    async addTag(hash, tag) {
      const torrent = torrents.get(hash);
      if (torrent && !torrent.tags.includes(tag)) torrent.tags.push(tag);
    },

    addMockTorrent(name, options = {}) {
      return put(name, options);
    },

    getState() {
      return {
        torrents: Object.fromEntries(torrents),
        categories: [...categories],
      };
    },
  };
}
