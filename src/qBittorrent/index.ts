import { QBittorrent } from "@ctrl/qbittorrent";
import logger from "../log/index.js";
import type { Settings } from "../config/index.js";
import type { DownloadClient, TorrentInfo } from "../types/torrent.js";
import { createMockDownloader } from "./mock.js";

function wait(ms: number) {
  return new Promise<void>((resolve) => setTimeout(resolve, ms));
}

/**
 * 通用的 QB 请求重试封装
 * @param fn - 要执行的请求函数
 * @param maxRetries - 最大重试次数
 * @param initialDelay - 初始延迟时间（毫秒）
 * @returns - 请求结果
 */
export async function qbRequestWithRetry<T>(
  fn: () => Promise<T>,
  maxRetries = 3,
  initialDelay = 5000
): Promise<T> {
  let attempt = 0;
  let delay = initialDelay;
  let lastErr: unknown;

  while (attempt <= maxRetries) {
    try {
      return await fn();
    } catch (err) {
      lastErr = err;
      attempt++;
      if (attempt > maxRetries) break;
      logger.warn(
        `QB 请求失败（第 ${attempt}/${maxRetries} 次尝试）。${Math.round(
          delay / 1000
        )} 秒后重试: ${err instanceof Error ? err.message : err}`
      );
      // 指数退避
      await wait(delay);
      delay = Math.min(delay * 2, 10000);
    }
  }

  // 最后一次尝试失败，抛出原始错误
  throw lastErr;
}

/**
 * 拼接 Web UI 地址，host 已带协议时原样使用
 * @param host - 地址，如 172.17.0.1:8080
 * @param ssl - 是否使用 https
 */
export function toBaseUrl(host: string, ssl: boolean) {
  if (/^https?:\/\//i.test(host)) return host.replace(/\/+$/, "");
  return `${ssl ? "https" : "http"}://${host}`;
}

/**
 * 创建 qBittorrent 下载器
 * 每次请求前检查登录状态，失效时重新登录
 * @param config - 下载器配置
 */
export function createQbDownloader(
  config: Settings["downloader"]
): DownloadClient {
  const client = new QBittorrent({
    baseUrl: toBaseUrl(config.host, config.ssl),
    username: config.username,
    password: config.password,
  });
  let loggedIn = false;

  /** 获取已登录的 qBittorrent 客户端实例 */
  async function getQBClient() {
    if (!loggedIn) {
      await client.login();
      loggedIn = true;
    } else {
      try {
        await client.getAppVersion();
      } catch {
        logger.debug("qBittorrent 登录已失效，重新登录");
        await client.login();
      }
    }
    return client;
  }

  return {
    async auth() {
      try {
        await qbRequestWithRetry(() => client.login(), 3, 1000);
        loggedIn = true;
        return true;
      } catch (err) {
        logger.error(
          "qBittorrent链接失败: 请检查Web UI是否开启或密码是否正确。",
          err instanceof Error ? err.message : err
        );
        return false;
      }
    },

    async checkConnection() {
      const qb = await getQBClient();
      return await qb.getAppVersion();
    },

    async addTorrents({ urls, files, savePath, category, tags }) {
      const qb = await getQBClient();
      const options = { savepath: savePath, category, tags };
      let ok = true;
      if (urls && urls.length > 0) {
        ok = await qbRequestWithRetry(() =>
          qb.addMagnet(urls.join("\n"), options)
        );
      }
      for (const file of files ?? []) {
        const added = await qbRequestWithRetry(() =>
          qb.addTorrent(file, options)
        );
        ok = ok && added;
      }
      return ok;
    },

    async getTorrents(filter = {}) {
      const qb = await getQBClient();
      const torrents = await qbRequestWithRetry(() =>
        qb.listTorrents({
          filter: filter.status ?? "all",
          category: filter.category,
          tag: filter.tag,
        })
      );
      return torrents.map(
        (t): TorrentInfo => ({
          hash: t.hash,
          name: t.name,
          category: t.category,
          tags: t.tags
            .split(",")
            .map((s) => s.trim())
            .filter(Boolean),
          save_path: t.save_path,
          state: String(t.state),
          progress: t.progress,
        })
      );
    },

    async getTorrentFiles(hash) {
      const qb = await getQBClient();
      const files = await qbRequestWithRetry(() => qb.torrentFiles(hash));
      return files.map((f) => ({ name: f.name, size: f.size }));
    },

    async renameFile(hash, oldPath, newPath) {
      const qb = await getQBClient();
      try {
        return await qb.renameFile(hash, oldPath, newPath);
      } catch (err) {
        logger.warn(
          `重命名失败: ${oldPath} -> ${newPath}`,
          err instanceof Error ? err.message : err
        );
        return false;
      }
    },

    async addTag(hash, tag) {
      const qb = await getQBClient();
      await qbRequestWithRetry(() => qb.addTorrentTags(hash, tag));
    },
  };
}

/**
 * 按配置创建下载器
 * @param config - 下载器配置
 */
export function createDownloader(config: Settings["downloader"]) {
  if (config.type === "mock") {
    logger.info("使用模拟下载器");
    return createMockDownloader();
  }
  return createQbDownloader(config);
}
