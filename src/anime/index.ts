import path from "node:path";
import type { Settings, TitleLanguage } from "../config/index.js";
import type { BangumiStore, TorrentStore } from "../database/bangumi.js";
import { buildTitleIndex, matchList } from "../database/match.js";
import logger from "../log/index.js";
import type {
  Bangumi,
  RefreshResult,
  RssFeed,
  RssItem,
} from "../types/anime.js";
import type { DownloadClient } from "../types/torrent.js";
import { parseBangumi } from "./parser/titleParser.js";
import {
  BANGUMI_CATEGORY,
  BANGUMI_TAG_PREFIX,
  renameTorrents,
} from "./renamer.js";
import { isFiltered } from "./rss/filter.js";
import { fetchRss } from "./rss/index.js";

export type EngineDeps = {
  bangumiStore: BangumiStore;
  torrentStore: TorrentStore;
  downloader: DownloadClient;
  /** 获取 RSS 条目，默认通过 HTTP 请求 */
  fetchFeed?: (url: string) => Promise<RssItem[]>;
};

export type RefreshOptions = {
  /** 下载根目录 */
  downloadPath: string;
  /** 首选的标题语言 */
  language: TitleLanguage;
  /** 新番剧默认的过滤规则 */
  filter: string[];
  /** 是否为未匹配的标题创建新番剧 */
  parseNew: boolean;
  /** 同时提交下载的最大数量 */
  maxConcurrency?: number;
};

type Target = { item: RssItem; bangumi: Bangumi };

/**
 * 番剧的下载目录：<根目录>/<标题 (年份)>/Season <季度>
 * @param downloadPath - 下载根目录
 * @param bangumi - 番剧记录
 */
export function savePathFor(
  downloadPath: string,
  bangumi: Pick<Bangumi, "official_title" | "year" | "season">
) {
  const folder = bangumi.year
    ? `${bangumi.official_title} (${bangumi.year})`
    : bangumi.official_title;
  return path.posix.join(downloadPath, folder, `Season ${bangumi.season}`);
}

/** 条目的下载地址，优先使用 enclosure */
export function downloadUrl(item: RssItem) {
  return item.torrent ?? item.link;
}

/**
 * 控制并发数量地处理一组任务
 * @param items - 待处理项
 * @param maxConcurrency - 最大并发数
 * @param handler - 处理函数，抛出的异常由调用方在 handler 内处理
 */
async function processItemsWithConcurrency<T>(
  items: readonly T[],
  maxConcurrency: number,
  handler: (item: T) => Promise<void>
) {
  const executing = new Set<Promise<void>>();

  for (const item of items) {
    const promise: Promise<void> = handler(item).finally(() => {
      // 任务完成后从执行集合中移除
      executing.delete(promise);
    });
    executing.add(promise);

    // 如果达到最大并发数，等待其中一个完成
    if (executing.size >= maxConcurrency) {
      await Promise.race(executing);
    }
  }

  // 等待所有剩余任务完成
  await Promise.all(executing);
}

/**
 * 为未匹配的条目创建番剧，同一轮中标题相同的条目共用一个番剧
 * 无法解析的标题只记录 debug 日志
 */
async function createBangumis(
  deps: EngineDeps,
  feed: RssFeed,
  items: readonly RssItem[],
  options: RefreshOptions,
  result: RefreshResult
) {
  const created: Bangumi[] = [];
  const targets: Target[] = [];

  for (const item of items) {
    const existing = buildTitleIndex(created).match(item.title);
    if (existing) {
      targets.push({ item, bangumi: existing });
      continue;
    }

    const parsed = parseBangumi(item.title, options);
    if (!parsed) {
      result.unparsed++;
      continue;
    }
    try {
      const bangumi = await deps.bangumiStore.add({
        ...parsed,
        rss_link: feed.url,
        save_path: savePathFor(options.downloadPath, parsed),
      });
      logger.info(`新番剧: ${bangumi.official_title} 第${bangumi.season}季`);
      created.push(bangumi);
      targets.push({ item, bangumi });
    } catch (err) {
      result.failed++;
      logger.error(`创建番剧失败: ${item.title}`, err);
    }
  }
  return targets;
}

/**
 * 提交一个条目到下载器并记录
 */
async function submitTarget(
  deps: EngineDeps,
  { item, bangumi }: Target,
  options: RefreshOptions,
  result: RefreshResult
) {
  const url = downloadUrl(item);
  try {
    if (isFiltered(item.title, bangumi.filter)) {
      logger.debug(`过滤规则排除: ${item.title}`);
      result.filtered++;
      await deps.torrentStore.addTorrents([
        { name: item.title, url, bangumi_id: bangumi.id, downloaded: false },
      ]);
      return;
    }

    const ok = await deps.downloader.addTorrents({
      urls: [url],
      savePath: bangumi.save_path ?? savePathFor(options.downloadPath, bangumi),
      category: BANGUMI_CATEGORY,
      tags: `${BANGUMI_TAG_PREFIX}${bangumi.id}`,
    });
    if (!ok) {
      result.failed++;
      logger.warn(`下载器拒绝了种子: ${item.title}`);
      return;
    }

    await deps.torrentStore.addTorrents([
      { name: item.title, url, bangumi_id: bangumi.id, downloaded: true },
    ]);
    if (!bangumi.added) {
      await deps.bangumiStore.update(bangumi.id, { added: true });
    }
    result.added++;
    logger.info(`开始下载: ${item.title}`);
  } catch (err) {
    result.failed++;
    logger.error(`处理RSS条目失败: ${item.title}`, err);
  }
}

/**
 * 刷新一组 RSS 订阅
 *
 * 已记录的条目跳过；能匹配到番剧的条目直接下载，其余条目解析标题后创建新番剧。
 * 单个条目或订阅出错只记录日志，不会中断整轮刷新。
 * @param deps - 存储与下载器
 * @param feeds - 订阅列表
 * @param options - 刷新选项
 */
export async function refreshRss(
  deps: EngineDeps,
  feeds: readonly RssFeed[],
  options: RefreshOptions
): Promise<RefreshResult> {
  const result: RefreshResult = { added: 0, filtered: 0, unparsed: 0, failed: 0 };
  const fetchFeed = deps.fetchFeed ?? fetchRss;

  for (const feed of feeds) {
    if (!feed.enabled) continue;

    let items: RssItem[];
    try {
      items = await fetchFeed(feed.url);
    } catch (err) {
      result.failed++;
      logger.warn(
        `RSS获取失败: ${feed.name ?? feed.url}`,
        err instanceof Error ? err.message : err
      );
      continue;
    }

    try {
      const fresh: RssItem[] = [];
      for (const item of items) {
        if (!(await deps.torrentStore.hasTorrent(downloadUrl(item)))) {
          fresh.push(item);
        }
      }

      const { matched, unmatched } = await matchList(
        deps.bangumiStore,
        fresh,
        feed.url
      );
      const targets: Target[] = [...matched];
      if (options.parseNew) {
        targets.push(
          ...(await createBangumis(deps, feed, unmatched, options, result))
        );
      }

      await processItemsWithConcurrency(
        targets,
        options.maxConcurrency ?? 3,
        (target) => submitTarget(deps, target, options, result)
      );
    } catch (err) {
      result.failed++;
      logger.error(`处理RSS订阅失败: ${feed.url}`, err);
    }
  }

  logger.debug(
    `RSS刷新完成 - 新增: ${result.added}, 过滤: ${result.filtered}, 无法解析: ${result.unparsed}, 失败: ${result.failed}`
  );
  return result;
}

function wait(ms: number) {
  return new Promise<void>((resolve) => setTimeout(resolve, ms));
}

/**
 * 主循环：按 rss_time 刷新订阅，按 rename_time 整理文件
 * @param deps - 存储与下载器
 * @param settings - 配置
 */
export async function anime(deps: EngineDeps, settings: Settings) {
  const feeds: RssFeed[] = settings.rss_links.map((url) => ({
    url,
    enabled: true,
  }));
  let lastRefresh = 0;

  while (true) {
    if (Date.now() - lastRefresh >= settings.program.rss_time * 1000) {
      lastRefresh = Date.now();
      try {
        await refreshRss(deps, feeds, {
          downloadPath: settings.downloader.path,
          language: settings.rss_parser.language,
          filter: settings.rss_parser.filter,
          parseNew: settings.rss_parser.enable,
        });
      } catch (err) {
        logger.error("RSS刷新出错", err);
      }
    }

    if (settings.bangumi_manage.enable) {
      try {
        await renameTorrents({
          downloader: deps.downloader,
          bangumiStore: deps.bangumiStore,
          method: settings.bangumi_manage.rename_method,
          language: settings.rss_parser.language,
        });
      } catch (err) {
        logger.error("重命名出错", err);
      }
    }

    await wait(settings.program.rename_time * 1000);
  }
}
