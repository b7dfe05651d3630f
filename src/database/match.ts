import logger from "../log/index.js";
import type { Bangumi } from "../types/anime.js";
import type { BangumiStore } from "./bangumi.js";

/**
 * 解析番剧的别名列表
 * 历史数据中的 null、非字符串和空字符串会被过滤，JSON 损坏时返回空数组
 * @param bangumi - 番剧记录
 */
export function getAliasesList(bangumi: Pick<Bangumi, "title_aliases">) {
  const raw = bangumi.title_aliases;
  if (!raw) return [];
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    logger.debug(
      "别名数据不是合法的 JSON，已忽略:",
      error instanceof Error ? error.message : error
    );
    return [];
  }
  if (!Array.isArray(parsed)) return [];
  return parsed.filter(
    (alias): alias is string => typeof alias === "string" && alias !== ""
  );
}

/**
 * 番剧所有可用于匹配的名称：title_raw 加上别名
 * @param bangumi - 番剧记录
 */
export function getAllTitlePatterns(
  bangumi: Pick<Bangumi, "title_raw" | "title_aliases">
) {
  const patterns: string[] = [];
  if (bangumi.title_raw) patterns.push(bangumi.title_raw);
  for (const alias of getAliasesList(bangumi)) {
    if (!patterns.includes(alias)) patterns.push(alias);
  }
  return patterns;
}

/**
 * 校验并追加别名
 * @returns 新的别名 JSON；别名为空或已存在时返回 null
 */
export function mergeAlias(
  bangumi: Pick<Bangumi, "title_raw" | "title_aliases">,
  alias: string | null | undefined
) {
  if (typeof alias !== "string") return null;
  const value = alias.trim();
  if (!value) return null;
  const aliases = getAliasesList(bangumi);
  if (value === bangumi.title_raw || aliases.includes(value)) return null;
  return JSON.stringify([...aliases, value]);
}

export type TitleIndex = {
  /** 按长度从长到短排列的名称 */
  readonly patterns: readonly string[];
  /** 名称对应的番剧 */
  get(pattern: string): Bangumi | undefined;
  /** 找到名称出现在种子标题中的番剧，优先匹配更长的名称 */
  match(torrentName: string): Bangumi | null;
};

/**
 * 根据番剧列表建立名称索引
 * 已删除的番剧和空名称不会进入索引，同一名称保留先出现的番剧
 * @param bangumis - 番剧列表
 */
export function buildTitleIndex(bangumis: readonly Bangumi[]): TitleIndex {
  const index = new Map<string, Bangumi>();
  for (const bangumi of bangumis) {
    if (bangumi.deleted) continue;
    for (const pattern of getAllTitlePatterns(bangumi)) {
      if (!index.has(pattern)) index.set(pattern, bangumi);
    }
  }
  const patterns = [...index.keys()].sort((a, b) => b.length - a.length);

  return {
    patterns,
    get: (pattern) => index.get(pattern),
    match(torrentName) {
      for (const pattern of patterns) {
        if (torrentName.includes(pattern)) return index.get(pattern) ?? null;
      }
      return null;
    },
  };
}

/**
 * 从数据库中查找种子标题对应的番剧
 * @param store - 番剧存储
 * @param torrentName - 种子标题
 */
export async function matchTorrent(store: BangumiStore, torrentName: string) {
  const index = buildTitleIndex(await store.searchAll());
  return index.match(torrentName);
}

export type MatchListResult<T> = {
  matched: { item: T; bangumi: Bangumi }[];
  unmatched: T[];
};

/**
 * 批量匹配 RSS 条目，并把 RSS 地址记录到命中的番剧上
 * @param store - 番剧存储
 * @param items - RSS 条目
 * @param rssLink - 条目来源的 RSS 地址
 */
export async function matchList<T extends { title: string }>(
  store: BangumiStore,
  items: readonly T[],
  rssLink: string
): Promise<MatchListResult<T>> {
  const result: MatchListResult<T> = { matched: [], unmatched: [] };
  if (items.length === 0) return result;

  const index = buildTitleIndex(await store.searchAll());
  const touched = new Map<number, Bangumi>();
  for (const item of items) {
    const bangumi = index.match(item.title);
    if (bangumi) {
      result.matched.push({ item, bangumi });
      touched.set(bangumi.id, bangumi);
    } else {
      result.unmatched.push(item);
    }
  }

  for (const bangumi of touched.values()) {
    const links = bangumi.rss_link
      ? bangumi.rss_link.split(",").filter(Boolean)
      : [];
    if (links.includes(rssLink)) continue;
    await store.update(bangumi.id, {
      rss_link: [...links, rssLink].join(","),
    });
  }
  return result;
}
