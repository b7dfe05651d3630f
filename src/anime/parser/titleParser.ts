import logger from "../../log/index.js";
import type { TitleLanguage } from "../../config/index.js";
import type { NewBangumi } from "../../types/anime.js";
import type { ParsedRelease } from "../../types/parser.js";
import { rawParser } from "./rawParser.js";

export type ParseBangumiOptions = {
  /** 首选的标题语言 */
  language: TitleLanguage;
  /** 新番剧默认的过滤规则 */
  filter: string[];
};

function titleIn(release: ParsedRelease, language: TitleLanguage) {
  switch (language) {
    case "zh":
      return release.title_zh;
    case "en":
      return release.title_en;
    case "jp":
      return release.title_jp;
  }
}

/**
 * 把 RSS 标题解析为待保存的番剧记录
 * 标题无法解析，或者解析不出任何可用于匹配的名称时返回 null
 * @param raw - RSS 条目标题
 * @param options - 标题语言与过滤规则
 */
export function parseBangumi(
  raw: string,
  options: ParseBangumiOptions
): NewBangumi | null {
  const release = rawParser(raw);
  if (!release) {
    logger.debug(`无法解析的标题: ${raw}`);
    return null;
  }

  const titleRaw =
    release.title_en ??
    release.title_zh ??
    release.title_jp ??
    (release.title_raw || undefined);
  if (titleRaw === undefined) {
    logger.debug(`标题中没有可用的名称: ${raw}`);
    return null;
  }

  const officialTitle =
    titleIn(release, options.language) ??
    release.title_zh ??
    release.title_en ??
    release.title_jp ??
    titleRaw;

  return {
    official_title: officialTitle,
    title_raw: titleRaw,
    season: release.season,
    season_raw: release.season_raw,
    group_name: release.group || undefined,
    dpi: release.resolution,
    source: release.source,
    subtitle: release.sub,
    eps_collect: release.episode !== undefined && release.episode <= 1,
    offset: 0,
    filter: options.filter.join(","),
    rss_link: "",
    added: false,
    deleted: false,
    title_aliases: null,
  };
}
