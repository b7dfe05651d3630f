import type { ParsedRelease } from "../../types/parser.js";
import { extractGroup, preProcess } from "./group.js";
import { cleanNameBlock, splitName } from "./name.js";
import { extractSeason } from "./season.js";
import { findTags, parseEpisodeNumber } from "./tags.js";
import { MAX_TITLE_LENGTH, splitStructure } from "./templates.js";

/**
 * 解析字幕组发布标题
 *
 * 纯函数，不读写任何状态，任何字符串输入都不会抛出异常。
 * 没有模板能匹配时返回 null，调用方应当跳过该条目。
 * @param title - RSS 条目标题或文件名
 * @returns 解析结果（冻结对象）或 null
 */
export function rawParser(title: string): ParsedRelease | null {
  if (typeof title !== "string") return null;
  const content = preProcess(title);
  if (!content || content.length > MAX_TITLE_LENGTH) return null;

  const match = splitStructure(content);
  if (!match) return null;

  const group = extractGroup(content);
  const seasonInfo = extractSeason(cleanNameBlock(match.name, group));

  let season = seasonInfo.season;
  let seasonRaw = seasonInfo.season_raw || undefined;
  const templateSeason = parseEpisodeNumber(match.season);
  if (templateSeason !== undefined) {
    season = templateSeason;
    seasonRaw = `S${match.season}`;
  }

  const names = match.localized ? splitName(seasonInfo.name) : {};
  const tags = findTags(match.other);

  return Object.freeze({
    group,
    title_zh: names.title_zh,
    title_en: names.title_en,
    title_jp: names.title_jp,
    title_raw: seasonInfo.name.replace(/\s+/g, " ").trim(),
    season,
    season_raw: seasonRaw,
    episode: parseEpisodeNumber(match.episode),
    resolution: tags.resolution,
    source: tags.source,
    sub: tags.sub,
  });
}

/**
 * 是否为完整的解析结果：模板匹配成功且集数存在
 * @param release - rawParser 的返回值
 */
export function isParsed(
  release: ParsedRelease | null
): release is ParsedRelease & { episode: number } {
  return release !== null && release.episode !== undefined;
}
