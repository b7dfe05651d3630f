import type { SeasonInfo } from "../../types/parser.js";

/** 中文数字，只支持单字 */
export const CHINESE_NUMBER_MAP: Readonly<Record<string, number>> = Object.freeze({
  一: 1,
  二: 2,
  三: 3,
  四: 4,
  五: 5,
  六: 6,
  七: 7,
  八: 8,
  九: 9,
  十: 10,
});

type SeasonRule = {
  pattern: RegExp;
  /** 是否从标题中移除该标记 */
  strip: boolean;
  value: (match: RegExpMatchArray) => number | undefined;
};

function toSeasonNumber(raw: string) {
  if (/^\d+$/.test(raw)) return Number.parseInt(raw, 10);
  return CHINESE_NUMBER_MAP[raw];
}

const SEASON_RULES: ReadonlyArray<SeasonRule> = Object.freeze([
  {
    // S02
    pattern: /(?<![A-Za-z])S(\d{1,2})(?![\dA-Za-z])/g,
    strip: true,
    value: (m: RegExpMatchArray) => toSeasonNumber(m[1]),
  },
  {
    // Season 2
    pattern: /[Ss]eason\s?(\d{1,2})(?!\d)/g,
    strip: true,
    value: (m: RegExpMatchArray) => toSeasonNumber(m[1]),
  },
  {
    // 第二季 / 第2季 / 第2期
    pattern: /第\s?(\d{1,2}|[一二三四五六七八九十])\s?[季期]/g,
    strip: true,
    value: (m: RegExpMatchArray) => toSeasonNumber(m[1]),
  },
  {
    // 2期
    pattern: /(?<![\dA-Za-z第])(\d{1,2})期/g,
    strip: true,
    value: (m: RegExpMatchArray) => toSeasonNumber(m[1]),
  },
  {
    // 2nd Season，属于官方英文名的一部分，保留在标题里
    pattern: /(?<!\d)(\d{1,2})(?:st|nd|rd|th)\s+[Ss]eason/g,
    strip: false,
    value: (m: RegExpMatchArray) => toSeasonNumber(m[1]),
  },
]);

/**
 * 从名称部分提取季度信息并移除季度标记
 * 多个标记同时存在时取最靠前的一个
 * @param nameBlock - 名称部分（已去除字幕组）
 * @returns 去除标记后的名称、季度、原始标记
 */
export function extractSeason(nameBlock: string): SeasonInfo {
  const text = nameBlock.replace(/[[\]]/g, " ");

  let first: { index: number; raw: string; season: number } | null = null;
  for (const rule of SEASON_RULES) {
    for (const match of text.matchAll(rule.pattern)) {
      const season = rule.value(match);
      const index = match.index ?? 0;
      if (season === undefined) continue;
      if (!first || index < first.index) {
        first = { index, raw: match[0], season };
      }
    }
  }

  if (!first) {
    return { name: text, season: 1, season_raw: "" };
  }

  let name = text;
  for (const rule of SEASON_RULES) {
    if (rule.strip) name = name.replace(rule.pattern, "");
  }
  return { name, season: first.season, season_raw: first.raw };
}
