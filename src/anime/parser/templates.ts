import type {
  StructuralTemplate,
  TemplateMatch,
} from "../../types/parser.js";
import { preProcess } from "./group.js";

/** 超过该长度的标题不做解析，限制正则回溯的开销 */
export const MAX_TITLE_LENGTH = 512;

type Groups = Record<string, string | undefined>;

function pick(groups: Groups) {
  const { name, episode, season, other } = groups;
  if (name === undefined || episode === undefined) return null;
  return { name, episode, season, other: other ?? "" };
}

/*
 * 结构模板表，按优先级排列，第一个匹配的模板生效
 * 集数前必须有结构分隔符（方括号、“-”、空白、第），集数后必须是空白、方括号或结尾，
 * 避免把 “29 岁单身…” 这类以数字开头的标题当作集数
 */
export const TEMPLATES: ReadonlyArray<StructuralTemplate> = Object.freeze([
  {
    // Girls Band Cry S01E05 VOSTFR 1080p
    name: "western",
    pattern:
      /^(?<name>.+?)[\s.]S(?<season>\d{1,2})E(?<episode>\d{1,4})(?!\d)(?<other>.*)$/,
    extract: pick,
    localized: false,
  },
  {
    // [织梦字幕组][尼尔：机械纪元 NieR Automata Ver1.1a][02集][1080P]
    name: "bracket-episode-marker",
    pattern: /^(?<name>.+?)\[第?(?<episode>\d{1,4})[话話集]\](?<other>.*)$/,
    extract: pick,
    localized: true,
  },
  {
    // [极影字幕社]★4月新番 天国大魔境 Tengoku Daimakyou 第05话 GB 720P MP4
    name: "episode-marker",
    pattern: /^(?<name>.+?)第(?<episode>\d{1,4})[话話集](?<other>.*)$/,
    extract: pick,
    localized: true,
  },
  {
    // [LoliHouse] 中文名 / English Name - 12 [WebRip 1080p HEVC-10bit AAC]
    name: "dash",
    pattern:
      /^(?<name>.+?)\s*-\s*(?<episode>\d{1,4})(?:[vV]\d{1,2})?(?=$|[\s[(（])(?<other>.*)$/,
    extract: pick,
    localized: true,
  },
  {
    // [喵萌奶茶屋]★04月新番★[夏日重现/Summer Time Rendering][11][1080p]
    name: "bracket-episode",
    pattern:
      /^(?<name>.+?)\[(?<episode>\d{1,4})(?:[vV]\d{1,2})?(?:\s?END)?\](?<other>.*)$/,
    extract: pick,
    localized: true,
  },
  {
    // [鬼灭之刃 柱训练篇 / Kimetsu_no_Yaiba-Hashira_Geiko_Hen][02(57)]，取前一个数字
    name: "compound-episode",
    pattern: /^(?<name>.+?)\[(?<episode>\d{1,4})\(\d{1,4}\)\](?<other>.*)$/,
    extract: pick,
    localized: true,
  },
  {
    // [MagicStar] 假面骑士Geats / 仮面ライダーギーツ EP33 [WEBDL] [1080p]
    name: "ep-marker",
    pattern:
      /^(?<name>.+?)\s(?:EP|Ep|ep|E)(?<episode>\d{1,4})(?:[vV]\d{1,2})?(?=$|[\s[(（])(?<other>.*)$/,
    extract: pick,
    localized: true,
  },
  {
    // [NEO·QSW]想星的阿克艾利昂 … Aquarion: Myth of Emotions 02[WEBRIP AVC 1080P]
    name: "inline",
    pattern:
      /^(?<name>.+?)\s(?<episode>\d{1,4})(?:[vV]\d{1,2})?(?=\s*[[(（]|\s*$)(?<other>.*)$/,
    extract: pick,
    localized: true,
  },
] satisfies StructuralTemplate[]);

/**
 * 按模板表切分标题：名称部分、集数、元数据部分
 * 所有模板都不匹配时返回 null，表示标题无法解析
 * @param title - 发布标题
 */
export function splitStructure(title: string): TemplateMatch | null {
  const content = preProcess(title);
  if (!content || content.length > MAX_TITLE_LENGTH) return null;

  for (const template of TEMPLATES) {
    const match = content.match(template.pattern);
    if (!match?.groups) continue;
    const parts = template.extract(match.groups);
    if (!parts) continue;
    return {
      template: template.name,
      name: parts.name.trim(),
      episode: parts.episode,
      season: parts.season,
      other: parts.other.trim(),
      localized: template.localized,
    };
  }
  return null;
}
