import type { ReleaseTags } from "../../types/parser.js";

const SUB_RE = /[简繁日字幕]|CH|BIG5|GB/;
const RESOLUTION_RE =
  /^(?:\d{3,4}[xX×])?(?:480|576|720|1080|1440|2160)[pPiI]?$|^4[kK]$/;
const SOURCE_RE =
  /^(?:B-Global|[Bb]aha|[Bb]ilibili|AT-X|CR|ADN|ABEMA|Web[A-Za-z-]*|WEB[A-Za-z-]*|BD(?:Rip|rip|MV)?|Blu-?[Rr]ay)$/;

/**
 * 去掉字幕标签里的封装后缀
 * @param sub - 字幕标签，如 GB_MP4
 */
export function cleanSub(sub: string | undefined) {
  if (sub === undefined) return undefined;
  return sub.replace(/_MP4|_MKV/g, "");
}

/**
 * 解析集数：十进制整数，前导零去掉，0 为合法值
 * @param raw - 集数原文
 * @returns 集数，无法解析时为 undefined
 */
export function parseEpisodeNumber(raw: string | undefined) {
  if (!raw) return undefined;
  const digits = raw.match(/\d+/);
  if (!digits) return undefined;
  const episode = Number.parseInt(digits[0], 10);
  return Number.isSafeInteger(episode) ? episode : undefined;
}

/**
 * 从元数据部分提取字幕、分辨率、片源
 * 按方括号、圆括号与空格切分，每类取第一个命中的片段
 * @param other - 集数之后的元数据部分
 */
export function findTags(other: string): ReleaseTags {
  const elements = other
    .replace(/[[\]()（）]/g, " ")
    .split(" ")
    .filter((x) => x !== "");

  let sub: string | undefined;
  let resolution: string | undefined;
  let source: string | undefined;
  for (const element of elements) {
    if (SUB_RE.test(element)) {
      if (sub === undefined) sub = element;
    } else if (RESOLUTION_RE.test(element)) {
      if (resolution === undefined) resolution = element;
    } else if (SOURCE_RE.test(element)) {
      if (source === undefined) source = element;
    }
  }
  return { sub: cleanSub(sub), resolution, source };
}
