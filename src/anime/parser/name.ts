import type { NameParts } from "../../types/parser.js";
import { stripGroup } from "./group.js";
import {
  hasHan,
  hasKana,
  hasLatin,
  hasLatinWord,
  startsWithDigit,
  startsWithHan,
} from "./script.js";

// ★04月新番★、[4月新番]、【新番】，不会匹配标题里的 “哆啦A梦新番”
const NEW_SERIES_RE =
  /(?:[[★](?:\d{1,2}月)?新番[\]★]?|★?\d{1,2}月新番[\]★]?)/g;

const REGION_RE = /[(（[]仅限港澳台(?:地区)?[)）\]]/g;

/**
 * 清理名称部分：去掉开头的字幕组方括号、新番标记与地区限定标记
 * @param nameBlock - 模板切分得到的名称部分
 * @param group - 字幕组名称
 */
export function cleanNameBlock(nameBlock: string, group: string) {
  return stripGroup(nameBlock, group)
    .replace(NEW_SERIES_RE, "")
    .replace(REGION_RE, "");
}

function trimPiece(piece: string) {
  return piece.replace(/^[\s/／]+|[\s/／]+$/g, "");
}

/**
 * 把混合文字、无分隔符的名称在第一个以两个汉字开头的词处切开
 * “天国大魔境 Tengoku Daimakyou” → [“天国大魔境”, “Tengoku Daimakyou”]
 * 词中夹有拉丁字母时会切错（“身为 VTuber 的我…”），保持现状
 */
function splitMixedScript(piece: string) {
  if (!hasHan(piece) || !hasLatin(piece) || startsWithDigit(piece)) {
    return [piece];
  }
  const tokens = piece.split(" ").filter((token) => token !== "");
  const index = tokens.findIndex((token) => startsWithHan(token));
  if (index < 0) return [piece];
  const rest = tokens.filter((_, i) => i !== index);
  return [tokens[index], rest.join(" ")];
}

/**
 * 按语言拆分名称部分
 *
 * 先按 “/”、“／” 或连续空白切分；只有一段时依次尝试 “_”、“ - ” 和
 * 中英混排切分。每一段按文字类型归入日文、中文或英文标题，
 * 同一语言只取第一段。
 * @param nameBlock - 已去除字幕组与季度标记的名称部分
 * @returns 各语言标题，无法识别的语言不出现
 */
export function splitName(nameBlock: string): NameParts {
  const name = nameBlock.replace(REGION_RE, "").trim();

  let pieces = name.split(/\/|／|\s{2,}/).filter((x) => x.trim() !== "");
  if (pieces.length === 1) {
    if (name.includes("_")) {
      pieces = name.split("_");
    } else if (name.includes(" - ")) {
      pieces = name.split(" - ");
    }
  }
  if (pieces.length === 1) {
    pieces = splitMixedScript(pieces[0]);
  }

  const result: NameParts = {};
  for (const raw of pieces) {
    const piece = trimPiece(raw);
    if (!piece) continue;
    if (hasKana(piece) && result.title_jp === undefined) {
      result.title_jp = piece;
    } else if (hasHan(piece) && result.title_zh === undefined) {
      result.title_zh = piece;
    } else if (hasLatinWord(piece) && result.title_en === undefined) {
      result.title_en = piece;
    }
  }
  return result;
}
