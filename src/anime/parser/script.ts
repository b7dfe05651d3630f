import type { ScriptClass } from "../../types/parser.js";

// 按 Unicode 区块判断字符类型，不依赖运行环境的 locale
const HAN_RANGES: ReadonlyArray<readonly [number, number]> = [
  [0x3400, 0x4dbf], // CJK 扩展 A
  [0x4e00, 0x9fff], // CJK 统一汉字
  [0xf900, 0xfaff], // CJK 兼容汉字
  [0x20000, 0x2a6df], // CJK 扩展 B
];

const KANA_RANGES: ReadonlyArray<readonly [number, number]> = [
  [0x3040, 0x309f], // 平假名
  [0x30a0, 0x30ff], // 片假名（含长音符 ー）
  [0x31f0, 0x31ff], // 片假名音标扩展
  [0xff66, 0xff9f], // 半角片假名
];

function inRanges(
  code: number,
  ranges: ReadonlyArray<readonly [number, number]>
) {
  return ranges.some(([start, end]) => code >= start && code <= end);
}

/**
 * 判断单个字符的文字类型
 * @param ch - 单个字符（按码点）
 */
export function classifyChar(ch: string): ScriptClass {
  const code = ch.codePointAt(0);
  if (code === undefined) return "other";
  if (inRanges(code, HAN_RANGES)) return "han";
  if (inRanges(code, KANA_RANGES)) return "kana";
  if ((code >= 0x41 && code <= 0x5a) || (code >= 0x61 && code <= 0x7a)) {
    return "latin";
  }
  if (code >= 0x30 && code <= 0x39) return "digit";
  if (ch.trim() === "") return "space";
  return "other";
}

/**
 * 字符串中某类字符的最长连续长度
 * @param text - 待检测文本
 * @param kind - 字符类型
 */
export function longestRun(text: string, kind: ScriptClass) {
  let best = 0;
  let current = 0;
  for (const ch of text) {
    if (classifyChar(ch) === kind) {
      current++;
      if (current > best) best = current;
    } else {
      current = 0;
    }
  }
  return best;
}

/** 是否含有日文假名（连续两个及以上） */
export function hasKana(text: string) {
  return longestRun(text, "kana") >= 2;
}

/** 是否含有中文汉字（连续两个及以上） */
export function hasHan(text: string) {
  return longestRun(text, "han") >= 2;
}

/** 是否含有英文单词（连续三个及以上拉丁字母） */
export function hasLatinWord(text: string) {
  return longestRun(text, "latin") >= 3;
}

/** 是否含有任意拉丁字母 */
export function hasLatin(text: string) {
  return longestRun(text, "latin") >= 1;
}

/**
 * 文本是否以两个汉字开头
 * @param text - 待检测文本
 */
export function startsWithHan(text: string) {
  const chars = [...text];
  return (
    chars.length >= 2 &&
    classifyChar(chars[0]) === "han" &&
    classifyChar(chars[1]) === "han"
  );
}

/** 文本是否以数字开头 */
export function startsWithDigit(text: string) {
  const first = [...text][0];
  return first !== undefined && classifyChar(first) === "digit";
}
