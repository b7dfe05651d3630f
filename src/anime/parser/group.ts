/**
 * 统一全角方括号，并去掉首尾空白与换行
 * @param raw - 原始标题
 */
export function preProcess(raw: string) {
  return raw.trim().replace(/[\r\n]+/g, " ").replace(/【/g, "[").replace(/】/g, "]");
}

/**
 * 提取字幕组名称：取开头方括号内的内容
 * 标题不以方括号开头（如 “Title S01E05 [1080p]”）、方括号为空时返回空字符串，
 * 任何输入都不会抛出异常
 * @param title - 发布标题
 * @returns 字幕组名称
 */
export function extractGroup(title: string): string {
  const normalized = title.replace(/【/g, "[").replace(/】/g, "]").trimStart();
  if (!normalized.startsWith("[")) return "";
  const segments = normalized.split(/[[\]]/);
  if (segments.length < 2) return "";
  return segments[1].trim();
}

/**
 * 去掉名称部分开头的字幕组方括号
 * @param name - 名称部分
 * @param group - 字幕组名称
 */
export function stripGroup(name: string, group: string) {
  const trimmed = name.trimStart();
  if (!group) {
    return trimmed.startsWith("[]") ? trimmed.slice(2) : trimmed;
  }
  const tag = `[${group}]`;
  if (trimmed.startsWith(tag)) return trimmed.slice(tag.length);
  const loose = trimmed.match(/^\[\s*([^\]]*?)\s*\]/);
  if (loose && loose[1] === group) return trimmed.slice(loose[0].length);
  return trimmed;
}
