import logger from "../../log/index.js";

// 进程内缓存，按过滤字符串原文索引
const filterCache = new Map<string, RegExp>();

// 永远不会匹配的正则
const NEVER = /(?!)/;

function escapeRegExp(text: string) {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function compileFilter(filter: string) {
  const parts = filter
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);
  if (parts.length === 0) return NEVER;

  try {
    return new RegExp(parts.join("|"), "i");
  } catch (error) {
    logger.warn(
      `过滤规则不是合法的正则，按字面匹配: ${filter}`,
      error instanceof Error ? error.message : error
    );
    return new RegExp(parts.map(escapeRegExp).join("|"), "i");
  }
}

/**
 * 获取过滤规则对应的正则
 * 逗号分隔的每一项作为一个分支；不是合法正则时退回字面匹配，不会抛出异常
 * @param filter - 逗号分隔的过滤规则，如 "720,\d+-\d"
 * @returns 编译后的正则，同一字符串始终返回同一个对象
 */
export function getFilterPattern(filter: string) {
  const cached = filterCache.get(filter);
  if (cached) return cached;
  const pattern = compileFilter(filter);
  filterCache.set(filter, pattern);
  return pattern;
}

/**
 * 标题是否命中过滤规则（命中即不下载）
 * @param title - RSS 条目标题
 * @param filter - 逗号分隔的过滤规则
 */
export function isFiltered(title: string, filter: string) {
  return getFilterPattern(filter).test(title);
}
