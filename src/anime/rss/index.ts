import axios from "axios";
import * as cheerio from "cheerio";
import logger from "../../log/index.js";
import type { RssItem } from "../../types/anime.js";

/**
 * 解析 RSS 2.0 文档
 * 没有标题或下载地址的条目会被跳过
 * @param xml - RSS 文本
 */
export function parseRssXml(xml: string): RssItem[] {
  const $ = cheerio.load(xml, { xml: true });
  const items: RssItem[] = [];

  $("channel > item").each((_, element) => {
    const item = $(element);
    const title = item.children("title").first().text().trim();
    const link = item.children("link").first().text().trim();
    const torrent = item.children("enclosure").first().attr("url")?.trim();
    // 蜜柑计划的发布时间在 <torrent><pubDate> 中
    const pubDate =
      item.children("pubDate").first().text().trim() ||
      item.find("torrent > pubDate").first().text().trim();

    if (!title || (!link && !torrent)) {
      logger.debug("跳过不完整的 RSS 条目:", title || "(无标题)");
      return;
    }
    items.push({
      title,
      link,
      torrent: torrent || undefined,
      pubDate: pubDate || undefined,
    });
  });

  return items;
}

/**
 * 获取并解析 RSS 订阅
 * @param url - 订阅地址
 * @throws 请求或解析失败时抛出异常
 */
export async function fetchRss(url: string) {
  try {
    const response = await axios.get<string>(url, {
      responseType: "text",
      timeout: 30000,
    });
    const items = parseRssXml(response.data);
    logger.debug(`RSS数据获取完成 - ${url}: ${items.length}`);
    return items;
  } catch (error) {
    throw new Error(
      `RSS获取失败: ${url}: ${error instanceof Error ? error.message : error}`
    );
  }
}
