import path from "node:path";
import logger from "../log/index.js";
import type { TitleLanguage } from "../config/index.js";
import type { BangumiStore } from "../database/bangumi.js";
import type {
  EpisodeFile,
  RenameMethod,
  SubtitleFile,
} from "../types/anime.js";
import type { DownloadClient } from "../types/torrent.js";
import { rawParser } from "./parser/rawParser.js";

const MEDIA_SUFFIXES = [".mp4", ".mkv"];
const SUBTITLE_SUFFIXES = [".ass", ".srt"];

const SUBTITLE_LANGUAGES: ReadonlyArray<readonly [string, readonly string[]]> =
  [
    ["zh-tw", ["tc", "cht", "繁", "zh-tw"]],
    ["zh", ["sc", "chs", "简", "zh"]],
  ];

/** 下载器中番剧种子的分类 */
export const BANGUMI_CATEGORY = "Bangumi";

/** 种子标签前缀，后接番剧 ID */
export const BANGUMI_TAG_PREFIX = "ab:";

/** 已整理完的种子打上该标签，之后不再处理，集数偏移只生效一次 */
export const RENAMED_TAG = "ab:renamed";

const pad = (n: number) => String(n).padStart(2, "0");

/**
 * 生成重命名后的文件名
 *
 * 第 0 集（SP/OVA）不受偏移影响；偏移后小于 1 的集数保留原值。
 * @param file - 剧集文件信息
 * @param bangumiName - 番剧名称，advance 方式使用
 * @param method - 重命名方式
 * @param episodeOffset - 集数偏移
 */
export function genPath(
  file: EpisodeFile | SubtitleFile,
  bangumiName: string,
  method: RenameMethod,
  episodeOffset = 0
) {
  const original = file.episode;
  let episode = original;
  if (original !== 0) {
    episode = original + episodeOffset;
    if (episode < 1) episode = original;
  }
  const marker = `S${pad(file.season)}E${pad(episode)}`;
  const language = "language" in file ? `.${file.language}` : "";

  switch (method) {
    case "pn":
      return `${file.title} ${marker}${file.suffix}`;
    case "advance":
      return `${bangumiName} ${marker}${file.suffix}`;
    case "subtitle_pn":
      return `${file.title} ${marker}${language}${file.suffix}`;
    case "subtitle_advance":
      return `${bangumiName} ${marker}${language}${file.suffix}`;
    case "normal":
      logger.warn("normal 重命名方式已弃用，保持原文件名");
      return file.media_path;
    case "none":
    case "subtitle_none":
      return file.media_path;
  }
}

/**
 * 从目录名中读取季度，如 “Season 2”、“S02”
 * @param mediaPath - 种子内的文件路径
 */
export function seasonFromPath(mediaPath: string) {
  const dirs = path.posix.dirname(mediaPath.replace(/\\/g, "/")).split("/");
  for (const dir of dirs.reverse()) {
    const match = dir.match(/^(?:Season\s*(\d{1,2})|S(\d{1,2}))$/i);
    if (match) return Number.parseInt(match[1] ?? match[2], 10);
  }
  return undefined;
}

/**
 * 识别字幕语言，无法识别时视为简体中文
 * @param fileName - 字幕文件名
 */
export function subtitleLanguage(fileName: string) {
  const lower = fileName.toLowerCase();
  for (const [language, keys] of SUBTITLE_LANGUAGES) {
    if (keys.some((key) => lower.includes(key))) return language;
  }
  return "zh";
}

/**
 * 解析种子内的媒体文件名
 * @param mediaPath - 种子内的文件路径
 * @param language - 首选的标题语言
 * @returns 剧集信息，文件名无法解析时为 null
 */
export function parseEpisodeFile(
  mediaPath: string,
  language: TitleLanguage = "zh"
): EpisodeFile | null {
  const normalized = mediaPath.replace(/\\/g, "/");
  const suffix = path.posix.extname(normalized);
  const release = rawParser(path.posix.basename(normalized, suffix));
  if (!release || release.episode === undefined) return null;

  const preferred =
    language === "en"
      ? release.title_en
      : language === "jp"
      ? release.title_jp
      : release.title_zh;
  const title =
    preferred ??
    release.title_zh ??
    release.title_en ??
    release.title_jp ??
    release.title_raw;

  return {
    media_path: mediaPath,
    group: release.group || undefined,
    title,
    season: seasonFromPath(mediaPath) ?? release.season,
    episode: release.episode,
    suffix,
  };
}

/**
 * 解析种子内的字幕文件名
 * @param subtitlePath - 种子内的文件路径
 * @param language - 首选的标题语言
 */
export function parseSubtitleFile(
  subtitlePath: string,
  language: TitleLanguage = "zh"
): SubtitleFile | null {
  const episode = parseEpisodeFile(subtitlePath, language);
  if (!episode) return null;
  return {
    ...episode,
    language: subtitleLanguage(path.posix.basename(subtitlePath)),
  };
}

function subtitleMethod(method: RenameMethod): RenameMethod {
  if (method === "pn") return "subtitle_pn";
  if (method === "advance") return "subtitle_advance";
  return "subtitle_none";
}

/**
 * 从种子标签中读取番剧 ID
 * @param tags - 种子标签
 */
export function bangumiIdFromTags(tags: readonly string[]) {
  for (const tag of tags) {
    if (!tag.startsWith(BANGUMI_TAG_PREFIX)) continue;
    const id = Number.parseInt(tag.slice(BANGUMI_TAG_PREFIX.length), 10);
    if (Number.isSafeInteger(id)) return id;
  }
  return undefined;
}

export type RenameDeps = {
  downloader: DownloadClient;
  bangumiStore: BangumiStore;
  method: RenameMethod;
  language: TitleLanguage;
};

/**
 * 重命名已完成的番剧种子中的媒体与字幕文件
 * 全部文件处理成功的种子会打上 RENAMED_TAG，下一轮跳过；
 * 单个种子出错只记录日志，不影响其他种子
 * @returns 成功重命名的文件数
 */
export async function renameTorrents(deps: RenameDeps) {
  const { downloader, bangumiStore, method, language } = deps;
  const torrents = await downloader.getTorrents({
    category: BANGUMI_CATEGORY,
    status: "completed",
  });

  let renamed = 0;
  for (const torrent of torrents) {
    if (torrent.tags.includes(RENAMED_TAG)) continue;
    try {
      let complete = true;
      const id = bangumiIdFromTags(torrent.tags);
      const bangumi = id === undefined ? null : await bangumiStore.getById(id);
      const offset = bangumi?.offset ?? 0;
      const files = await downloader.getTorrentFiles(torrent.hash);

      for (const file of files) {
        const suffix = path.posix.extname(file.name).toLowerCase();
        let info: EpisodeFile | SubtitleFile | null = null;
        let fileMethod = method;
        if (MEDIA_SUFFIXES.includes(suffix)) {
          info = parseEpisodeFile(file.name, language);
        } else if (SUBTITLE_SUFFIXES.includes(suffix)) {
          info = parseSubtitleFile(file.name, language);
          fileMethod = subtitleMethod(method);
        } else {
          continue;
        }
        if (!info) {
          logger.debug(`无法解析的文件名: ${file.name}`);
          continue;
        }

        const name = genPath(
          info,
          bangumi?.official_title ?? info.title,
          fileMethod,
          offset
        );
        const dir = path.posix.dirname(file.name);
        const newPath =
          name === file.name || dir === "." ? name : `${dir}/${name}`;
        if (newPath === file.name) continue;

        if (await downloader.renameFile(torrent.hash, file.name, newPath)) {
          logger.info(`重命名: ${file.name} -> ${newPath}`);
          renamed++;
        } else {
          complete = false;
        }
      }

      if (complete) {
        await downloader.addTag(torrent.hash, RENAMED_TAG);
      }
    } catch (err) {
      logger.error(`重命名种子失败: ${torrent.name}`, err);
    }
  }
  return renamed;
}
