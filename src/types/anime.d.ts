/** RSS 订阅源 */
export type RssFeed = {
  /** 订阅地址 */
  url: string;
  /** 备注名 */
  name?: string;
  /** 是否启用 */
  enabled: boolean;
};

/** 单条 RSS 条目 */
export type RssItem = {
  /** 发布标题 */
  title: string;
  /** 条目页面链接 */
  link: string;
  /** torrent 文件或磁力链接（enclosure url） */
  torrent?: string;
  /** 发布时间 */
  pubDate?: string;
};

/** 番剧记录，对应 bangumi 集合中的文档 */
export type Bangumi = {
  /** 自增 ID */
  id: number;
  /** 展示用的标题 */
  official_title: string;
  /** 年份 */
  year?: string;
  /** 用于匹配种子名称的标题，历史数据里可能为 null */
  title_raw: string | null;
  /** 季度 */
  season: number;
  /** 原始季度标记 */
  season_raw?: string;
  /** 字幕组 */
  group_name?: string;
  /** 分辨率 */
  dpi?: string;
  /** 片源 */
  source?: string;
  /** 字幕信息 */
  subtitle?: string;
  /** 是否需要补全旧集 */
  eps_collect: boolean;
  /** 集数偏移 */
  offset: number;
  /** 过滤规则，逗号分隔 */
  filter: string;
  /** 来源 RSS，逗号分隔 */
  rss_link: string;
  /** 海报地址 */
  poster_link?: string;
  /** 是否已添加到下载器 */
  added: boolean;
  /** 下载保存路径 */
  save_path?: string;
  /** 是否已删除 */
  deleted: boolean;
  /** 别名列表的 JSON 字符串，历史数据里可能含有 null */
  title_aliases?: string | null;
  /** 数据库中创建时间 */
  createdAt?: Date;
  /** 数据库中最后更新时间 */
  updatedAt?: Date;
};

/** 新建番剧时尚未分配 ID */
export type NewBangumi = Omit<Bangumi, "id">;

/** 已处理过的种子记录，对应 torrents 集合 */
export type TorrentRecord = {
  /** 种子标题 */
  name: string;
  /** 下载地址 */
  url: string;
  /** 所属番剧 ID */
  bangumi_id?: number;
  /** 是否已提交下载 */
  downloaded: boolean;
  /** 记录时间 */
  createdAt?: Date;
};

/** 从媒体文件名解析出的剧集信息 */
export type EpisodeFile = {
  /** 种子内的原始路径 */
  media_path: string;
  /** 字幕组 */
  group?: string;
  /** 标题 */
  title: string;
  /** 季度 */
  season: number;
  /** 集数 */
  episode: number;
  /** 扩展名，含 “.” */
  suffix: string;
};

/** 从字幕文件名解析出的剧集信息 */
export type SubtitleFile = EpisodeFile & {
  /** 字幕语言，如 zh、zh-tw */
  language: string;
};

/** 重命名方式 */
export type RenameMethod =
  | "none"
  | "pn"
  | "advance"
  | "normal"
  | "subtitle_pn"
  | "subtitle_advance"
  | "subtitle_none";

/** 一次 RSS 刷新的统计 */
export type RefreshResult = {
  /** 提交下载的条目数 */
  added: number;
  /** 被过滤规则排除的条目数 */
  filtered: number;
  /** 标题无法解析而跳过的条目数 */
  unparsed: number;
  /** 处理出错的条目数 */
  failed: number;
};
