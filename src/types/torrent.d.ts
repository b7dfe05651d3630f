/** 下载器中的种子 */
export type TorrentInfo = {
  /** 种子 hash */
  hash: string;
  /** 种子名称 */
  name: string;
  /** 分类 */
  category: string;
  /** 标签列表 */
  tags: string[];
  /** 保存路径 */
  save_path: string;
  /** 当前状态（如 downloading, uploading 等） */
  state: string;
  /** 下载进度（0-1） */
  progress: number;
};

/** 种子内的文件 */
export type TorrentFile = {
  /** 相对于种子根目录的路径 */
  name: string;
  /** 文件大小（字节） */
  size: number;
};

/** 添加种子的参数，urls 与 files 至少提供一个 */
export type AddTorrentOptions = {
  /** 磁力链接或 torrent 地址 */
  urls?: string[];
  /** torrent 文件内容 */
  files?: Buffer[];
  /** 保存路径 */
  savePath: string;
  /** 分类 */
  category: string;
  /** 标签 */
  tags?: string;
};

export type TorrentFilter = {
  category?: string;
  tag?: string;
  status?: "all" | "completed" | "downloading";
};

/** 下载器需要实现的接口 */
export interface DownloadClient {
  /** 登录，成功返回 true */
  auth(): Promise<boolean>;
  /** 返回下载器版本 */
  checkConnection(): Promise<string>;
  addTorrents(options: AddTorrentOptions): Promise<boolean>;
  getTorrents(filter?: TorrentFilter): Promise<TorrentInfo[]>;
  getTorrentFiles(hash: string): Promise<TorrentFile[]>;
  renameFile(hash: string, oldPath: string, newPath: string): Promise<boolean>;
  addTag(hash: string, tag: string): Promise<void>;
}
