import { z } from "zod";
import type { RenameMethod } from "../types/anime.js";

/** 配置校验失败，issues 中列出每个出错的环境变量 */
export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`配置无效: ${issues.join("; ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

const RENAME_METHODS = [
  "none",
  "pn",
  "advance",
  "normal",
  "subtitle_pn",
  "subtitle_advance",
  "subtitle_none",
] as const satisfies readonly RenameMethod[];

const flag = (fallback: boolean) =>
  z
    .string()
    .optional()
    .transform((value) =>
      value === undefined || value.trim() === ""
        ? fallback
        : ["true", "1", "yes", "on"].includes(value.trim().toLowerCase())
    );

const list = (fallback: string) =>
  z
    .string()
    .default(fallback)
    .transform((value) =>
      value
        .split(",")
        .map((s) => s.trim())
        .filter(Boolean)
    );

const EnvSchema = z.object({
  MONGODB_URI: z.string().min(1, "缺少MONGODB_URI环境变量"),
  RSS_LINKS: list(""),
  RSS_TIME: z.coerce.number().int().positive().default(900),
  RENAME_TIME: z.coerce.number().int().positive().default(60),
  DOWNLOADER_TYPE: z.enum(["qbittorrent", "mock"]).default("qbittorrent"),
  DOWNLOADER_HOST: z.string().default("172.17.0.1:8080"),
  DOWNLOADER_USERNAME: z.string().default("admin"),
  DOWNLOADER_PASSWORD: z.string().default("adminadmin"),
  DOWNLOADER_PATH: z.string().min(1).default("/downloads/Bangumi"),
  DOWNLOADER_SSL: flag(false),
  RSS_PARSER_ENABLE: flag(true),
  RSS_FILTER: list("720,\\d+-\\d"),
  RSS_LANGUAGE: z.enum(["zh", "en", "jp"]).default("zh"),
  BANGUMI_MANAGE_ENABLE: flag(true),
  RENAME_METHOD: z.enum(RENAME_METHODS).default("pn"),
  LOG_DEBUG: flag(false),
});

export type TitleLanguage = "zh" | "en" | "jp";

export type Settings = {
  program: {
    /** RSS 刷新间隔（秒） */
    rss_time: number;
    /** 重命名间隔（秒） */
    rename_time: number;
  };
  downloader: {
    type: "qbittorrent" | "mock";
    readonly host: string;
    readonly username: string;
    readonly password: string;
    path: string;
    ssl: boolean;
  };
  rss_parser: {
    enable: boolean;
    filter: string[];
    language: TitleLanguage;
  };
  bangumi_manage: {
    enable: boolean;
    rename_method: RenameMethod;
  };
  log: {
    debug_enable: boolean;
  };
  mongodb_uri: string;
  rss_links: string[];
};

/**
 * 展开 $VAR 与 ${VAR} 形式的环境变量引用，未定义的变量保持原样
 * @param value - 原始值
 * @param env - 环境变量
 */
export function expandEnv(
  value: string,
  env: Record<string, string | undefined> = process.env
) {
  return value.replace(
    /\$\{(\w+)\}|\$(\w+)/g,
    (match, braced: string | undefined, bare: string | undefined) => {
      const name = braced ?? bare;
      if (name === undefined) return match;
      return env[name] ?? match;
    }
  );
}

/**
 * 从环境变量读取并校验配置
 * 下载器的地址、用户名和密码在读取时才展开环境变量引用
 * @param env - 环境变量，默认为 process.env（需先由 dotenv 加载 .env）
 * @throws {ConfigError} 配置校验失败
 */
export function loadSettings(
  env: Record<string, string | undefined> = process.env
): Settings {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map(
        (issue) => `${issue.path.join(".")}: ${issue.message}`
      )
    );
  }
  const raw = parsed.data;

  return {
    program: {
      rss_time: raw.RSS_TIME,
      rename_time: raw.RENAME_TIME,
    },
    downloader: {
      type: raw.DOWNLOADER_TYPE,
      get host() {
        return expandEnv(raw.DOWNLOADER_HOST, env);
      },
      get username() {
        return expandEnv(raw.DOWNLOADER_USERNAME, env);
      },
      get password() {
        return expandEnv(raw.DOWNLOADER_PASSWORD, env);
      },
      path: raw.DOWNLOADER_PATH,
      ssl: raw.DOWNLOADER_SSL,
    },
    rss_parser: {
      enable: raw.RSS_PARSER_ENABLE,
      filter: raw.RSS_FILTER,
      language: raw.RSS_LANGUAGE,
    },
    bangumi_manage: {
      enable: raw.BANGUMI_MANAGE_ENABLE,
      rename_method: raw.RENAME_METHOD,
    },
    log: {
      debug_enable: raw.LOG_DEBUG,
    },
    mongodb_uri: raw.MONGODB_URI,
    rss_links: raw.RSS_LINKS,
  };
}
