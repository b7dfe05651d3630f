/** 标题解析结果，每个标题解析一次，构造后不可变 */
export type ParsedRelease = {
  /** 字幕组/发布组，无法识别时为空字符串 */
  readonly group: string;
  /** 中文标题 */
  readonly title_zh?: string;
  /** 英文标题 */
  readonly title_en?: string;
  /** 日文标题 */
  readonly title_jp?: string;
  /** 去除字幕组、季度标记后的名称部分，用于别名匹配 */
  readonly title_raw: string;
  /** 季度，没有季度标记时为 1 */
  readonly season: number;
  /** 标题中的原始季度标记，如 “第二季”、“S02” */
  readonly season_raw?: string;
  /** 集数，0 表示 SP/OVA */
  readonly episode?: number;
  /** 分辨率，保留原大小写，如 1080p、1920X1080 */
  readonly resolution?: string;
  /** 片源，如 WebRip、Baha */
  readonly source?: string;
  /** 字幕信息，如 简繁日内封 */
  readonly sub?: string;
};

/** 结构模板切分结果 */
export type TemplateMatch = {
  /** 命中的模板名称 */
  template: TemplateName;
  /** 名称部分（含字幕组） */
  name: string;
  /** 集数原文 */
  episode: string;
  /** 模板自带的季度（SxxEyy） */
  season?: string;
  /** 集数之后的元数据部分 */
  other: string;
  /** 名称部分是否带有多语言标题 */
  localized: boolean;
};

export type TemplateName =
  | "western"
  | "bracket-episode-marker"
  | "episode-marker"
  | "dash"
  | "bracket-episode"
  | "compound-episode"
  | "ep-marker"
  | "inline";

/** 结构模板：正则 + 字段提取函数 */
export type StructuralTemplate = {
  readonly name: TemplateName;
  readonly pattern: RegExp;
  readonly extract: (groups: Record<string, string | undefined>) => {
    name: string;
    episode: string;
    season?: string;
    other: string;
  } | null;
  /** 是否按多语言标题处理名称部分 */
  readonly localized: boolean;
};

/** 按语言拆分后的标题 */
export type NameParts = {
  title_zh?: string;
  title_en?: string;
  title_jp?: string;
};

/** 字符分类 */
export type ScriptClass = "han" | "kana" | "latin" | "digit" | "space" | "other";

/** 季度提取结果 */
export type SeasonInfo = {
  /** 去除季度标记后的名称 */
  name: string;
  /** 季度数字 */
  season: number;
  /** 原始季度标记，没有时为空字符串 */
  season_raw: string;
};

/** 元数据标签 */
export type ReleaseTags = {
  sub?: string;
  resolution?: string;
  source?: string;
};
