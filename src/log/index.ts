type LogLevel = "debug" | "info" | "warn" | "error";

const levelColor: Record<LogLevel, string> = {
  debug: "\x1b[90m",
  info: "\x1b[36m",
  warn: "\x1b[33m",
  error: "\x1b[31m",
};

let debugEnabled =
  process.argv.includes("--debug") || process.env.LOG_DEBUG === "true";
let silent = process.env.LOG_SILENT === "true";

/** 格式化当前时间，形如 2024-07-20 01:56:00 */
function timestamp() {
  const d = new Date();
  const pad = (n: number) => String(n).padStart(2, "0");
  return `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())} ${pad(
    d.getHours()
  )}:${pad(d.getMinutes())}:${pad(d.getSeconds())}`;
}

function write(level: LogLevel, args: unknown[]) {
  if (silent) return;
  if (level === "debug" && !debugEnabled) return;
  const prefix = `${levelColor[level]}[${timestamp()}] [${level.toUpperCase()}]\x1b[0m`;
  const method =
    level === "error"
      ? console.error
      : level === "warn"
      ? console.warn
      : console.log;
  method(prefix, ...args);
}

const logger = {
  debug: (...args: unknown[]) => write("debug", args),
  info: (...args: unknown[]) => write("info", args),
  warn: (...args: unknown[]) => write("warn", args),
  error: (...args: unknown[]) => write("error", args),
  /**
   * 开关调试日志，配置中的 log.debug_enable 会在启动时写入这里
   * @param enable - 是否输出 debug 级别日志
   */
  setDebug(enable: boolean) {
    debugEnabled = enable || process.argv.includes("--debug");
  },
  /** 测试中关闭所有输出 */
  setSilent(value: boolean) {
    silent = value;
  },
  isDebug() {
    return debugEnabled;
  },
};

export default logger;
