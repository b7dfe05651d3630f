import "dotenv/config";
import { anime } from "./anime/index.js";
import { loadSettings } from "./config/index.js";
import { createBangumiStore, createTorrentStore } from "./database/bangumi.js";
import { getDatabase } from "./database/initDb.js";
import logger from "./log/index.js";
import { createDownloader } from "./qBittorrent/index.js";

(async () => {
  const settings = loadSettings();
  logger.setDebug(settings.log.debug_enable);

  const db = await getDatabase(settings.mongodb_uri);
  const downloader = createDownloader(settings.downloader);
  if (!(await downloader.auth())) {
    process.exit(1);
  }
  logger.info(`下载器已连接: ${await downloader.checkConnection()}`);

  await anime(
    {
      bangumiStore: createBangumiStore(db),
      torrentStore: createTorrentStore(db),
      downloader,
    },
    settings
  );
})().catch((err: unknown) => {
  logger.error("启动失败", err);
  process.exit(1);
});
