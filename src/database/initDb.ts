import { MongoClient, type Db } from "mongodb";
import logger from "../log/index.js";

let databasePromise: Promise<Db> | null = null;

// 连接数据库的函数
async function connectDB(uri: string) {
  const dbclient = new MongoClient(uri);
  try {
    await dbclient.connect();
    logger.info("数据库连接成功");
    return dbclient;
  } catch (err) {
    logger.error("数据库连接失败", err);
    throw new Error(
      `数据库连接失败: ${err instanceof Error ? err.message : err}`
    );
  }
}

/**
 * 连接数据库并创建所需的索引
 * @param uri - MongoDB 连接串
 */
async function initdb(uri: string) {
  logger.info("正在连接数据库...");
  const dbclient = await connectDB(uri);

  const db = dbclient.db("bangumi");

  try {
    await db
      .collection("torrents")
      .createIndex({ url: 1 }, { unique: true, name: "url_unique_idx" });
    await db
      .collection("bangumi")
      .createIndex({ id: 1 }, { unique: true, name: "id_unique_idx" });
  } catch (err) {
    logger.error("创建索引时出错", err);
    throw err;
  }

  return db;
}

/**
 * 获取数据库连接，首次调用时建立连接，之后复用
 * @param uri - MongoDB 连接串
 * @returns 数据库连接的Promise
 */
export async function getDatabase(uri: string) {
  if (!databasePromise) {
    databasePromise = initdb(uri).catch((err: unknown) => {
      databasePromise = null;
      throw err;
    });
  }
  return await databasePromise;
}
