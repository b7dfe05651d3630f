import type { Db, WithId } from "mongodb";
import logger from "../log/index.js";
import type {
  Bangumi,
  NewBangumi,
  TorrentRecord,
} from "../types/anime.js";
import { mergeAlias } from "./match.js";

/** 番剧存储 */
export interface BangumiStore {
  /** 所有番剧，包括已删除的 */
  searchAll(): Promise<Bangumi[]>;
  getById(id: number): Promise<Bangumi | null>;
  /** 保存新番剧并分配自增 ID */
  add(bangumi: NewBangumi): Promise<Bangumi>;
  update(id: number, patch: Partial<NewBangumi>): Promise<boolean>;
  /** 追加别名，别名为空、重复或番剧不存在时返回 false */
  addTitleAlias(id: number, alias: string | null | undefined): Promise<boolean>;
}

/** 已处理种子的存储 */
export interface TorrentStore {
  hasTorrent(url: string): Promise<boolean>;
  addTorrents(items: TorrentRecord[]): Promise<void>;
}

type SequenceDoc = {
  key: string;
  seq: number;
};

function toBangumi(doc: WithId<Bangumi>): Bangumi {
  const { _id, ...bangumi } = doc;
  return bangumi;
}

/** 获取下一个自增序列值
 * @param db - 数据库连接
 * @param name - 序列名称
 * @returns 下一个序列值
 */
async function getNextSequence(db: Db, name: string) {
  const result = await db
    .collection<SequenceDoc>("config")
    .findOneAndUpdate(
      { key: name },
      { $inc: { seq: 1 } },
      { upsert: true, returnDocument: "after" }
    );
  if (!result) {
    throw new Error(`获取序列 ${name} 失败`);
  }
  return result.seq;
}

/**
 * 基于 MongoDB 的番剧存储
 * @param db - 数据库连接
 */
export function createBangumiStore(db: Db): BangumiStore {
  const collection = db.collection<Bangumi>("bangumi");

  return {
    async searchAll() {
      const docs = await collection.find({}).sort({ id: 1 }).toArray();
      return docs.map(toBangumi);
    },

    async getById(id) {
      const doc = await collection.findOne({ id });
      return doc ? toBangumi(doc) : null;
    },

    async add(bangumi) {
      try {
        const id = await getNextSequence(db, "bangumiId");
        const now = new Date();
        const record: Bangumi = {
          ...bangumi,
          id,
          createdAt: now,
          updatedAt: now,
        };
        await collection.insertOne({ ...record });
        logger.debug(`新增番剧 ${id}: ${record.official_title}`);
        return record;
      } catch (error) {
        throw new Error(
          `保存番剧失败: ${error instanceof Error ? error.message : error}`
        );
      }
    },

    async update(id, patch) {
      try {
        const result = await collection.updateOne(
          { id },
          { $set: { ...patch, updatedAt: new Date() } }
        );
        return result.matchedCount > 0;
      } catch (error) {
        throw new Error(
          `更新番剧 ${id} 失败: ${error instanceof Error ? error.message : error}`
        );
      }
    },

    async addTitleAlias(id, alias) {
      const doc = await collection.findOne({ id });
      if (!doc) return false;
      const aliases = mergeAlias(doc, alias);
      if (aliases === null) return false;
      await collection.updateOne(
        { id },
        { $set: { title_aliases: aliases, updatedAt: new Date() } }
      );
      return true;
    },
  };
}

/**
 * 基于 MongoDB 的种子记录存储，按下载地址去重
 * @param db - 数据库连接
 */
export function createTorrentStore(db: Db): TorrentStore {
  const collection = db.collection<TorrentRecord>("torrents");

  return {
    async hasTorrent(url) {
      const doc = await collection.findOne({ url });
      return doc !== null;
    },

    async addTorrents(items) {
      if (items.length === 0) return;
      try {
        await collection.bulkWrite(
          items.map((item) => ({
            updateOne: {
              filter: { url: item.url },
              update: {
                $setOnInsert: {
                  ...item,
                  createdAt: item.createdAt ?? new Date(),
                },
              },
              upsert: true,
            },
          }))
        );
      } catch (error) {
        throw new Error(
          `保存种子信息失败: ${error instanceof Error ? error.message : error}`
        );
      }
    },
  };
}
