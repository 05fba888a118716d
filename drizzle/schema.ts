import { integer, text, sqliteTable, real, index, uniqueIndex } from "drizzle-orm/sqlite-core";

// Pool accounts being tracked (a payout address on a given pool adapter)
export const trackedAccounts = sqliteTable(
  "tracked_accounts",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    name: text("name").notNull(),
    address: text("address").notNull(),
    adapterKey: text("adapterKey").notNull(),
    coin: text("coin").notNull(),
    enabled: integer("enabled", { mode: "boolean" }).notNull().default(true),
    createdAt: integer("createdAt", { mode: "timestamp_ms" }).notNull().$defaultFn(() => new Date()),
  },
  (table) => ({
    addressAdapterIdx: uniqueIndex("tracked_accounts_address_adapter").on(table.address, table.adapterKey),
  })
);

export type TrackedAccount = typeof trackedAccounts.$inferSelect;
export type InsertTrackedAccount = typeof trackedAccounts.$inferInsert;

// Pool-level snapshots - one row per account per pool cycle
export const poolSnapshots = sqliteTable(
  "pool_snapshots",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    timestamp: integer("timestamp", { mode: "timestamp_ms" }).notNull().$defaultFn(() => new Date()),
    accountId: integer("accountId"),
    poolName: text("poolName").notNull(),
    coin: text("coin").notNull(),
    hashrate: real("hashrate").notNull().default(0), // H/s
    hashrateAvg: real("hashrateAvg").notNull().default(0),
    workersOnline: integer("workersOnline").notNull().default(0),
    workersOffline: integer("workersOffline").notNull().default(0),
    balance: real("balance").notNull().default(0),
    paid: real("paid").notNull().default(0),
    bestShare: real("bestShare"),
    bestShareEstimated: integer("bestShareEstimated", { mode: "boolean" }).notNull().default(false),
    bestEver: real("bestEver"),
    networkDifficulty: real("networkDifficulty"),
    rawData: text("rawData"), // JSON
  },
  (table) => ({
    poolTimeIdx: index("pool_snapshots_pool_time").on(table.poolName, table.timestamp),
    accountTimeIdx: index("pool_snapshots_account_time").on(table.accountId, table.timestamp),
  })
);

export type PoolSnapshot = typeof poolSnapshots.$inferSelect;
export type InsertPoolSnapshot = typeof poolSnapshots.$inferInsert;

export const workerSnapshots = sqliteTable(
  "worker_snapshots",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    timestamp: integer("timestamp", { mode: "timestamp_ms" }).notNull().$defaultFn(() => new Date()),
    accountId: integer("accountId"),
    poolName: text("poolName").notNull(),
    workerName: text("workerName").notNull(),
    hashrate: real("hashrate").notNull().default(0),
    hashrateAvg: real("hashrateAvg"),
    bestShare: real("bestShare"),
    sharesCount: integer("sharesCount"),
    offline: integer("offline", { mode: "boolean" }).notNull().default(false),
  },
  (table) => ({
    workerTimeIdx: index("worker_snapshots_worker_time").on(table.poolName, table.workerName, table.timestamp),
  })
);

export type WorkerSnapshot = typeof workerSnapshots.$inferSelect;
export type InsertWorkerSnapshot = typeof workerSnapshots.$inferInsert;

// Best share records - only strictly increasing values per (account, pool)
export const bestShares = sqliteTable(
  "best_shares",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    timestamp: integer("timestamp", { mode: "timestamp_ms" }).notNull().$defaultFn(() => new Date()),
    accountId: integer("accountId").notNull(),
    poolName: text("poolName").notNull(),
    workerName: text("workerName"),
    difficulty: real("difficulty").notNull(),
    isAllTimeBest: integer("isAllTimeBest", { mode: "boolean" }).notNull().default(false),
  },
  (table) => ({
    accountPoolIdx: index("best_shares_account_pool").on(table.accountId, table.poolName),
  })
);

export type BestShare = typeof bestShares.$inferSelect;

// Share submissions synthesized from device accepted-share counter deltas
export const shareSubmissions = sqliteTable(
  "share_submissions",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    timestamp: integer("timestamp", { mode: "timestamp_ms" }).notNull().$defaultFn(() => new Date()),
    accountId: integer("accountId"),
    minerId: integer("minerId"),
    poolName: text("poolName").notNull(),
    workerName: text("workerName"),
    difficulty: real("difficulty").notNull().default(0),
    accepted: integer("accepted", { mode: "boolean" }).notNull().default(true),
  },
  (table) => ({
    accountTimeIdx: index("share_submissions_account_time").on(table.accountId, table.timestamp),
    minerTimeIdx: index("share_submissions_miner_time").on(table.minerId, table.timestamp),
  })
);

export type ShareSubmission = typeof shareSubmissions.$inferSelect;
export type InsertShareSubmission = typeof shareSubmissions.$inferInsert;

// Miners table - mining devices, one row per IP
export const miners = sqliteTable("miners", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  name: text("name").notNull(),
  minerType: text("minerType", { enum: ["bitaxe", "avalon", "antminer", "cgminer"] }).notNull(),
  ipAddress: text("ipAddress").notNull().unique(),
  macAddress: text("macAddress"),
  apiPort: integer("apiPort"),
  model: text("model"),
  status: text("status", { enum: ["online", "idle", "offline", "unknown"] }).notNull().default("unknown"),
  enabled: integer("enabled", { mode: "boolean" }).notNull().default(true),
  autoDiscovered: integer("autoDiscovered", { mode: "boolean" }).notNull().default(false),
  createdAt: integer("createdAt", { mode: "timestamp_ms" }).notNull().$defaultFn(() => new Date()),
  lastSeen: integer("lastSeen", { mode: "timestamp_ms" }),
});

export type Miner = typeof miners.$inferSelect;
export type InsertMiner = typeof miners.$inferInsert;

// Miner configs - device <-> account links; history is kept, one active per miner
export const minerConfigs = sqliteTable(
  "miner_configs",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    minerId: integer("minerId").notNull(),
    accountId: integer("accountId"),
    poolUrl: text("poolUrl"),
    workerName: text("workerName"),
    active: integer("active", { mode: "boolean" }).notNull().default(true),
    detectedAt: integer("detectedAt", { mode: "timestamp_ms" }).notNull().$defaultFn(() => new Date()),
  },
  (table) => ({
    minerActiveIdx: index("miner_configs_miner_active").on(table.minerId, table.active),
  })
);

export type MinerConfig = typeof minerConfigs.$inferSelect;
export type InsertMinerConfig = typeof minerConfigs.$inferInsert;
