import initSqlJs, { type Database as SqlJsDatabase } from "sql.js";
import { drizzle, type SQLJsDatabase } from "drizzle-orm/sql-js";
import { and, asc, desc, eq, gte, isNotNull, lt, sql } from "drizzle-orm";
import { existsSync, mkdirSync, readFileSync, writeFileSync } from "fs";
import { dirname } from "path";
import * as schema from "../drizzle/schema";
import {
  bestShares,
  minerConfigs,
  miners,
  poolSnapshots,
  shareSubmissions,
  trackedAccounts,
  workerSnapshots,
  type BestShare,
  type InsertMiner,
  type InsertPoolSnapshot,
  type InsertShareSubmission,
  type InsertWorkerSnapshot,
  type Miner,
  type MinerConfig,
  type PoolSnapshot,
  type ShareSubmission,
  type TrackedAccount,
  type WorkerSnapshot,
} from "../drizzle/schema";
import { ENV } from "./_core/env";
import { createLogger } from "./_core/logger";
import type { JsonObject } from "./normalize";

export type AppDatabase = SQLJsDatabase<typeof schema>;

const log = createLogger("Database");
const IN_MEMORY = ":memory:";
const HOUR_MS = 60 * 60 * 1000;
const DAY_MS = 24 * HOUR_MS;

let _sqlite: SqlJsDatabase | null = null;
let _db: AppDatabase | null = null;
let _dbPath = "";
let _dirty = false;
let _saveInterval: NodeJS.Timeout | null = null;
let _opening: Promise<AppDatabase> | null = null;

async function openDatabase(path: string): Promise<AppDatabase> {
  const SQL = await initSqlJs();
  _dbPath = path;

  const fromFile = path !== IN_MEMORY && existsSync(path);
  const sqlite = fromFile ? new SQL.Database(readFileSync(path)) : new SQL.Database();
  log.info(fromFile ? "SQLite loaded from file" : path === IN_MEMORY ? "SQLite in-memory database" : "SQLite created new database");

  if (path !== IN_MEMORY) {
    const dir = dirname(path);
    if (!existsSync(dir)) mkdirSync(dir, { recursive: true });

    // Flush pending writes every 5 seconds
    _saveInterval = setInterval(saveDatabase, 5000);
    _saveInterval.unref();
  }

  createTables(sqlite);
  _sqlite = sqlite;
  _db = drizzle(sqlite, { schema });
  return _db;
}

export async function getDb(): Promise<AppDatabase> {
  if (_db) return _db;
  if (!_opening) {
    _opening = openDatabase(ENV.databaseUrl).catch((err: unknown) => {
      _opening = null;
      log.error("Failed to initialize:", err);
      throw err;
    });
  }
  return _opening;
}

function saveDatabase(): void {
  if (!_sqlite || !_dirty || _dbPath === IN_MEMORY) return;
  try {
    writeFileSync(_dbPath, Buffer.from(_sqlite.export()));
    _dirty = false;
  } catch (error) {
    log.error("Failed to save:", error);
  }
}

function markDirty(): void {
  _dirty = true;
}

/** Flush and close. The next getDb() opens a fresh database. */
export function closeDatabase(): void {
  saveDatabase();
  if (_saveInterval) clearInterval(_saveInterval);
  _saveInterval = null;
  _sqlite?.close();
  _sqlite = null;
  _db = null;
  _opening = null;
  _dirty = false;
}

// ============ DATABASE INITIALIZATION ============

function createTables(db: SqlJsDatabase): void {
  db.run(`
    CREATE TABLE IF NOT EXISTS tracked_accounts (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      name TEXT NOT NULL,
      address TEXT NOT NULL,
      adapterKey TEXT NOT NULL,
      coin TEXT NOT NULL,
      enabled INTEGER DEFAULT 1 NOT NULL,
      createdAt INTEGER NOT NULL
    )
  `);
  db.run(`CREATE UNIQUE INDEX IF NOT EXISTS tracked_accounts_address_adapter ON tracked_accounts (address, adapterKey)`);

  db.run(`
    CREATE TABLE IF NOT EXISTS pool_snapshots (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      timestamp INTEGER NOT NULL,
      accountId INTEGER,
      poolName TEXT NOT NULL,
      coin TEXT NOT NULL,
      hashrate REAL DEFAULT 0 NOT NULL,
      hashrateAvg REAL DEFAULT 0 NOT NULL,
      workersOnline INTEGER DEFAULT 0 NOT NULL,
      workersOffline INTEGER DEFAULT 0 NOT NULL,
      balance REAL DEFAULT 0 NOT NULL,
      paid REAL DEFAULT 0 NOT NULL,
      bestShare REAL,
      bestShareEstimated INTEGER DEFAULT 0 NOT NULL,
      bestEver REAL,
      networkDifficulty REAL,
      rawData TEXT
    )
  `);
  db.run(`CREATE INDEX IF NOT EXISTS pool_snapshots_pool_time ON pool_snapshots (poolName, timestamp)`);
  db.run(`CREATE INDEX IF NOT EXISTS pool_snapshots_account_time ON pool_snapshots (accountId, timestamp)`);

  db.run(`
    CREATE TABLE IF NOT EXISTS worker_snapshots (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      timestamp INTEGER NOT NULL,
      accountId INTEGER,
      poolName TEXT NOT NULL,
      workerName TEXT NOT NULL,
      hashrate REAL DEFAULT 0 NOT NULL,
      hashrateAvg REAL,
      bestShare REAL,
      sharesCount INTEGER,
      offline INTEGER DEFAULT 0 NOT NULL
    )
  `);
  db.run(`CREATE INDEX IF NOT EXISTS worker_snapshots_worker_time ON worker_snapshots (poolName, workerName, timestamp)`);

  db.run(`
    CREATE TABLE IF NOT EXISTS best_shares (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      timestamp INTEGER NOT NULL,
      accountId INTEGER NOT NULL,
      poolName TEXT NOT NULL,
      workerName TEXT,
      difficulty REAL NOT NULL,
      isAllTimeBest INTEGER DEFAULT 0 NOT NULL
    )
  `);
  db.run(`CREATE INDEX IF NOT EXISTS best_shares_account_pool ON best_shares (accountId, poolName)`);

  db.run(`
    CREATE TABLE IF NOT EXISTS share_submissions (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      timestamp INTEGER NOT NULL,
      accountId INTEGER,
      minerId INTEGER,
      poolName TEXT NOT NULL,
      workerName TEXT,
      difficulty REAL DEFAULT 0 NOT NULL,
      accepted INTEGER DEFAULT 1 NOT NULL
    )
  `);
  db.run(`CREATE INDEX IF NOT EXISTS share_submissions_account_time ON share_submissions (accountId, timestamp)`);
  db.run(`CREATE INDEX IF NOT EXISTS share_submissions_miner_time ON share_submissions (minerId, timestamp)`);

  db.run(`
    CREATE TABLE IF NOT EXISTS miners (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      name TEXT NOT NULL,
      minerType TEXT NOT NULL,
      ipAddress TEXT NOT NULL UNIQUE,
      macAddress TEXT,
      apiPort INTEGER,
      model TEXT,
      status TEXT DEFAULT 'unknown' NOT NULL,
      enabled INTEGER DEFAULT 1 NOT NULL,
      autoDiscovered INTEGER DEFAULT 0 NOT NULL,
      createdAt INTEGER NOT NULL,
      lastSeen INTEGER
    )
  `);

  db.run(`
    CREATE TABLE IF NOT EXISTS miner_configs (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      minerId INTEGER NOT NULL,
      accountId INTEGER,
      poolUrl TEXT,
      workerName TEXT,
      active INTEGER DEFAULT 1 NOT NULL,
      detectedAt INTEGER NOT NULL
    )
  `);
  db.run(`CREATE INDEX IF NOT EXISTS miner_configs_miner_active ON miner_configs (minerId, active)`);
}

export async function initializeDatabase(): Promise<void> {
  await getDb();
  log.info("Tables initialized");
}

function cutoff(hours: number): Date {
  return new Date(Date.now() - hours * HOUR_MS);
}

// ============ ACCOUNT FUNCTIONS ============

export type NewAccount = {
  name: string;
  address: string;
  adapterKey: string;
  coin: string;
};

/** Returns null when (address, adapterKey) is already tracked. */
export async function createAccount(input: NewAccount): Promise<TrackedAccount | null> {
  const db = await getDb();
  const existing = db
    .select({ id: trackedAccounts.id })
    .from(trackedAccounts)
    .where(and(eq(trackedAccounts.address, input.address), eq(trackedAccounts.adapterKey, input.adapterKey)))
    .get();
  if (existing) return null;

  const row = db.insert(trackedAccounts).values(input).returning().get();
  markDirty();
  return row ?? null;
}

export async function getAccounts(options: { enabledOnly?: boolean } = {}): Promise<TrackedAccount[]> {
  const db = await getDb();
  return db
    .select()
    .from(trackedAccounts)
    .where(options.enabledOnly ? eq(trackedAccounts.enabled, true) : undefined)
    .orderBy(asc(trackedAccounts.id))
    .all();
}

export async function getAccountById(id: number): Promise<TrackedAccount | undefined> {
  const db = await getDb();
  return db.select().from(trackedAccounts).where(eq(trackedAccounts.id, id)).get();
}

export async function updateAccount(
  id: number,
  updates: Partial<Pick<TrackedAccount, "name" | "enabled">>
): Promise<TrackedAccount | undefined> {
  const db = await getDb();
  if (Object.keys(updates).length > 0) {
    db.update(trackedAccounts).set(updates).where(eq(trackedAccounts.id, id)).run();
    markDirty();
  }
  return getAccountById(id);
}

/** Removes the account with its history; device links to it are deactivated. */
export async function deleteAccount(id: number): Promise<boolean> {
  const db = await getDb();
  const deleted = db.delete(trackedAccounts).where(eq(trackedAccounts.id, id)).returning({ id: trackedAccounts.id }).all();
  if (deleted.length === 0) return false;

  db.delete(poolSnapshots).where(eq(poolSnapshots.accountId, id)).run();
  db.delete(workerSnapshots).where(eq(workerSnapshots.accountId, id)).run();
  db.delete(bestShares).where(eq(bestShares.accountId, id)).run();
  db.delete(shareSubmissions).where(eq(shareSubmissions.accountId, id)).run();
  db.update(minerConfigs).set({ active: false }).where(eq(minerConfigs.accountId, id)).run();
  markDirty();
  return true;
}

// ============ SNAPSHOT FUNCTIONS ============

export type NewPoolSnapshot = Omit<InsertPoolSnapshot, "id" | "timestamp" | "rawData"> & {
  rawData?: JsonObject | null;
};

export async function savePoolSnapshot(input: NewPoolSnapshot): Promise<number> {
  const db = await getDb();
  const { rawData, ...fields } = input;
  const row = db
    .insert(poolSnapshots)
    .values({ ...fields, rawData: rawData ? JSON.stringify(rawData) : null })
    .returning({ id: poolSnapshots.id })
    .get();
  markDirty();
  return row?.id ?? 0;
}

export async function saveWorkerSnapshot(input: Omit<InsertWorkerSnapshot, "id" | "timestamp">): Promise<number> {
  const db = await getDb();
  const row = db.insert(workerSnapshots).values(input).returning({ id: workerSnapshots.id }).get();
  markDirty();
  return row?.id ?? 0;
}

export async function getAccountHistory(accountId: number, hours = 24): Promise<PoolSnapshot[]> {
  const db = await getDb();
  return db
    .select()
    .from(poolSnapshots)
    .where(and(eq(poolSnapshots.accountId, accountId), gte(poolSnapshots.timestamp, cutoff(hours))))
    .orderBy(asc(poolSnapshots.timestamp))
    .all();
}

export type HashratePoint = {
  timestamp: Date;
  hashrate: number;
  hashrateAvg: number;
  workersOnline: number;
};

export async function getHashrateHistory(poolName: string, hours = 24): Promise<HashratePoint[]> {
  const db = await getDb();
  return db
    .select({
      timestamp: poolSnapshots.timestamp,
      hashrate: poolSnapshots.hashrate,
      hashrateAvg: poolSnapshots.hashrateAvg,
      workersOnline: poolSnapshots.workersOnline,
    })
    .from(poolSnapshots)
    .where(and(eq(poolSnapshots.poolName, poolName), gte(poolSnapshots.timestamp, cutoff(hours))))
    .orderBy(asc(poolSnapshots.timestamp))
    .all();
}

export async function getWorkerHistory(poolName: string, workerName: string, hours = 24): Promise<WorkerSnapshot[]> {
  const db = await getDb();
  return db
    .select()
    .from(workerSnapshots)
    .where(
      and(
        eq(workerSnapshots.poolName, poolName),
        eq(workerSnapshots.workerName, workerName),
        gte(workerSnapshots.timestamp, cutoff(hours))
      )
    )
    .orderBy(asc(workerSnapshots.timestamp))
    .all();
}

// ============ BEST SHARE FUNCTIONS ============

export type NewBestShare = {
  accountId: number;
  poolName: string;
  difficulty: number;
  workerName?: string | null;
  isAllTimeBest?: boolean;
};

/**
 * Record a best share only if it beats every earlier record for the same
 * (account, pool). Returns whether a row was written.
 */
export async function logBestShare(input: NewBestShare): Promise<boolean> {
  if (!Number.isFinite(input.difficulty) || input.difficulty <= 0) return false;

  const db = await getDb();
  const previous = db
    .select({ difficulty: bestShares.difficulty })
    .from(bestShares)
    .where(and(eq(bestShares.accountId, input.accountId), eq(bestShares.poolName, input.poolName)))
    .orderBy(desc(bestShares.difficulty))
    .limit(1)
    .get();
  if (previous && input.difficulty <= previous.difficulty) return false;

  db.insert(bestShares)
    .values({
      accountId: input.accountId,
      poolName: input.poolName,
      difficulty: input.difficulty,
      workerName: input.workerName ?? null,
      isAllTimeBest: input.isAllTimeBest ?? false,
    })
    .run();
  markDirty();
  return true;
}

export async function getBestSharesHistory(
  options: { accountId?: number; poolName?: string; limit?: number } = {}
): Promise<BestShare[]> {
  const db = await getDb();
  return db
    .select()
    .from(bestShares)
    .where(
      and(
        options.accountId !== undefined ? eq(bestShares.accountId, options.accountId) : undefined,
        options.poolName !== undefined ? eq(bestShares.poolName, options.poolName) : undefined
      )
    )
    .orderBy(desc(bestShares.timestamp), desc(bestShares.id))
    .limit(options.limit ?? 50)
    .all();
}

// ============ SHARE SUBMISSION FUNCTIONS ============

export async function logShareSubmission(input: Omit<InsertShareSubmission, "id" | "timestamp">): Promise<number> {
  const db = await getDb();
  const row = db.insert(shareSubmissions).values(input).returning({ id: shareSubmissions.id }).get();
  markDirty();
  return row?.id ?? 0;
}

export type ShareQuery = {
  accountId?: number;
  minerId?: number;
  poolName?: string;
  hours?: number;
  limit?: number;
};

function shareFilter(query: ShareQuery) {
  return and(
    gte(shareSubmissions.timestamp, cutoff(query.hours ?? 24)),
    query.accountId !== undefined ? eq(shareSubmissions.accountId, query.accountId) : undefined,
    query.minerId !== undefined ? eq(shareSubmissions.minerId, query.minerId) : undefined,
    query.poolName !== undefined ? eq(shareSubmissions.poolName, query.poolName) : undefined
  );
}

export async function getShareSubmissions(query: ShareQuery = {}): Promise<ShareSubmission[]> {
  const db = await getDb();
  return db
    .select()
    .from(shareSubmissions)
    .where(shareFilter(query))
    .orderBy(desc(shareSubmissions.timestamp), desc(shareSubmissions.id))
    .limit(query.limit ?? 100)
    .all();
}

export type ShareStatistics = {
  totalShares: number;
  acceptedShares: number;
  rejectedShares: number;
  acceptanceRate: number;
  avgDifficulty: number;
  maxDifficulty: number;
  sharesPerHour: number;
};

export async function getShareStatistics(query: Omit<ShareQuery, "limit"> = {}): Promise<ShareStatistics> {
  const db = await getDb();
  const hours = query.hours ?? 24;
  const row = db
    .select({
      total: sql<number>`count(*)`.mapWith(Number),
      accepted: sql<number>`coalesce(sum(case when ${shareSubmissions.accepted} = 1 then 1 else 0 end), 0)`.mapWith(Number),
      avgDifficulty: sql<number>`coalesce(avg(${shareSubmissions.difficulty}), 0)`.mapWith(Number),
      maxDifficulty: sql<number>`coalesce(max(${shareSubmissions.difficulty}), 0)`.mapWith(Number),
    })
    .from(shareSubmissions)
    .where(shareFilter({ ...query, hours }))
    .get();

  const total = row?.total ?? 0;
  const accepted = row?.accepted ?? 0;
  return {
    totalShares: total,
    acceptedShares: accepted,
    rejectedShares: total - accepted,
    acceptanceRate: total > 0 ? (accepted / total) * 100 : 0,
    avgDifficulty: row?.avgDifficulty ?? 0,
    maxDifficulty: row?.maxDifficulty ?? 0,
    sharesPerHour: hours > 0 ? total / hours : 0,
  };
}

// ============ MINER FUNCTIONS ============

export type NewMiner = Omit<InsertMiner, "id" | "createdAt">;

export async function getMiners(options: { enabledOnly?: boolean } = {}): Promise<Miner[]> {
  const db = await getDb();
  return db
    .select()
    .from(miners)
    .where(options.enabledOnly ? eq(miners.enabled, true) : undefined)
    .orderBy(asc(miners.id))
    .all();
}

export async function getMinerById(id: number): Promise<Miner | undefined> {
  const db = await getDb();
  return db.select().from(miners).where(eq(miners.id, id)).get();
}

export async function getMinerByIp(ipAddress: string): Promise<Miner | undefined> {
  const db = await getDb();
  return db.select().from(miners).where(eq(miners.ipAddress, ipAddress)).get();
}

/**
 * Insert a miner, or, when its IP is already known, mark the existing row
 * online and seen now. Never creates a second row for an IP.
 */
export async function upsertMinerByIp(input: NewMiner): Promise<{ miner: Miner; created: boolean }> {
  const db = await getDb();
  const now = new Date();
  const existing = await getMinerByIp(input.ipAddress);
  if (existing) {
    const miner = db
      .update(miners)
      .set({ status: "online", lastSeen: now })
      .where(eq(miners.id, existing.id))
      .returning()
      .get();
    markDirty();
    return { miner: miner ?? existing, created: false };
  }

  const miner = db
    .insert(miners)
    .values({ ...input, lastSeen: input.lastSeen ?? now })
    .returning()
    .get();
  markDirty();
  if (!miner) throw new Error(`Failed to insert miner ${input.ipAddress}`);
  return { miner, created: true };
}

export type MinerUpdate = Partial<
  Pick<Miner, "name" | "status" | "enabled" | "lastSeen" | "apiPort" | "model" | "macAddress">
>;

export async function updateMiner(id: number, updates: MinerUpdate): Promise<Miner | undefined> {
  const db = await getDb();
  if (Object.keys(updates).length === 0) return getMinerById(id);
  const row = db.update(miners).set(updates).where(eq(miners.id, id)).returning().get();
  markDirty();
  return row;
}

// ============ MINER CONFIG (LINK) FUNCTIONS ============

export type NewMinerLink = {
  minerId: number;
  accountId: number | null;
  poolUrl: string | null;
  workerName: string | null;
};

/** Add a link and make it the miner's only active one. Earlier links stay as history. */
export async function linkMinerToAccount(input: NewMinerLink): Promise<MinerConfig> {
  const db = await getDb();
  db.update(minerConfigs)
    .set({ active: false })
    .where(and(eq(minerConfigs.minerId, input.minerId), eq(minerConfigs.active, true)))
    .run();
  const row = db
    .insert(minerConfigs)
    .values({ ...input, active: true })
    .returning()
    .get();
  markDirty();
  if (!row) throw new Error(`Failed to link miner ${input.minerId}`);
  return row;
}

export async function getActiveMinerConfig(minerId: number): Promise<MinerConfig | undefined> {
  const db = await getDb();
  return db
    .select()
    .from(minerConfigs)
    .where(and(eq(minerConfigs.minerId, minerId), eq(minerConfigs.active, true)))
    .get();
}

export async function getMinerConfigs(
  options: { minerId?: number; accountId?: number; includeInactive?: boolean } = {}
): Promise<MinerConfig[]> {
  const db = await getDb();
  return db
    .select()
    .from(minerConfigs)
    .where(
      and(
        options.minerId !== undefined ? eq(minerConfigs.minerId, options.minerId) : undefined,
        options.accountId !== undefined ? eq(minerConfigs.accountId, options.accountId) : undefined,
        options.includeInactive ? undefined : eq(minerConfigs.active, true)
      )
    )
    .orderBy(desc(minerConfigs.detectedAt), desc(minerConfigs.id))
    .all();
}

/** Returns the number of links deactivated. */
export async function unlinkMiner(minerId: number): Promise<number> {
  const db = await getDb();
  const rows = db
    .update(minerConfigs)
    .set({ active: false })
    .where(and(eq(minerConfigs.minerId, minerId), eq(minerConfigs.active, true)))
    .returning({ id: minerConfigs.id })
    .all();
  if (rows.length > 0) markDirty();
  return rows.length;
}

export type LinkedMiner = {
  miner: Miner;
  config: MinerConfig;
  account: TrackedAccount;
};

/** Enabled miners whose active link points at an account. */
export async function getMinersWithActiveAccount(): Promise<LinkedMiner[]> {
  const db = await getDb();
  return db
    .select({ miner: miners, config: minerConfigs, account: trackedAccounts })
    .from(miners)
    .innerJoin(minerConfigs, and(eq(minerConfigs.minerId, miners.id), eq(minerConfigs.active, true)))
    .innerJoin(trackedAccounts, eq(trackedAccounts.id, minerConfigs.accountId))
    .where(and(eq(miners.enabled, true), isNotNull(minerConfigs.accountId)))
    .orderBy(asc(miners.id))
    .all();
}

// ============ MAINTENANCE ============

export type CleanupResult = {
  poolSnapshots: number;
  workerSnapshots: number;
  shareSubmissions: number;
  bestShares: number;
};

/**
 * Drop snapshots and share submissions older than `days`, and best shares older
 * than `bestShareDays` unless flagged all-time best.
 */
export async function cleanupOldData(days = 30, bestShareDays = 90): Promise<CleanupResult> {
  const db = await getDb();
  const before = new Date(Date.now() - days * DAY_MS);
  const bestBefore = new Date(Date.now() - bestShareDays * DAY_MS);

  const result: CleanupResult = {
    poolSnapshots: db.delete(poolSnapshots).where(lt(poolSnapshots.timestamp, before)).returning({ id: poolSnapshots.id }).all().length,
    workerSnapshots: db.delete(workerSnapshots).where(lt(workerSnapshots.timestamp, before)).returning({ id: workerSnapshots.id }).all().length,
    shareSubmissions: db.delete(shareSubmissions).where(lt(shareSubmissions.timestamp, before)).returning({ id: shareSubmissions.id }).all().length,
    bestShares: db
      .delete(bestShares)
      .where(and(lt(bestShares.timestamp, bestBefore), eq(bestShares.isAllTimeBest, false)))
      .returning({ id: bestShares.id })
      .all().length,
  };
  markDirty();
  log.info(
    `Cleanup removed ${result.poolSnapshots} snapshots, ${result.workerSnapshots} worker snapshots, ` +
      `${result.shareSubmissions} share submissions, ${result.bestShares} best shares`
  );
  return result;
}

export type StatsSummary = {
  totalSnapshots: number;
  firstSnapshot: Date | null;
  lastSnapshot: Date | null;
  bestShare: number | null;
  avgHashrate24h: number;
  accounts: number;
  miners: number;
};

export async function getStatsSummary(poolName?: string): Promise<StatsSummary> {
  const db = await getDb();
  const poolFilter = poolName !== undefined ? eq(poolSnapshots.poolName, poolName) : undefined;

  const snapshotRow = db
    .select({
      total: sql<number>`count(*)`.mapWith(Number),
      first: sql<number | null>`min(${poolSnapshots.timestamp})`,
      last: sql<number | null>`max(${poolSnapshots.timestamp})`,
    })
    .from(poolSnapshots)
    .where(poolFilter)
    .get();

  const hashrateRow = db
    .select({ avg: sql<number>`coalesce(avg(${poolSnapshots.hashrate}), 0)`.mapWith(Number) })
    .from(poolSnapshots)
    .where(and(poolFilter, gte(poolSnapshots.timestamp, cutoff(24))))
    .get();

  const bestRow = db
    .select({ best: sql<number | null>`max(${bestShares.difficulty})` })
    .from(bestShares)
    .where(poolName !== undefined ? eq(bestShares.poolName, poolName) : undefined)
    .get();

  const accountRow = db.select({ n: sql<number>`count(*)`.mapWith(Number) }).from(trackedAccounts).get();
  const minerRow = db.select({ n: sql<number>`count(*)`.mapWith(Number) }).from(miners).get();

  const first = snapshotRow?.first ?? null;
  const last = snapshotRow?.last ?? null;
  return {
    totalSnapshots: snapshotRow?.total ?? 0,
    firstSnapshot: first !== null ? new Date(first) : null,
    lastSnapshot: last !== null ? new Date(last) : null,
    bestShare: bestRow?.best ?? null,
    avgHashrate24h: hashrateRow?.avg ?? 0,
    accounts: accountRow?.n ?? 0,
    miners: minerRow?.n ?? 0,
  };
}
