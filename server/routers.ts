import { TRPCError } from "@trpc/server";
import { z } from "zod";
import { publicProcedure, router } from "./_core/trpc";
import {
  listAvailablePools,
  listMinerTypes,
  requireMinerAdapter,
  requirePoolAdapter,
} from "./adapterRegistry";
import {
  cleanupOldData,
  createAccount,
  deleteAccount,
  getAccountById,
  getAccountHistory,
  getAccounts,
  getBestSharesHistory,
  getHashrateHistory,
  getMinerById,
  getMinerByIp,
  getMinerConfigs,
  getMiners,
  getShareStatistics,
  getShareSubmissions,
  getStatsSummary,
  getWorkerHistory,
  linkMinerToAccount,
  unlinkMiner,
  updateAccount,
  updateMiner,
  upsertMinerByIp,
} from "./db";
import { MINER_TYPES } from "./minerAdapters";
import { isPollingActive } from "./minerPolling";
import { discoverAndRegisterMiners } from "./networkScanner";
import { fetchAllStats } from "./poolPolling";
import { getLatestStats } from "./statsCache";

const idInput = z.object({ id: z.number().int().positive() });
const hoursInput = z.number().int().min(1).max(24 * 90).default(24);

const ipv4 = z
  .string()
  .regex(/^(25[0-5]|2[0-4]\d|1\d\d|[1-9]?\d)(\.(25[0-5]|2[0-4]\d|1\d\d|[1-9]?\d)){3}$/, "Invalid IPv4 address");

// Scans are limited to private ranges
const privateSubnet = z
  .string()
  .regex(
    /^(10\.\d{1,3}|172\.(1[6-9]|2\d|3[01])|192\.168)\.\d{1,3}\.\d{1,3}\/(1[6-9]|2\d|3[0-2])$/,
    "Only private network subnets allowed (10.x.x.x, 172.16-31.x.x, 192.168.x.x), /16 or smaller"
  );

function notFound(what: string): TRPCError {
  return new TRPCError({ code: "NOT_FOUND", message: `${what} not found` });
}

export const appRouter = router({
  pools: router({
    list: publicProcedure.query(() => listAvailablePools()),
  }),

  accounts: router({
    list: publicProcedure.query(() => getAccounts()),

    get: publicProcedure.input(idInput).query(async ({ input }) => {
      const account = await getAccountById(input.id);
      if (!account) throw notFound("Account");
      return account;
    }),

    create: publicProcedure
      .input(
        z.object({
          name: z.string().min(1).max(100),
          address: z.string().trim().min(1).max(128),
          adapterKey: z.string().min(1),
        })
      )
      .mutation(async ({ input }) => {
        const adapter = requirePoolAdapter(input.adapterKey);
        if (!adapter.validateAddress(input.address)) {
          throw new TRPCError({ code: "BAD_REQUEST", message: `Address is not valid for ${adapter.getPoolName()}` });
        }
        const account = await createAccount({ ...input, coin: adapter.coin });
        if (!account) {
          throw new TRPCError({ code: "CONFLICT", message: "Account already tracked on this pool" });
        }
        return account;
      }),

    update: publicProcedure
      .input(idInput.extend({ name: z.string().min(1).max(100).optional(), enabled: z.boolean().optional() }))
      .mutation(async ({ input }) => {
        const { id, ...updates } = input;
        const account = await updateAccount(id, updates);
        if (!account) throw notFound("Account");
        return account;
      }),

    delete: publicProcedure.input(idInput).mutation(async ({ input }) => {
      if (!(await deleteAccount(input.id))) throw notFound("Account");
      return { success: true } as const;
    }),

    history: publicProcedure
      .input(idInput.extend({ hours: hoursInput }))
      .query(({ input }) => getAccountHistory(input.id, input.hours)),

    shares: publicProcedure
      .input(idInput.extend({ hours: hoursInput, limit: z.number().int().min(1).max(1000).default(100) }))
      .query(({ input }) => getShareSubmissions({ accountId: input.id, hours: input.hours, limit: input.limit })),

    shareStats: publicProcedure
      .input(idInput.extend({ hours: hoursInput }))
      .query(({ input }) => getShareStatistics({ accountId: input.id, hours: input.hours })),
  }),

  stats: router({
    latest: publicProcedure.query(() => getLatestStats()),
    refresh: publicProcedure.mutation(() => fetchAllStats()),

    summary: publicProcedure
      .input(z.object({ poolName: z.string().optional() }).optional())
      .query(({ input }) => getStatsSummary(input?.poolName)),

    bestShares: publicProcedure
      .input(
        z
          .object({
            accountId: z.number().int().positive().optional(),
            poolName: z.string().optional(),
            limit: z.number().int().min(1).max(500).default(50),
          })
          .optional()
      )
      .query(({ input }) => getBestSharesHistory(input ?? {})),

    hashrateHistory: publicProcedure
      .input(z.object({ poolName: z.string().min(1), hours: hoursInput }))
      .query(({ input }) => getHashrateHistory(input.poolName, input.hours)),

    workerHistory: publicProcedure
      .input(z.object({ poolName: z.string().min(1), workerName: z.string().min(1), hours: hoursInput }))
      .query(({ input }) => getWorkerHistory(input.poolName, input.workerName, input.hours)),

    polling: publicProcedure.query(() => isPollingActive()),

    cleanup: publicProcedure
      .input(
        z
          .object({
            days: z.number().int().min(1).max(365).default(30),
            bestShareDays: z.number().int().min(1).max(3650).default(90),
          })
          .optional()
      )
      .mutation(({ input }) => cleanupOldData(input?.days, input?.bestShareDays)),
  }),

  miners: router({
    list: publicProcedure.query(() => getMiners()),
    types: publicProcedure.query(() => listMinerTypes()),

    get: publicProcedure.input(idInput).query(async ({ input }) => {
      const miner = await getMinerById(input.id);
      if (!miner) throw notFound("Miner");
      return miner;
    }),

    create: publicProcedure
      .input(
        z.object({
          name: z.string().min(1).max(100),
          minerType: z.enum(MINER_TYPES),
          ipAddress: ipv4,
          apiPort: z.number().int().min(1).max(65535).optional(),
        })
      )
      .mutation(async ({ input }) => {
        if (await getMinerByIp(input.ipAddress)) {
          throw new TRPCError({ code: "CONFLICT", message: `A miner at ${input.ipAddress} already exists` });
        }
        const { miner } = await upsertMinerByIp({
          ...input,
          apiPort: input.apiPort ?? requireMinerAdapter(input.minerType).defaultPort,
        });
        return miner;
      }),

    update: publicProcedure
      .input(
        idInput.extend({
          name: z.string().min(1).max(100).optional(),
          enabled: z.boolean().optional(),
          apiPort: z.number().int().min(1).max(65535).optional(),
        })
      )
      .mutation(async ({ input }) => {
        const { id, ...updates } = input;
        const miner = await updateMiner(id, updates);
        if (!miner) throw notFound("Miner");
        return miner;
      }),

    /** Live read straight from the device */
    info: publicProcedure.input(idInput).query(async ({ input }) => {
      const miner = await getMinerById(input.id);
      if (!miner) throw notFound("Miner");
      const adapter = requireMinerAdapter(miner.minerType);
      return adapter.getInfo(miner.ipAddress, miner.apiPort ?? adapter.defaultPort);
    }),

    recentShares: publicProcedure
      .input(idInput.extend({ count: z.number().int().min(1).max(100).default(10) }))
      .query(async ({ input }) => {
        const miner = await getMinerById(input.id);
        if (!miner) throw notFound("Miner");
        const adapter = requireMinerAdapter(miner.minerType);
        return adapter.getRecentShares(miner.ipAddress, miner.apiPort ?? adapter.defaultPort, input.count);
      }),

    scan: publicProcedure
      .input(z.object({ subnet: privateSubnet.optional(), save: z.boolean().default(true) }))
      .mutation(async ({ input }) => {
        const results = await discoverAndRegisterMiners({ cidr: input.subnet, save: input.save });
        return results.map((r) => ({
          ipAddress: r.discovered.ipAddress,
          minerType: r.discovered.minerType,
          model: r.discovered.model,
          hashrate: r.discovered.info.hashrate,
          status: r.discovered.info.status,
          poolUrl: r.discovered.info.poolUrl,
          minerId: r.minerId,
          created: r.created,
          accountId: r.account?.id ?? null,
        }));
      }),

    configs: publicProcedure
      .input(idInput.extend({ includeInactive: z.boolean().default(false) }))
      .query(({ input }) => getMinerConfigs({ minerId: input.id, includeInactive: input.includeInactive })),

    linkAccount: publicProcedure
      .input(
        idInput.extend({
          accountId: z.number().int().positive(),
          workerName: z.string().max(100).nullable().default(null),
          poolUrl: z.string().max(255).nullable().default(null),
        })
      )
      .mutation(async ({ input }) => {
        if (!(await getMinerById(input.id))) throw notFound("Miner");
        const account = await getAccountById(input.accountId);
        if (!account) throw notFound("Account");
        requirePoolAdapter(account.adapterKey);
        return linkMinerToAccount({
          minerId: input.id,
          accountId: account.id,
          poolUrl: input.poolUrl,
          workerName: input.workerName,
        });
      }),

    unlink: publicProcedure.input(idInput).mutation(async ({ input }) => {
      const deactivated = await unlinkMiner(input.id);
      return { success: true, deactivated } as const;
    }),
  }),
});

export type AppRouter = typeof appRouter;
