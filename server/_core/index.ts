import express from "express";
import { createServer } from "http";
import { createExpressMiddleware } from "@trpc/server/adapters/express";
import { appRouter } from "../routers";
import { closeDatabase, initializeDatabase } from "../db";
import { startPollingService, stopPollingService } from "../minerPolling";
import { ENV } from "./env";
import { createLogger } from "./logger";
import { createContext } from "./trpc";

const log = createLogger("Server");

async function startServer() {
  await initializeDatabase();

  const app = express();
  const server = createServer(app);

  app.use(express.json({ limit: "1mb" }));
  app.get("/health", (_req, res) => {
    res.json({ status: "ok" });
  });
  app.use(
    "/api/trpc",
    createExpressMiddleware({
      router: appRouter,
      createContext,
    })
  );

  server.listen(ENV.port, ENV.host, () => {
    log.info(`Telemetry hub running on http://${ENV.host}:${ENV.port}/`);
    startPollingService();
  });

  const shutdown = (signal: string) => {
    log.info(`${signal} received, shutting down`);
    stopPollingService();
    server.close(() => {
      closeDatabase();
      process.exit(0);
    });
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));
}

startServer().catch((err: unknown) => {
  log.error("Failed to start:", err);
  process.exit(1);
});
