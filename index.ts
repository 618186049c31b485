import express, { Application, Request, Response, NextFunction } from "express";
import path from "node:path";
import fs from "node:fs";
import swaggerUi from "swagger-ui-express";
import helmet from "helmet";
import { loadConfig } from "./src/config/env";
import { createPool } from "./src/config/db";
import { init, PgAuditSink } from "./src/db";
import { createRouter } from "./src/routes";
import { buildFacade } from "./src/services";
import type { ResolutionAuditSink } from "./src/resolution/types";

async function main(): Promise<void> {
  const config = loadConfig();

  let audit: ResolutionAuditSink | undefined;
  if (config.database) {
    const pool = createPool(config.database);
    await init(pool);
    audit = new PgAuditSink(pool);
  } else {
    console.warn("No database configured. Resolution audit log disabled.");
  }

  const facade = buildFacade(config, { audit });
  const app: Application = express();

  app.use(helmet());
  app.use(express.json({ limit: "1mb" }));

  // Compiled output lives in dist/, so look beside the entry point and one level up.
  const swaggerPath =
    [path.resolve(__dirname, "swagger.json"), path.resolve(__dirname, "..", "swagger.json")].find((candidate) =>
      fs.existsSync(candidate)
    ) ?? path.resolve(__dirname, "swagger.json");
  let swaggerDocument: Record<string, unknown> | null = null;

  if (fs.existsSync(swaggerPath)) {
    try {
      swaggerDocument = JSON.parse(fs.readFileSync(swaggerPath, "utf-8"));
    } catch (error) {
      console.error("Failed to parse swagger.json", error);
    }
  } else {
    console.warn(`Swagger definition not found at ${swaggerPath}. /docs route disabled.`);
  }

  if (swaggerDocument) {
    app.use("/docs", swaggerUi.serve, swaggerUi.setup(swaggerDocument));
  }

  app.get("/health", (_req: Request, res: Response) => {
    res.json({ status: "ok", uptime: process.uptime() });
  });

  app.use(createRouter(facade));

  // Basic error handler for uncaught errors within the request pipeline.
  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    console.error("Unhandled error", err);
    res.status(500).json({ message: "Unexpected server error" });
  });

  app.listen(config.port, () => {
    console.log(`Knowledge resolver listening on port ${config.port}`);
  });
}

process.on("unhandledRejection", (reason: unknown) => {
  console.error("Unhandled promise rejection", reason);
});

process.on("SIGTERM", () => {
  console.log("Received SIGTERM, shutting down.");
  process.exit(0);
});

main().catch((error) => {
  console.error("Failed to start server", error);
  process.exit(1);
});
