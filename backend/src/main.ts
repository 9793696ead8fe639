import "reflect-metadata";

import type { AddressInfo } from "node:net";

import cors from "@fastify/cors";
import type { FastifyInstance } from "fastify";
import { fastifyTRPCPlugin } from "@trpc/server/adapters/fastify";
import type { FastifyTRPCPluginOptions } from "@trpc/server/adapters/fastify";
import { Logger, LogLevel } from "@nestjs/common";
import { NestFactory } from "@nestjs/core";
import { FastifyAdapter, NestFastifyApplication } from "@nestjs/platform-fastify";

import { describeError } from "@tariff-monitor/domain";
import { AppModule } from "./app.module";
import { ConfigFileService } from "./config/config-file.service";
import { resolveLogLevels } from "./config/logging";
import { setRuntimeConfig } from "./config/runtime-config";
import type { ConfigDocument } from "./config/schemas";
import type { SourceSettings } from "./config/source-settings.factory";
import { SOURCE_SETTINGS } from "./config/source-settings.factory";
import { EndpointCheckService } from "./forecast/endpoint-check.service";
import { RefreshSchedulerService } from "./forecast/refresh-scheduler.service";
import type { AppRouter } from "./trpc/trpc.router";
import { TrpcRouter } from "./trpc/trpc.router";

const isAddressInfo = (value: AddressInfo | string | null): value is AddressInfo =>
  typeof value === "object" && value !== null && "port" in value;

async function bootstrap(): Promise<NestFastifyApplication> {
  const initialConfig = await configureGlobalLogging();
  setRuntimeConfig(initialConfig);
  const adapter = new FastifyAdapter({logger: false});
  const app = await NestFactory.create<NestFastifyApplication>(AppModule, adapter, {
    bufferLogs: true,
  });

  app.useLogger(new Logger("bootstrap"));
  app.flushLogs();
  app.enableShutdownHooks();

  const fastify = app.getHttpAdapter().getInstance() as unknown as FastifyInstance;
  await fastify.register(cors, {
    origin: true,
    methods: ["GET", "POST", "OPTIONS"],
  });

  const trpcRouter = app.get(TrpcRouter);
  await fastify.register(fastifyTRPCPlugin, {
    prefix: "/trpc",
    trpcOptions: {
      router: trpcRouter.router,
      createContext: () => trpcRouter.createContext(),
    },
  } satisfies FastifyTRPCPluginOptions<AppRouter>);

  const settings = app.get<SourceSettings>(SOURCE_SETTINGS);
  if (settings.verifyOnStartup) {
    try {
      await app.get(EndpointCheckService).assertReachable();
    } catch (error) {
      await app.close();
      throw error;
    }
  }

  const port = Number(process.env.PORT ?? 4000);
  const host = process.env.HOST ?? "0.0.0.0";
  await app.listen(port, host);

  if (process.env.NODE_ENV !== "test") {
    app.get(RefreshSchedulerService).start();

    const logger = new Logger("tariff-monitor");
    const address = fastify.server.address();
    let baseUrl = `http://localhost:${port}`;
    if (isAddressInfo(address)) {
      const resolvedHost = address.address === "::" || address.address === "0.0.0.0" ? "localhost" : address.address;
      baseUrl = `http://${resolvedHost}:${address.port}`;
    } else if (typeof address === "string" && address.length > 0) {
      baseUrl = address;
    }

    logger.log(`API ready at ${baseUrl}`);
    logger.log(`Forecast source ${settings.url}, refreshing every ${settings.refreshInterval.toString()} in ${settings.timeZone}`);

    const routesTree = fastify.printRoutes({includeHooks: false, includeMeta: false, commonPrefix: false});
    if (routesTree.trim().length > 0) {
      logger.log(`Routes:\n${routesTree}`);
    }

    const procedures = Object.keys(trpcRouter.router._def.procedures);
    if (procedures.length) {
      const formatted = procedures
        .map((path, index) => {
          const prefix = index === procedures.length - 1 ? "└──" : "├──";
          return `${prefix} /trpc/${path}`;
        })
        .join("\n");
      logger.log(`tRPC procedures:\n${formatted}`);
    }
  }

  return app;
}

async function configureGlobalLogging(): Promise<ConfigDocument> {
  const bootstrapLogger = new Logger("bootstrap");
  const configFileService = new ConfigFileService();

  let levels: LogLevel[] = ["fatal", "error", "warn", "log"];
  let normalizedLevel = "info";
  let document: ConfigDocument | null = null;

  try {
    const configPath = configFileService.resolvePath();
    document = await configFileService.loadDocument(configPath);

    const rawLevel = document.logging?.level ?? "info";
    const {levels: resolvedLevels, normalized, fallbackUsed} = resolveLogLevels(rawLevel);
    levels = resolvedLevels;
    normalizedLevel = normalized;
    if (fallbackUsed) {
      bootstrapLogger.warn(`Unknown logging.level value '${String(rawLevel)}'; defaulting to INFO`);
    }
  } catch (error) {
    bootstrapLogger.error(`Failed to load configuration: ${describeError(error)}`);
    throw error instanceof Error ? error : new Error(String(error));
  }

  Logger.overrideLogger(levels);
  bootstrapLogger.log(`Logger minimum level set to ${normalizedLevel.toUpperCase()}`);
  return document;
}

if (process.env.NODE_ENV !== "test") {
  void bootstrap();
}

export { bootstrap };
