import "reflect-metadata";
import * as dotenv from "dotenv";
import { $log } from "@tsed/logger";
import { loadConfig } from "./config";
import { createInjector, resolve } from "./bootstrap";
import { errorMessage, isFatal } from "./errors";
import { EtlPipelineService } from "./services/EtlPipelineService";

dotenv.config();

async function bootstrap() {
  try {
    const config = loadConfig();
    const injector = await createInjector(config);

    const shutdown = async (signal: string) => {
      $log.warn(`${signal} received. Closing database...`);
      try {
        await injector.destroy();
      } catch (err) {
        $log.error("Error closing DB connections", err);
      }
      process.exit(130);
    };

    process.once("SIGINT", () => void shutdown("SIGINT"));
    process.once("SIGTERM", () => void shutdown("SIGTERM"));

    try {
      const pipeline = resolve(injector, EtlPipelineService);
      const summary = await pipeline.runFromFiles();

      $log.info(`ETL completed: ${summary.movies.loaded}/${summary.movies.read} movies, ` +
        `${summary.ratings.loaded}/${summary.ratings.read} ratings, ${summary.warnings.length} warnings`);
    } finally {
      await injector.destroy();
    }
  } catch (error) {
    $log.fatal({ event: "etl-failed", fatal: isFatal(error), error: errorMessage(error) });
    process.exit(1);
  }
}

void bootstrap();
