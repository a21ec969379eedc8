import "reflect-metadata";
import * as dotenv from "dotenv";
import { $log } from "@tsed/logger";
import { loadConfig } from "./config";
import { createInjector, resolve } from "./bootstrap";
import { errorMessage } from "./errors";
import { ReportService } from "./services/ReportService";

dotenv.config();

async function main() {
  const config = loadConfig();
  const injector = await createInjector(config);

  try {
    const reports = resolve(injector, ReportService);

    console.log("Highest average rating:");
    console.table([reports.topRatedMovie()].filter((row) => row !== null));

    console.log("\nTop 5 genres by average rating:");
    console.table(reports.topGenres());

    console.log("\nDirector with the most movies:");
    console.table([reports.mostProlificDirector()].filter((row) => row !== null));

    console.log("\nAverage rating by release year:");
    console.table(reports.averageRatingByYear());
  } finally {
    await injector.destroy();
  }
}

main().catch((error) => {
  $log.fatal({ event: "report-failed", error: errorMessage(error) });
  process.exit(1);
});
