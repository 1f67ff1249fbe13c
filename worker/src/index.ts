import { createApp } from "./app.js";
import { closeDb } from "./db/index.js";
import { getConfig } from "./lib/config.js";
import { failInterruptedJobs } from "./services/job.service.js";

async function main(): Promise<void> {
  const config = getConfig();
  const app = createApp();

  await failInterruptedJobs();

  const server = app.listen(config.port, () => {
    console.log(`Worker listening on port ${config.port}`);
  });

  const shutdown = async (): Promise<void> => {
    console.log("Shutting down...");
    server.close();
    await closeDb();
  };

  process.on("SIGTERM", () => {
    shutdown().then(
      () => process.exit(0),
      (error: unknown) => {
        console.error("Shutdown failed:", error);
        process.exit(1);
      }
    );
  });
}

main().catch((error) => {
  console.error("Worker error:", error);
  process.exit(1);
});
