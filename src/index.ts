import { type Config, loadConfig } from "./config";
import type { ServicesRunner } from "./runner";
import { createServicesRunner } from "./wiring";

// --- Load config ---
const configPath = process.argv[2] || "./config.yaml";
let config: Config;
let runner: ServicesRunner;
try {
  config = loadConfig(configPath);
  runner = createServicesRunner(config);
} catch (err) {
  console.error(`Failed to load config from ${configPath}:`, err);
  process.exit(1);
}

// --- Bind the listener ---
let port: number;
try {
  port = await runner.start();
} catch (err) {
  console.error(`Failed to listen on port ${config.port}:`, err);
  process.exit(1);
}

// --- Graceful shutdown ---
const shutdown = () => {
  console.log("\nShutting down...");
  runner.stop().then(
    () => process.exit(0),
    (err: unknown) => {
      console.error("Error while closing the listener:", err);
      process.exit(1);
    },
  );
};
process.on("SIGINT", shutdown);
process.on("SIGTERM", shutdown);

console.log(`\nChat bridge listening on port ${port}`);
for (const service of config.services) {
  console.log(
    `  ${service.webhook_path} -> handler ${service.handler}, store ${service.store}, plugin ${service.plugin}`,
  );
}
