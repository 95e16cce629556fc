import type { Server } from "http";
import { createApp } from "./app";
import { loadConfig } from "./config";

function listen(): Promise<Server> {
  const config = loadConfig();
  const app = createApp(config);
  return new Promise((resolve, reject) => {
    const server = app.listen(config.port, config.host, (err?: Error) => {
      if (err) return reject(err);
      console.log(
        `[OrderTotal] Listening on ${config.host}:${config.port} (rate service: ${config.rateServiceUrl})`
      );
      resolve(server);
    });
  });
}

async function main() {
  const server = await listen();

  const shutdown = (signal: NodeJS.Signals) => {
    console.log(`[OrderTotal] ${signal} received, closing server`);
    server.close((err) => {
      if (err) {
        console.error("[OrderTotal] Error while closing:", err);
        process.exit(1);
      }
      process.exit(0);
    });
  };
  process.once("SIGTERM", shutdown);
  process.once("SIGINT", shutdown);
}

main().catch((err) => {
  console.error("Failed to start:", err);
  process.exit(1);
});
