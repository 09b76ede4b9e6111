import { loadConfig } from "./config.js";
import { startRelayServer } from "./server.js";

const config = loadConfig();
const relay = await startRelayServer(config);

function shutdown(signal: string): void {
  console.log(`[web] ${signal} received, closing server...`);
  relay
    .close()
    .then(() => process.exit(0))
    .catch((err) => {
      console.error("[web] Shutdown failed:", err);
      process.exit(1);
    });
}

process.on("SIGTERM", () => shutdown("SIGTERM"));
process.on("SIGINT", () => shutdown("SIGINT"));
