import { config } from "../config.js";
import { closeConnection } from "../db/connection.js";
import { serverLogger } from "../logger.js";
import {
  createOrchestrator,
  createRegistry,
  createRepository,
} from "../pipeline.js";
import { buildApp } from "./app.js";

const registry = createRegistry();
const repository = createRepository();
const orchestrator = createOrchestrator(registry, repository);

const app = await buildApp({ repository, registry, orchestrator });

app.addHook("onClose", async () => {
  await closeConnection();
});

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    serverLogger.info({ signal }, "Shutting down");
    void app.close();
  });
}

// Start server
try {
  await app.listen({ port: config.port, host: config.host });
  app.log.info({ host: config.host, port: config.port }, "Server started");
} catch (err) {
  app.log.error(err, "Failed to start server");
  process.exit(1);
}
