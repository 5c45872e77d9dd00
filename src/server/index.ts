import cors from "@fastify/cors";
import Fastify from "fastify";

import { config } from "../config.js";
import { closeConnection } from "../db/connection.js";
import { fastifyLoggerConfig } from "../logger.js";
import { errorHandler } from "./plugins/error-handler.js";
import { openapi } from "./plugins/openapi.js";
import { registerApiRoutes } from "./routes/index.js";

const { port: PORT, host: HOST } = config.server;

const app = Fastify({
  logger: fastifyLoggerConfig,
});

// Register plugins
await app.register(cors, {
  origin: true,
});

// Register OpenAPI (must be before routes)
await app.register(openapi);

// Register error handler
await app.register(errorHandler);

// Register API routes
await registerApiRoutes(app);

// OpenAPI document
app.get("/openapi.json", { schema: { hide: true } }, () => app.swagger());

app.addHook("onClose", async () => {
  await closeConnection();
});

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    app.log.info({ signal }, "Shutting down");
    app.close().then(
      () => process.exit(0),
      (err: unknown) => {
        app.log.error(err, "Shutdown failed");
        process.exit(1);
      }
    );
  });
}

// Start server
try {
  await app.listen({ port: PORT, host: HOST });
  app.log.info({ host: HOST, port: PORT }, "Server started");
} catch (err) {
  app.log.error(err, "Failed to start server");
  process.exit(1);
}
