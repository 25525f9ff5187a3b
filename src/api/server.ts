import type { Server } from "node:http";
import type { Runtime } from "../application/bootstrap/runtimeFactory";
import { createApp } from "./app";

/**
 * Starts listening and resolves once the port is bound.
 */
export const startServer = (runtime: Runtime): Promise<Server> => {
  const app = createApp({
    queries: runtime.queryService,
    apiKey: runtime.config.API_KEY,
    logger: runtime.logger.child({ module: "http" }),
  });

  return new Promise((resolve, reject) => {
    const server = app.listen(runtime.config.PORT, runtime.config.HOST, () => {
      server.off("error", reject);
      resolve(server);
    });
    server.once("error", reject);
  });
};

export const stopServer = (server: Server): Promise<void> =>
  new Promise((resolve, reject) => {
    server.close((error) => {
      if (error) {
        reject(error);
        return;
      }
      resolve();
    });
  });
