import http from "node:http";
import { createApp } from "./app";
import { config } from "./config";
import { GameCoordinator } from "./coordinator";
import { StoreFinalizer } from "./finalize";
import { logger } from "./logger";
import { chessRules } from "./rules";
import { attachGameSocket } from "./socket";
import { SqliteStore } from "./store";

const store = new SqliteStore(config.dbPath);

const coordinator = new GameCoordinator({
  rules: chessRules,
  finalizer: new StoreFinalizer(store, logger.child({ component: "finalize" })),
  logger: logger.child({ component: "rooms" }),
});

const app = createApp({ store, coordinator, config, logger: logger.child({ component: "http" }) });

// ---------- start ----------
const server = http.createServer(app);
const wss = attachGameSocket(server, coordinator, logger.child({ component: "socket" }));

server.listen(config.port, config.host, () => {
  logger.info({ port: config.port, host: config.host, db: config.dbPath }, "server listening");
});

function shutdown(signal: NodeJS.Signals) {
  logger.info({ signal }, "shutting down");
  for (const client of wss.clients) client.terminate();
  wss.close();
  server.close((err) => {
    store.close();
    if (err) {
      logger.error({ err }, "error while closing server");
      process.exit(1);
    }
    process.exit(0);
  });
}

process.on("SIGINT", shutdown);
process.on("SIGTERM", shutdown);
