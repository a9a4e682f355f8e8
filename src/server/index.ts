import http from "http";
import { loadConfig } from "./config";
import { createHttpApp } from "./http";
import { createLogger } from "./logger";
import { GameStore } from "./store";
import { StateStreamGateway } from "./ws";

// Bootstrap that wires the in-memory store to the HTTP API and the state stream.

const config = loadConfig();
const log = createLogger("server");

const store = new GameStore();
const app = createHttpApp(store, {
  botTimeoutMs: config.BOT_TIMEOUT_MS,
  maxBotSteps: config.BOT_MAX_STEPS,
  chatMaxLength: config.CHAT_MAX_LENGTH,
  recentChat: config.CHAT_RECENT
});
const server = http.createServer(app);

const gateway = new StateStreamGateway(store);
gateway.attach(server);

server.listen(config.PORT, config.HOST, () => {
  log.info(`Round Table server running on ${config.HOST}:${config.PORT}`);
  log.info("Health check: GET /health, state stream: ws /stream");
});
