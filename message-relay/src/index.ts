import "dotenv/config";
import fs from "fs";
import http from "http";
import path from "path";
import util from "util";
import { loadConfig } from "./config";
import { RelayStore } from "./db/store";
import { RelayService } from "./service";
import { createServer } from "./api/server";
import { attachWebSocket } from "./ws/adapter";
import { errorMessage } from "./errors";

const config = loadConfig();

// ---------------------------------------------------------------------------
// File logging setup
// ---------------------------------------------------------------------------

fs.mkdirSync(config.logDir, { recursive: true });

const logFilePath = path.join(config.logDir, "message-relay.log");
const logStream = fs.createWriteStream(logFilePath, { flags: "a" });

function tee(level: string, original: (...args: unknown[]) => void) {
  return (...args: unknown[]) => {
    const timestamp = new Date().toISOString();
    logStream.write(`[${timestamp}] [${level}] ${util.format(...args)}\n`);
    original(...args);
  };
}

console.log = tee("LOG", console.log.bind(console));
console.warn = tee("WARN", console.warn.bind(console));
console.error = tee("ERROR", console.error.bind(console));

// ---------------------------------------------------------------------------
// Daemon
// ---------------------------------------------------------------------------

const store = new RelayStore(path.join(config.dataDir, "relay.db"));
store.init();

const service = new RelayService(store, config);
service.start();

const app = createServer(service);
const server = http.createServer(app);
const wss = attachWebSocket(server, service);

server.listen(config.port, () => {
  console.log(`Message relay listening on http://localhost:${config.port}`);
});

// Graceful shutdown on SIGINT/SIGTERM
let stopping = false;

function shutdown(signal: string): void {
  if (stopping) return;
  stopping = true;
  console.log(`\nReceived ${signal}. Shutting down...`);

  void service
    .stop()
    .catch((err: unknown) => console.error(`[relay] shutdown: ${errorMessage(err)}`))
    .finally(() => {
      wss.close();
      server.close(() => {
        store.close();
        console.log("Message relay stopped.");
        logStream.end(() => process.exit(0));
      });
      server.closeAllConnections();
    });
}

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));
