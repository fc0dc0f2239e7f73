import "dotenv/config";
import http from "node:http";

import { startTracing } from "./otel";
import { createApp } from "./app";
import { loadConfig } from "./config";
import { MazeHub } from "./hub";
import { createMetrics } from "./metrics";
import { attachSockets } from "./sockets";

const tracing = startTracing();
const config = loadConfig();
const metrics = createMetrics({ defaults: true });
const hub = new MazeHub(config, metrics);
const server = http.createServer(createApp(hub, metrics, config));
const wss = attachSockets(server, hub, metrics, config);

server.listen(config.port, () => {
  console.log(`Maze server http/ws on :${config.port}`);
});

process.once("SIGTERM", () => {
  console.log("shutting down");
  for (const client of wss.clients) client.terminate();
  wss.close();
  server.close(() => {
    tracing
      .shutdown()
      .catch((err: unknown) => console.error("trace flush failed", err))
      .finally(() => process.exit(0));
  });
});
