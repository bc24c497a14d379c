import { loadConfig } from "../app/config";
import { startServer } from "../app/server/http";

const config = loadConfig();
const { server } = startServer(config);
server.once("listening", () => {
  const base = `http://localhost:${config.port}`;
  console.log(`[server] Listening on ${config.host}:${config.port}`);
  console.log(`  • Status:   ${base}/status.json`);
  console.log(`  • Ingest:   POST ${base}/data`);
  console.log(`  • Observe:  ws://localhost:${config.port}/ws/<device_id>`);
  console.log(`  • Stream:   ${base}/stream/<device_id>`);
});
