import dotenv from "dotenv";
import { createApp } from "./app";
import { loadConfig } from "./config";
import { createEngine } from "./engine";
import { log } from "./utils/logger";

dotenv.config();

const config = loadConfig();
const engine = createEngine(config);
const app = createApp(engine);

app.listen(config.port, () => {
  log({ stage: "server_listening", port: config.port });
});
