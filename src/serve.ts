import dotenv from "dotenv";
dotenv.config();

import { createApp } from "./app";
import { loadConfig, toHttpOptions } from "./config";
import { createConsoleLogger } from "./core/logger";

const config = loadConfig([], process.env);
const logger = createConsoleLogger(config.logLevel);
const app = createApp({ http: toHttpOptions(config), logger });

app.listen(config.port, () => {
  logger("info", `listening on :${config.port}`);
});
