import fs from "node:fs";
import path from "node:path";

import pino from "pino";

export const LOGGER = Symbol("LOGGER");

export type Logger = pino.Logger;

function ensureDir(dirPath: string): void {
  fs.mkdirSync(dirPath, { recursive: true });
}

export function createLogger(): Logger {
  const dataDir = process.env.DATA_DIR ?? path.resolve(process.cwd(), "../../data");
  const logDir = process.env.LOG_DIR ?? path.join(dataDir, "logs");
  ensureDir(logDir);

  const destination = pino.destination({
    dest: path.join(logDir, "api.log"),
    sync: false
  });

  return pino(
    {
      level: process.env.LOG_LEVEL ?? "info",
      base: { service: "hedgebot-api" },
      redact: ["*.apiKey", "*.apiSecret", "*.botToken", 'req.headers["x-api-key"]']
    },
    pino.multistream([{ stream: process.stdout }, { stream: destination }])
  );
}

export function silentLogger(): Logger {
  return pino({ level: "silent" });
}
