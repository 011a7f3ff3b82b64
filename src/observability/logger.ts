import pino from "pino";
import { createWriteStream } from "fs";

const logLevel = process.env.LOG_LEVEL || "info";
const logFile = process.env.LOG_FILE;

// In stdio mode stdout carries the MCP protocol, so logs go to stderr
const primary = process.env.RUN_MODE === "stdio" ? process.stderr : process.stdout;

const streams: Array<{ stream: NodeJS.WritableStream }> = [{ stream: primary }];

if (logFile) {
  streams.push({
    stream: createWriteStream(logFile, { flags: "a" }),
  });
}

const destination = streams.length > 1 ? pino.multistream(streams) : primary;

export const logger = pino(
  {
    level: logLevel,
    base: { service: "patient-directory-chat-bridge" },
  },
  destination,
);
