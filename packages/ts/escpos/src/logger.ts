import log from "electron-log/node";

type ConsoleLevel = "error" | "warn" | "info" | "verbose" | "debug" | "silly" | false;

const LEVELS = ["error", "warn", "info", "verbose", "debug", "silly"] as const;

function consoleLevel(value: string | undefined): ConsoleLevel {
  if (value === undefined || value === "") return "warn";
  if (value === "false" || value === "silent") return false;
  for (const level of LEVELS) {
    if (level === value) return level;
  }
  return "warn";
}

// Console only. ESCPOS_LOG_LEVEL=debug shows connection and query traces.
log.transports.file.level = false;
log.transports.console.level = consoleLevel(process.env.ESCPOS_LOG_LEVEL);

const logger = log.scope("escpos");

export default logger;
