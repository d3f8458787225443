import pino from "pino";

export function createLogger(level: string): pino.Logger {
  return pino({ level, base: { app: "caldav-mirror" } });
}

export function createSilentLogger(): pino.Logger {
  return pino({ level: "silent" });
}
