import pino from "pino";

export type Logger = pino.Logger;

let _root: Logger | null = null;

export function getLogger(): Logger {
  if (_root) return _root;
  _root = pino({
    name: "tracelens",
    level: process.env.LOG_LEVEL ?? "info",
    transport:
      process.env.NODE_ENV === "development"
        ? { target: "pino/file", options: { destination: 1 } }
        : undefined,
  });
  return _root;
}

/** Child logger tagged with the calling module, e.g. `{ module: "extractor" }`. */
export function createChildLogger(bindings: { module: string } & Record<string, unknown>): Logger {
  return getLogger().child(bindings);
}
