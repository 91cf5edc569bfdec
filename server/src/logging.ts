/**
 * Server logging: a root "server" logger writing to the console and to
 * `<logDir>/server.log`. Every module takes a `server.<name>` child.
 */

import {
  initLogger,
  ConsoleTransport,
  FileTransport,
  type ILogger,
  type LogLevel,
  type LogTransport,
  type Logger,
} from "@docprime/shared/logging";

export interface ServerLoggingOptions {
  /** Default: "debug" outside production, "info" in it */
  minLevel?: LogLevel;
  /** Omit to skip file output */
  logDir?: string;
  colors?: boolean;
}

/** Under vitest only warnings reach the console and nothing is written to disk */
const UNDER_TEST = process.env.VITEST !== undefined || process.env.NODE_ENV === "test";

let root: Logger | null = null;

export function initServerLogging(options: ServerLoggingOptions = {}): Logger {
  const production = process.env.NODE_ENV === "production";
  const minLevel = options.minLevel || (production ? "info" : "debug");

  const transports: LogTransport[] = [
    new ConsoleTransport({
      minLevel: UNDER_TEST ? "warn" : minLevel,
      colors: options.colors,
      pretty: !production,
    }),
  ];
  if (options.logDir && !UNDER_TEST) {
    transports.push(new FileTransport({ logDir: options.logDir, filename: "server", minLevel: "debug", keep: 10 }));
  }

  root = initLogger({ minLevel, component: "server", transports, historySize: 2000 });
  return root;
}

function serverLogger(): Logger {
  return root || initServerLogging();
}

export function createComponentLogger(name: string): ILogger {
  return serverLogger().child({ component: `server.${name}` });
}

/** Flushes and closes the transports; later entries are dropped by the file transport */
export function closeServerLogging(): Promise<void> {
  return root ? root.close() : Promise.resolve();
}
