import type { LogLevel } from "../../types/sessionTypes";


const levelRank: Record<Exclude<LogLevel, "silent">, number> = {
   trace: 10,
   debug: 20,
   info: 30,
   warn: 40,
   error: 50,
};

export interface Logger {
   trace(message: string, ...rest: unknown[]): void;
   debug(message: string, ...rest: unknown[]): void;
   info(message: string, ...rest: unknown[]): void;
   warn(message: string, ...rest: unknown[]): void;
   error(message: string, ...rest: unknown[]): void;
}

/**
 * Console logger tagged with a scope, e.g. createLogger("HW") -> "[PSU/HW] ...".
 */
export function createLogger(scope: string, level: LogLevel = "info"): Logger {
   if (level === "silent") return createNoopLogger();

   const rank = levelRank[level];
   const prefix = `[PSU/${scope}]`;

   return {
      trace: (message, ...rest) => {
         if (rank <= levelRank.trace) console.debug(`${prefix} ${message}`, ...rest);
      },
      debug: (message, ...rest) => {
         if (rank <= levelRank.debug) console.debug(`${prefix} ${message}`, ...rest);
      },
      info: (message, ...rest) => {
         if (rank <= levelRank.info) console.log(`${prefix} ${message}`, ...rest);
      },
      warn: (message, ...rest) => {
         if (rank <= levelRank.warn) console.warn(`${prefix} ${message}`, ...rest);
      },
      error: (message, ...rest) => {
         if (rank <= levelRank.error) console.error(`${prefix} ${message}`, ...rest);
      },
   };
}

export function createNoopLogger(): Logger {
   return {
      trace() {},
      debug() {},
      info() {},
      warn() {},
      error() {},
   };
}
