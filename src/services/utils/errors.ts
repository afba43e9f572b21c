import type { ExportFormat } from "../../types/sessionTypes";


// ───────────────────────────────────────────────────────────────────────────────
// Error taxonomy
// ───────────────────────────────────────────────────────────────────────────────
export class PsuError extends Error {
   constructor(message: string, options?: { cause?: unknown }) {
      super(message, options);
      this.name = new.target.name;
   }
}

/** Instrument unreachable or configuration rejected. Fatal, never retried. */
export class ConnectionError extends PsuError {}

/** Timeout or malformed reply while a session is in progress. Fatal. */
export class CommunicationError extends PsuError {}

export class ExportError extends PsuError {
   constructor(
      readonly format: ExportFormat,
      readonly filePath: string,
      message: string,
      options?: { cause?: unknown }
   ) {
      super(message, options);
   }
}

export type ConfigIssue = {
   field: string;
   message: string;
};

export class ConfigError extends PsuError {
   constructor(readonly issues: ConfigIssue[]) {
      super(
         issues.length === 1
            ? `Invalid config: ${issues[0].field} - ${issues[0].message}`
            : `Invalid config (${issues.length} issues): ${issues.map((i) => i.field).join(", ")}`
      );
   }
}

/** start() while a session is already active. */
export class SessionStateError extends PsuError {}


/** Raised by transports only; channels translate it before it reaches the loop. */
export class TransportTimeoutError extends Error {
   constructor(readonly command: string, readonly timeoutMs: number) {
      super(`no reply to "${command}" within ${timeoutMs} ms`);
      this.name = "TransportTimeoutError";
   }
}



type PsuErrorCtor = new (message: string, options?: { cause?: unknown }) => PsuError;

/** Classify anything thrown below the channel boundary. PsuErrors pass through untouched. */
export function toPsuError(err: unknown, Fallback: PsuErrorCtor, context: string): PsuError {
   if (err instanceof PsuError) return err;
   const detail = err instanceof Error ? err.message : String(err);
   return new Fallback(`${context}: ${detail}`, { cause: err });
}
