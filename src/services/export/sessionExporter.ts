import { mkdir } from "node:fs/promises";
import { basename, join } from "node:path";

import type { ExportDocument, ExportedFile, SessionInfo } from "../../types/exportTypes";
import {
   EXPORT_FORMATS,
   type ExportFormat,
   type ExportSelection,
   type Sample,
   type SessionConfig,
   type SessionResult,
} from "../../types/sessionTypes";
import { DEFAULT_SAVE_LOCATION } from "../config/defaults";
import { ExportError } from "../utils/errors";
import { fileStamp, nowIso, numberSlug } from "../utils/generalUtils";
import { createLogger, type Logger } from "../utils/logging";
import type { StatusChannel } from "../utils/statusChannel";
import { writeCsvExport } from "./csvFormat";
import { writeJsonExport } from "./jsonFormat";
import { writeXlsxExport } from "./xlsxFormat";


type Writer = (path: string, doc: ExportDocument) => Promise<void>;

const WRITERS: Record<ExportFormat, Writer> = {
   csv: writeCsvExport,
   xlsx: writeXlsxExport,
   json: writeJsonExport,
};

export type ExportOptions = {
   /** Defaults to config.saveLocation. */
   directory?: string;
   session?: Partial<Omit<SessionInfo, "sampleCount" | "exportedAt">>;
   status?: StatusChannel;
   logger?: Logger;
   /** Swap a format's writer (tests). */
   writers?: Partial<Record<ExportFormat, Writer>>;
};

export type ExportReport = {
   written: ExportedFile[];
   failed: ExportError[];
};


export const resolveFormats = (selection: ExportSelection | readonly ExportFormat[]): ExportFormat[] =>
   typeof selection === "string"
      ? (selection === "all" ? [...EXPORT_FORMATS] : [selection])
      : [...new Set(selection)];

/**
 * "psu_V4_A0_5_20261019_142501_123": set point plus the session start time to
 * the millisecond, so distinct sessions never share a name.
 */
export function buildBaseFilename(config: Pick<SessionConfig, "voltage" | "current">, startedAt: string): string {
   return `psu_V${numberSlug(config.voltage)}_A${numberSlug(config.current)}_${fileStamp(startedAt)}`;
}



// ───────────────────────────────────────────────────────────────────────────────
// Export
// ───────────────────────────────────────────────────────────────────────────────
/**
 * Write `history` plus a metadata block to each requested format. Formats are
 * attempted independently: a failing one lands in `failed` and the rest still run.
 */
export async function exportSamples(
   history: readonly Sample[],
   config: SessionConfig,
   notes: string,
   formats: ExportSelection | readonly ExportFormat[],
   opts: ExportOptions = {}
): Promise<ExportReport> {
   const log = opts.logger ?? createLogger("EXPORT", config.logLevel);
   const status = opts.status;
   const report: ExportReport = { written: [], failed: [] };

   if (history.length === 0) {
      status?.warning("No data logged to export.");
      log.warn("No data logged to export.");
      return report;
   }

   let directory = opts.directory ?? config.saveLocation;
   if (!directory.trim()) {
      directory = DEFAULT_SAVE_LOCATION;
      status?.warning(`Save location was empty. Defaulting to: ${directory}`);
   }

   const exportedAt = nowIso();
   const doc: ExportDocument = {
      metadata: {
         config: Object.freeze({ ...config, notes }),
         notes,
         session: {
            ...opts.session,
            sampleCount: history.length,
            exportedAt,
         },
      },
      samples: history,
   };
   const base = join(directory, buildBaseFilename(config, opts.session?.startedAt ?? exportedAt));

   let dirError: unknown = null;
   try {
      await mkdir(directory, { recursive: true });
   } catch (err) {
      dirError = err;
   }

   for (const format of resolveFormats(formats)) {
      const path = `${base}.${format}`;
      const label = format.toUpperCase();
      status?.info(`Saving to ${label}...`);
      try {
         if (dirError) throw dirError;
         const write = opts.writers?.[format] ?? WRITERS[format];
         await write(path, doc);
         report.written.push({ format, path });
         status?.success(`${label} saved: ${basename(path)}`);
         log.info(`${label} saved: ${path}`);
      } catch (err) {
         const failure = new ExportError(format, path, `${label} Save Error: ${String(err)}`, { cause: err });
         report.failed.push(failure);
         status?.error(failure.message);
         log.error(failure.message);
      }
   }
   return report;
}

/** Export a finished session with its own config, notes and timing. */
export function exportSession(
   result: SessionResult,
   opts: ExportOptions & {
      notes?: string;
      formats?: ExportSelection | readonly ExportFormat[];
   } = {}
): Promise<ExportReport> {
   const { notes, formats, ...rest } = opts;
   return exportSamples(
      result.samples,
      result.config,
      notes ?? result.config.notes,
      formats ?? result.config.exportFormat,
      {
         ...rest,
         session: {
            startedAt: result.startedAt,
            endedAt: result.endedAt,
            stopReason: result.reason,
            ...(result.instrumentId ? { instrumentId: result.instrumentId } : {}),
            ...rest.session,
         },
      }
   );
}
