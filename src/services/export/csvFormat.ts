import { readFile, writeFile } from "node:fs/promises";

import { EXPORT_HEADERS, type ExportDocument } from "../../types/exportTypes";
import type { Sample } from "../../types/sessionTypes";
import { flattenConfig, unflattenConfig, type FlatValue } from "../config/sessionConfig";
import { ExportError } from "../utils/errors";
import { sampleFromRow, sampleRow, sessionInfoEntries, sessionInfoFrom } from "./metadata";


/*
 * Layout: a leading "#" comment block, then the header row and one row per sample.
 *
 *   # --- Configuration ---
 *   # voltage: 4
 *   # cell.anode: "Zn"
 *   # --- Session ---
 *   # stopReason: "threshold"
 *   # --- Notes ---
 *   # "free text, one JSON string per note line"
 *   # --- Data ---
 *   Time (s),Voltage (V),Current (A),Power (W),Resistance (Ω)
 *
 * Metadata values and note lines are JSON literals, so no note can read as a
 * section header. An empty resistance cell means "undefined".
 */
const SECTION = /^--- (.+) ---$/;

const cell = (v: number | null) => (v === null ? "" : String(v));

export function toCsv(doc: ExportDocument): string {
   const { config, notes, session } = doc.metadata;
   const lines: string[] = [];
   const kv = (entries: Array<[string, FlatValue]>) => {
      for (const [k, v] of entries) lines.push(`# ${k}: ${JSON.stringify(v)}`);
   };

   lines.push("# --- Configuration ---");
   kv(flattenConfig(config));
   lines.push("# --- Session ---");
   kv(sessionInfoEntries(session));
   lines.push("# --- Notes ---");
   for (const line of notes.split("\n")) lines.push(`# ${JSON.stringify(line)}`);
   lines.push("# --- Data ---");
   lines.push(EXPORT_HEADERS.join(","));
   for (const s of doc.samples) lines.push(sampleRow(s).map(cell).join(","));
   return lines.join("\n") + "\n";
}

export function parseCsv(text: string): ExportDocument {
   const configEntries: Array<[string, FlatValue]> = [];
   const sessionEntries = new Map<string, FlatValue>();
   const noteLines: string[] = [];
   const samples: Sample[] = [];
   let section = "";
   let headerSeen = false;

   const lines = text.split(/\r?\n/);
   if (lines[lines.length - 1] === "") lines.pop();

   lines.forEach((line, idx) => {
      if (!headerSeen && line.startsWith("#")) {
         const body = line.replace(/^# ?/, "");
         const header = SECTION.exec(body);
         if (header) {
            section = header[1];
            return;
         }
         if (section === "Notes") {
            noteLines.push(parseNoteLine(body, idx + 1));
            return;
         }
         const sep = body.indexOf(": ");
         if (sep < 0) return;
         const value = parseLiteral(body.slice(sep + 2), idx + 1);
         if (section === "Configuration") configEntries.push([body.slice(0, sep), value]);
         else if (section === "Session") sessionEntries.set(body.slice(0, sep), value);
         return;
      }

      if (!headerSeen) {
         if (line !== EXPORT_HEADERS.join(",")) throw new Error(`line ${idx + 1}: unexpected header "${line}"`);
         headerSeen = true;
         return;
      }
      if (line.trim() === "") return;
      samples.push(parseRow(line, idx + 1));
   });

   if (!headerSeen) throw new Error("no data header found");

   return {
      metadata: {
         config: unflattenConfig(configEntries, noteLines.join("\n")),
         notes: noteLines.join("\n"),
         session: sessionInfoFrom(sessionEntries),
      },
      samples,
   };
}

function parseLiteral(text: string, lineNo: number): FlatValue {
   const v: unknown = JSON.parse(text);
   if (typeof v === "string" || typeof v === "number" || typeof v === "boolean") return v;
   throw new Error(`line ${lineNo}: unsupported metadata value ${text}`);
}

function parseNoteLine(text: string, lineNo: number): string {
   const v: unknown = JSON.parse(text);
   if (typeof v === "string") return v;
   throw new Error(`line ${lineNo}: note line is not a string literal`);
}

function parseRow(line: string, lineNo: number): Sample {
   const cols = line.split(",");
   if (cols.length !== EXPORT_HEADERS.length) {
      throw new Error(`line ${lineNo}: expected ${EXPORT_HEADERS.length} columns, got ${cols.length}`);
   }
   const num = (i: number) => {
      const n = Number(cols[i]);
      if (cols[i].trim() === "" || Number.isNaN(n)) throw new Error(`line ${lineNo}: bad number "${cols[i]}"`);
      return n;
   };
   const resistance = cols[4].trim() === "" ? undefined : num(4);
   return sampleFromRow(num(0), num(1), num(2), num(3), resistance);
}



export async function writeCsvExport(path: string, doc: ExportDocument): Promise<void> {
   await writeFile(path, toCsv(doc), "utf-8");
}

export async function readCsvExport(path: string): Promise<ExportDocument> {
   try {
      return parseCsv(await readFile(path, "utf-8"));
   } catch (err) {
      throw new ExportError("csv", path, `Cannot read CSV export: ${String(err)}`, { cause: err });
   }
}
