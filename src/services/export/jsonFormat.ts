import { readFile, writeFile } from "node:fs/promises";

import type { ExportDocument } from "../../types/exportTypes";
import type { Sample } from "../../types/sessionTypes";
import { createSessionConfig, parseConfigInput, type FlatValue } from "../config/sessionConfig";
import { ExportError } from "../utils/errors";
import { sampleFromRow, sessionInfoFrom } from "./metadata";


/** `{ metadata: { config, notes, session }, samples: [...] }`; `resistance` omitted when undefined. */
export const toJson = (doc: ExportDocument): string => JSON.stringify(doc, null, 2);

const isRecord = (v: unknown): v is Record<string, unknown> =>
   typeof v === "object" && v !== null && !Array.isArray(v);

export function parseJson(text: string): ExportDocument {
   const raw: unknown = JSON.parse(text);
   if (!isRecord(raw) || !isRecord(raw.metadata) || !Array.isArray(raw.samples)) {
      throw new Error("expected { metadata, samples }");
   }
   const { config, notes, session } = raw.metadata;

   const sessionEntries = new Map<string, FlatValue>();
   if (isRecord(session)) {
      for (const [k, v] of Object.entries(session)) {
         if (typeof v === "string" || typeof v === "number" || typeof v === "boolean") sessionEntries.set(k, v);
      }
   }

   const samples: Sample[] = raw.samples.map((s: unknown, i: number) => {
      if (!isRecord(s)) throw new Error(`samples[${i}] is not an object`);
      const num = (key: string) => {
         const v = s[key];
         if (typeof v !== "number") throw new Error(`samples[${i}].${key} is not a number`);
         return v;
      };
      return sampleFromRow(
         num("timestamp"),
         num("voltage"),
         num("current"),
         num("power"),
         s.resistance === undefined || s.resistance === null ? undefined : num("resistance")
      );
   });

   return {
      metadata: {
         config: createSessionConfig(parseConfigInput(config)),
         notes: typeof notes === "string" ? notes : "",
         session: sessionInfoFrom(sessionEntries),
      },
      samples,
   };
}


export async function writeJsonExport(path: string, doc: ExportDocument): Promise<void> {
   await writeFile(path, toJson(doc), "utf-8");
}

export async function readJsonExport(path: string): Promise<ExportDocument> {
   try {
      return parseJson(await readFile(path, "utf-8"));
   } catch (err) {
      throw new ExportError("json", path, `Cannot read JSON export: ${String(err)}`, { cause: err });
   }
}
