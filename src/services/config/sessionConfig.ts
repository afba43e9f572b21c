import {
   CONTROL_MODES,
   EXPORT_FORMATS,
   LOG_LEVELS,
   MIN_BUFFER_CAPACITY,
   MIN_SAMPLING_INTERVAL_MS,
   THRESHOLD_DIRECTIONS,
   type ExportSelection,
   type SessionConfig,
   type SessionConfigInput,
} from "../../types/sessionTypes";
import { ConfigError, type ConfigIssue } from "../utils/errors";
import { DEFAULT_SESSION_CONFIG } from "./defaults";


const EXPORT_SELECTIONS: readonly ExportSelection[] = [...EXPORT_FORMATS, "all"];

const createIssue = (field: string, message: string): ConfigIssue => ({ field, message });



// ───────────────────────────────────────────────────────────────────────────────
// Build / validate
// ───────────────────────────────────────────────────────────────────────────────
/**
 * Merge `input` over the defaults, validate, and freeze.
 * Throws ConfigError listing every bad field.
 */
export function createSessionConfig(input: SessionConfigInput = {}): SessionConfig {
   const d = DEFAULT_SESSION_CONFIG;
   const config: SessionConfig = {
      voltage: input.voltage ?? d.voltage,
      current: input.current ?? d.current,
      mode: input.mode ?? d.mode,
      thresholdValue: input.thresholdValue ?? d.thresholdValue,
      thresholdDirection: input.thresholdDirection ?? d.thresholdDirection,
      samplingIntervalMs: input.samplingIntervalMs ?? d.samplingIntervalMs,
      bufferCapacity: input.bufferCapacity ?? d.bufferCapacity,
      simulation: input.simulation ?? d.simulation,
      notes: input.notes ?? d.notes,
      cell: Object.freeze({
         anode: input.cell?.anode ?? d.cell.anode,
         cathode: input.cell?.cathode ?? d.cell.cathode,
         electrolyte: input.cell?.electrolyte ?? d.cell.electrolyte,
         molarity: input.cell?.molarity ?? d.cell.molarity,
      }),
      settlingTimeMs: input.settlingTimeMs ?? d.settlingTimeMs,
      zeroOutputStop: input.zeroOutputStop ?? d.zeroOutputStop,
      instrument: Object.freeze({
         resourceName: input.instrument?.resourceName ?? d.instrument.resourceName,
         baudRate: input.instrument?.baudRate ?? d.instrument.baudRate,
         readTimeoutMs: input.instrument?.readTimeoutMs ?? d.instrument.readTimeoutMs,
      }),
      exportFormat: input.exportFormat ?? d.exportFormat,
      saveLocation: input.saveLocation ?? d.saveLocation,
      logLevel: input.logLevel ?? d.logLevel,
   };

   const issues = validateConfig(config);
   if (issues.length > 0) throw new ConfigError(issues);
   return Object.freeze(config);
}


export function validateConfig(config: SessionConfig): ConfigIssue[] {
   const issues: ConfigIssue[] = [];
   const positive = (field: string, v: number) => {
      if (!Number.isFinite(v) || v <= 0) issues.push(createIssue(field, "Value must be a number greater than 0"));
   };

   positive("voltage", config.voltage);
   positive("current", config.current);
   if (!Number.isFinite(config.thresholdValue)) {
      issues.push(createIssue("thresholdValue", "Value must be a finite number"));
   }
   if (!Number.isInteger(config.samplingIntervalMs) || config.samplingIntervalMs < MIN_SAMPLING_INTERVAL_MS) {
      issues.push(createIssue("samplingIntervalMs", `Value must be an integer >= ${MIN_SAMPLING_INTERVAL_MS}`));
   }
   if (!Number.isInteger(config.bufferCapacity) || config.bufferCapacity < MIN_BUFFER_CAPACITY) {
      issues.push(createIssue("bufferCapacity", `Value must be an integer >= ${MIN_BUFFER_CAPACITY}`));
   }
   if (!Number.isFinite(config.settlingTimeMs) || config.settlingTimeMs < 0) {
      issues.push(createIssue("settlingTimeMs", "Value must be >= 0"));
   }
   if (!Number.isInteger(config.instrument.baudRate) || config.instrument.baudRate <= 0) {
      issues.push(createIssue("instrument.baudRate", "Value must be a positive integer"));
   }
   positive("instrument.readTimeoutMs", config.instrument.readTimeoutMs);
   if (!config.simulation && !config.instrument.resourceName.trim()) {
      issues.push(createIssue("instrument.resourceName", "Required unless simulation is enabled"));
   }
   return issues;
}



// ───────────────────────────────────────────────────────────────────────────────
// Untyped input (settings files, export metadata)
// ───────────────────────────────────────────────────────────────────────────────
type Json = Record<string, unknown>;

const isRecord = (v: unknown): v is Json => typeof v === "object" && v !== null && !Array.isArray(v);

/** Reads typed fields off an untyped object, collecting issues instead of throwing. */
class FieldReader {
   constructor(
      private readonly raw: Json,
      private readonly issues: ConfigIssue[],
      private readonly prefix: string,
      private readonly coerce: boolean
   ) {}

   private path(key: string) {
      return this.prefix ? `${this.prefix}.${key}` : key;
   }

   number(key: string): number | undefined {
      const v = this.raw[key];
      if (v === undefined || v === null) return undefined;
      if (typeof v === "number") return v;
      if (this.coerce && typeof v === "string" && v.trim() !== "") {
         const n = Number(v);
         if (!Number.isNaN(n)) return n;
      }
      this.issues.push(createIssue(this.path(key), `Expected a number, got ${JSON.stringify(v)}`));
      return undefined;
   }

   boolean(key: string): boolean | undefined {
      const v = this.raw[key];
      if (v === undefined || v === null) return undefined;
      if (typeof v === "boolean") return v;
      if (this.coerce && (v === "true" || v === "false")) return v === "true";
      this.issues.push(createIssue(this.path(key), `Expected true or false, got ${JSON.stringify(v)}`));
      return undefined;
   }

   string(key: string): string | undefined {
      const v = this.raw[key];
      if (v === undefined || v === null) return undefined;
      if (typeof v === "string") return v;
      if (this.coerce && (typeof v === "number" || typeof v === "boolean")) return String(v);
      this.issues.push(createIssue(this.path(key), `Expected text, got ${JSON.stringify(v)}`));
      return undefined;
   }

   oneOf<T extends string>(key: string, allowed: readonly T[]): T | undefined {
      const v = this.raw[key];
      if (v === undefined || v === null) return undefined;
      const hit = allowed.find((a) => a === v);
      if (hit === undefined) {
         this.issues.push(
            createIssue(this.path(key), `Unsupported value ${JSON.stringify(v)}. Allowed values: ${allowed.join(", ")}`)
         );
      }
      return hit;
   }

   child(key: string): FieldReader | undefined {
      const v = this.raw[key];
      if (v === undefined || v === null) return undefined;
      if (!isRecord(v)) {
         this.issues.push(createIssue(this.path(key), "Expected an object"));
         return undefined;
      }
      return new FieldReader(v, this.issues, this.path(key), this.coerce);
   }
}

/**
 * Structural check of an untyped object into a SessionConfigInput.
 * With `coerce`, numeric and boolean fields may also be given as text.
 */
export function parseConfigInput(raw: unknown, opts: { coerce?: boolean } = {}): SessionConfigInput {
   if (!isRecord(raw)) throw new ConfigError([createIssue("(root)", "Expected an object")]);

   const issues: ConfigIssue[] = [];
   const r = new FieldReader(raw, issues, "", opts.coerce ?? false);
   const cell = r.child("cell");
   const instrument = r.child("instrument");

   const input: SessionConfigInput = {
      voltage: r.number("voltage"),
      current: r.number("current"),
      mode: r.oneOf("mode", CONTROL_MODES),
      thresholdValue: r.number("thresholdValue"),
      thresholdDirection: r.oneOf("thresholdDirection", THRESHOLD_DIRECTIONS),
      samplingIntervalMs: r.number("samplingIntervalMs"),
      bufferCapacity: r.number("bufferCapacity"),
      simulation: r.boolean("simulation"),
      notes: r.string("notes"),
      cell: cell && {
         anode: cell.string("anode"),
         cathode: cell.string("cathode"),
         electrolyte: cell.string("electrolyte"),
         molarity: cell.string("molarity"),
      },
      settlingTimeMs: r.number("settlingTimeMs"),
      zeroOutputStop: r.boolean("zeroOutputStop"),
      instrument: instrument && {
         resourceName: instrument.string("resourceName"),
         baudRate: instrument.number("baudRate"),
         readTimeoutMs: instrument.number("readTimeoutMs"),
      },
      exportFormat: r.oneOf("exportFormat", EXPORT_SELECTIONS),
      saveLocation: r.string("saveLocation"),
      logLevel: r.oneOf("logLevel", LOG_LEVELS),
   };

   if (issues.length > 0) throw new ConfigError(issues);
   return input;
}



// ───────────────────────────────────────────────────────────────────────────────
// Flat key/value form (CSV comment block, spreadsheet Settings sheet)
// ───────────────────────────────────────────────────────────────────────────────
export type FlatValue = string | number | boolean;

/** Every field except `notes`, which exports carry as its own block. */
export function flattenConfig(config: SessionConfig): Array<[string, FlatValue]> {
   return [
      ["mode", config.mode],
      ["voltage", config.voltage],
      ["current", config.current],
      ["thresholdValue", config.thresholdValue],
      ["thresholdDirection", config.thresholdDirection],
      ["samplingIntervalMs", config.samplingIntervalMs],
      ["bufferCapacity", config.bufferCapacity],
      ["settlingTimeMs", config.settlingTimeMs],
      ["zeroOutputStop", config.zeroOutputStop],
      ["simulation", config.simulation],
      ["instrument.resourceName", config.instrument.resourceName],
      ["instrument.baudRate", config.instrument.baudRate],
      ["instrument.readTimeoutMs", config.instrument.readTimeoutMs],
      ["cell.anode", config.cell.anode],
      ["cell.cathode", config.cell.cathode],
      ["cell.electrolyte", config.cell.electrolyte],
      ["cell.molarity", config.cell.molarity],
      ["exportFormat", config.exportFormat],
      ["saveLocation", config.saveLocation],
      ["logLevel", config.logLevel],
   ];
}

/** Inverse of flattenConfig; `notes` is supplied separately. */
export function unflattenConfig(entries: Iterable<[string, FlatValue]>, notes = ""): SessionConfig {
   const root: Json = { notes };
   for (const [key, value] of entries) {
      const dot = key.indexOf(".");
      if (dot < 0) {
         root[key] = value;
         continue;
      }
      const group = key.slice(0, dot);
      const existing = root[group];
      const target: Json = isRecord(existing) ? existing : {};
      target[key.slice(dot + 1)] = value;
      root[group] = target;
   }
   return createSessionConfig(parseConfigInput(root, { coerce: true }));
}
