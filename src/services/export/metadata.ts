import type { SessionInfo } from "../../types/exportTypes";
import type { Sample, StopReason } from "../../types/sessionTypes";
import type { FlatValue } from "../config/sessionConfig";


const STOP_REASONS: readonly StopReason[] = ["user", "threshold", "error"];

export function sessionInfoEntries(info: SessionInfo): Array<[string, FlatValue]> {
   const entries: Array<[string, FlatValue]> = [];
   if (info.startedAt !== undefined) entries.push(["startedAt", info.startedAt]);
   if (info.endedAt !== undefined) entries.push(["endedAt", info.endedAt]);
   if (info.stopReason !== undefined) entries.push(["stopReason", info.stopReason]);
   if (info.instrumentId !== undefined) entries.push(["instrumentId", info.instrumentId]);
   entries.push(["sampleCount", info.sampleCount]);
   entries.push(["exportedAt", info.exportedAt]);
   return entries;
}

export function sessionInfoFrom(entries: Map<string, FlatValue>): SessionInfo {
   const text = (key: string) => {
      const v = entries.get(key);
      return v === undefined ? undefined : String(v);
   };
   const reason = STOP_REASONS.find((r) => r === entries.get("stopReason"));
   const info: SessionInfo = {
      sampleCount: Number(entries.get("sampleCount") ?? 0),
      exportedAt: text("exportedAt") ?? "",
   };
   const startedAt = text("startedAt");
   const endedAt = text("endedAt");
   const instrumentId = text("instrumentId");
   if (startedAt !== undefined) info.startedAt = startedAt;
   if (endedAt !== undefined) info.endedAt = endedAt;
   if (reason !== undefined) info.stopReason = reason;
   if (instrumentId !== undefined) info.instrumentId = instrumentId;
   return info;
}


/** One export row: timestamp, V, A, W, Ω (null when undefined). */
export const sampleRow = (s: Sample): [number, number, number, number, number | null] =>
   [s.timestamp, s.voltage, s.current, s.power, s.resistance ?? null];

export function sampleFromRow(
   timestamp: number,
   voltage: number,
   current: number,
   power: number,
   resistance: number | undefined
): Sample {
   return Object.freeze(
      resistance === undefined
         ? { timestamp, voltage, current, power }
         : { timestamp, voltage, current, power, resistance }
   );
}
