import type { Sample, TripDecision } from "../../types/sessionTypes";
import { createLogger, type Logger } from "./logging";


export type Trip = Extract<TripDecision, { trip: true }>;

/** Audible/visual notice for threshold stops. Never called for user or error stops. */
export interface Alerter {
   thresholdTripped(trip: Trip, sample: Sample): void;
}

/** Rings the terminal bell (when attached to one) and logs the trip. */
export function createTerminalAlerter(
   out: NodeJS.WriteStream = process.stdout,
   log: Logger = createLogger("ALERT")
): Alerter {
   return {
      thresholdTripped(trip, sample) {
         if (out.isTTY) out.write("\u0007");
         log.warn(`AUTO-STOP at t=${sample.timestamp.toFixed(3)} s: ${trip.message}`);
      },
   };
}
