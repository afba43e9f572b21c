import {
   ZERO_OUTPUT_DELAY_MS,
   ZERO_OUTPUT_EPSILON,
   type ControlMode,
   type Sample,
   type SessionConfig,
   type TripDecision,
} from "../../types/sessionTypes";


type MonitorConfig = Pick<
   SessionConfig,
   "mode" | "thresholdValue" | "thresholdDirection" | "settlingTimeMs" | "zeroOutputStop"
>;

/**
 * CV holds voltage, so the current is what moves (compared by magnitude).
 * CC holds current, so the voltage is what moves.
 */
export function monitoredQuantity(sample: Sample, mode: ControlMode): {
   quantity: "voltage" | "current";
   value: number;
   unit: "V" | "A";
} {
   return mode === "constantVoltage"
      ? { quantity: "current", value: Math.abs(sample.current), unit: "A" }
      : { quantity: "voltage", value: sample.voltage, unit: "V" };
}


/**
 * Single-sample trip decision. No hysteresis and no debounce: one qualifying
 * sample trips.
 */
export function evaluateThreshold(sample: Sample, cfg: MonitorConfig): TripDecision {
   const elapsedMs = sample.timestamp * 1000;

   if (
      cfg.zeroOutputStop &&
      elapsedMs > ZERO_OUTPUT_DELAY_MS &&
      Math.abs(sample.voltage) < ZERO_OUTPUT_EPSILON &&
      Math.abs(sample.current) < ZERO_OUTPUT_EPSILON
   ) {
      const m = monitoredQuantity(sample, cfg.mode);
      return {
         trip: true,
         cause: "zeroOutput",
         quantity: m.quantity,
         value: m.value,
         message: "Zero V & I detected",
      };
   }

   if (elapsedMs <= cfg.settlingTimeMs) return { trip: false };

   const { quantity, value, unit } = monitoredQuantity(sample, cfg.mode);
   const limit = cfg.thresholdValue;
   const crossed = cfg.thresholdDirection === "below" ? value < limit : value > limit;
   if (!crossed) return { trip: false };

   const label = quantity === "current" ? "Current" : "Voltage";
   const op = cfg.thresholdDirection === "below" ? "<" : ">";
   return {
      trip: true,
      cause: "threshold",
      quantity,
      value,
      message: `${label} ${value.toFixed(4)} ${op} ${limit.toFixed(4)} ${unit}`,
   };
}
