import type { Measurement, Sample } from "../../types/sessionTypes";


/** Below this |I| the resistance is undefined. */
const RESISTANCE_CURRENT_EPSILON = 1e-9;

export const derivePower = ({ voltage, current }: Measurement): number => voltage * current;

export const deriveResistance = ({ voltage, current }: Measurement): number | undefined =>
   Math.abs(current) > RESISTANCE_CURRENT_EPSILON ? voltage / current : undefined;


/** Build an immutable sample; `timestamp` is seconds since session start. */
export function createSample(timestamp: number, m: Measurement): Sample {
   const resistance = deriveResistance(m);
   const sample: Sample = resistance === undefined
      ? { timestamp, voltage: m.voltage, current: m.current, power: derivePower(m) }
      : { timestamp, voltage: m.voltage, current: m.current, power: derivePower(m), resistance };
   return Object.freeze(sample);
}
