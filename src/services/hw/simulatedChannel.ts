import type { ControlMode, Measurement } from "../../types/sessionTypes";
import { CommunicationError, ConnectionError } from "../utils/errors";
import type { InstrumentChannel } from "./instrument";


export type SimulationOptions = {
   /** CV: current falls by this many amps per second. */
   currentDecayPerSecond?: number;
   /** CC: voltage rises by this many volts per second, from half the set point. */
   voltageRisePerSecond?: number;
   /** Peak amplitude of the uniform noise added to the moving quantity. */
   noise?: number;
   seed?: number;
   clock?: () => number;
};

/** Small deterministic PRNG (mulberry32) in [0, 1). */
export function seededRandom(seed: number): () => number {
   let a = seed >>> 0;
   return () => {
      a = (a + 0x6d2b79f5) >>> 0;
      let t = a;
      t = Math.imul(t ^ (t >>> 15), t | 1);
      t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
      return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
   };
}


/**
 * Stand-in supply: a decaying cell current under CV, a rising cell voltage
 * under CC. Readings depend only on elapsed time since configure() and the
 * seeded noise sequence. No I/O.
 */
export class SimulatedInstrumentChannel implements InstrumentChannel {
   readonly kind = "simulated" as const;

   private readonly decay: number;
   private readonly rise: number;
   private readonly noise: number;
   private readonly random: () => number;
   private readonly clock: () => number;

   private target: { voltage: number; current: number; mode: ControlMode } | null = null;
   private startedAt = 0;
   private opened = false;
   private _output = false;

   constructor(opts: SimulationOptions = {}) {
      this.decay = opts.currentDecayPerSecond ?? 0.05;
      this.rise = opts.voltageRisePerSecond ?? 0.05;
      this.noise = opts.noise ?? 0.005;
      this.random = seededRandom(opts.seed ?? 1);
      this.clock = opts.clock ?? Date.now;
   }

   get output(): boolean {
      return this._output;
   }

   async open(): Promise<string> {
      this.opened = true;
      return "SIMULATED,PSU,0,1.0";
   }

   async configure(voltage: number, current: number, mode: ControlMode): Promise<void> {
      if (!this.opened) throw new ConnectionError("Simulated instrument not open");
      this.target = { voltage, current, mode };
      this.startedAt = this.clock();
   }

   async setOutput(on: boolean): Promise<void> {
      this._output = on;
   }

   async readMeasurement(): Promise<Measurement> {
      const t = this.target;
      if (!this.opened || !t) throw new CommunicationError("Simulated instrument not configured");
      if (!this._output) return { voltage: 0, current: 0 };

      const elapsed = (this.clock() - this.startedAt) / 1000;
      const jitter = (this.random() * 2 - 1) * this.noise;

      if (t.mode === "constantVoltage") {
         return { voltage: t.voltage, current: Math.max(0, t.current - this.decay * elapsed + jitter) };
      }
      return { voltage: Math.max(0, t.voltage * 0.5 + this.rise * elapsed + jitter), current: t.current };
   }

   async close(): Promise<void> {
      this._output = false;
      this.opened = false;
   }
}
