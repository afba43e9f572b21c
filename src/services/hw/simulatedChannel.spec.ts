import { CommunicationError, ConnectionError } from "../utils/errors";
import { seededRandom, SimulatedInstrumentChannel } from "./simulatedChannel";


function fakeClock() {
   let now = 0;
   return { clock: () => now, advance: (ms: number) => { now += ms; } };
}

describe("SimulatedInstrumentChannel", () => {
   it("decays the current under constant voltage", async () => {
      const t = fakeClock();
      const ch = new SimulatedInstrumentChannel({ clock: t.clock, noise: 0 });
      await ch.open();
      await ch.configure(4, 0.5, "constantVoltage");
      await ch.setOutput(true);

      t.advance(2000);
      const m = await ch.readMeasurement();
      expect(m.voltage).toBe(4);
      expect(m.current).toBeCloseTo(0.4, 10);

      t.advance(60_000);
      expect((await ch.readMeasurement()).current).toBe(0);
   });

   it("raises the voltage from half the set point under constant current", async () => {
      const t = fakeClock();
      const ch = new SimulatedInstrumentChannel({ clock: t.clock, noise: 0, voltageRisePerSecond: 0.1 });
      await ch.open();
      await ch.configure(4, 0.25, "constantCurrent");
      await ch.setOutput(true);

      t.advance(5000);
      const m = await ch.readMeasurement();
      expect(m.current).toBe(0.25);
      expect(m.voltage).toBeCloseTo(2.5, 10);
   });

   it("keeps noise within its amplitude and repeats for the same seed", async () => {
      const read = async (seed: number) => {
         const ch = new SimulatedInstrumentChannel({ clock: () => 0, seed, noise: 0.01 });
         await ch.open();
         await ch.configure(4, 0.5, "constantVoltage");
         await ch.setOutput(true);
         const out: number[] = [];
         for (let i = 0; i < 20; i++) out.push((await ch.readMeasurement()).current);
         return out;
      };
      const a = await read(7);
      expect(await read(7)).toEqual(a);
      for (const c of a) expect(Math.abs(c - 0.5)).toBeLessThanOrEqual(0.01);
   });

   it("reads zero with the output off", async () => {
      const ch = new SimulatedInstrumentChannel({ clock: () => 0 });
      await ch.open();
      await ch.configure(4, 0.5, "constantVoltage");
      await expect(ch.readMeasurement()).resolves.toEqual({ voltage: 0, current: 0 });
   });

   it("refuses to run before open and configure", async () => {
      const ch = new SimulatedInstrumentChannel();
      await expect(ch.configure(4, 0.5, "constantVoltage")).rejects.toThrow(ConnectionError);
      await ch.open();
      await expect(ch.readMeasurement()).rejects.toThrow(CommunicationError);
   });

   it("turns the output off on close", async () => {
      const ch = new SimulatedInstrumentChannel();
      await ch.open();
      await ch.setOutput(true);
      await ch.close();
      await ch.close();
      expect(ch.output).toBe(false);
   });
});

describe("seededRandom", () => {
   it("stays in [0, 1)", () => {
      const next = seededRandom(123);
      for (let i = 0; i < 1000; i++) {
         const v = next();
         expect(v).toBeGreaterThanOrEqual(0);
         expect(v).toBeLessThan(1);
      }
   });
});
