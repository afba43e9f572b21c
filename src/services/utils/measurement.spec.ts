import { createSample, derivePower, deriveResistance } from "./measurement";


describe("measurement", () => {
   it("derives power and resistance", () => {
      const s = createSample(1.5, { voltage: 4, current: 0.5 });
      expect(s).toEqual({ timestamp: 1.5, voltage: 4, current: 0.5, power: 2, resistance: 8 });
   });

   it("omits resistance when the current is zero", () => {
      const s = createSample(0, { voltage: 4, current: 0 });
      expect("resistance" in s).toBe(false);
      expect(s.power).toBe(0);
      expect(deriveResistance({ voltage: 4, current: 0 })).toBeUndefined();
      expect(deriveResistance({ voltage: 4, current: -0 })).toBeUndefined();
   });

   it("keeps the sign for negative currents", () => {
      expect(derivePower({ voltage: 2, current: -0.25 })).toBe(-0.5);
      expect(deriveResistance({ voltage: 2, current: -0.25 })).toBe(-8);
   });

   it("freezes samples", () => {
      const s = createSample(0, { voltage: 1, current: 1 });
      expect(Object.isFrozen(s)).toBe(true);
   });
});
