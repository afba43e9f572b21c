import { createSessionConfig } from "../config/sessionConfig";
import { createSample } from "./measurement";
import { evaluateThreshold, monitoredQuantity } from "./threshold";


const cv = createSessionConfig({
   mode: "constantVoltage",
   thresholdDirection: "below",
   thresholdValue: 0.09,
   simulation: true,
});

describe("monitoredQuantity", () => {
   it("watches |current| in CV and voltage in CC", () => {
      const s = createSample(3, { voltage: 4.1, current: -0.2 });
      expect(monitoredQuantity(s, "constantVoltage")).toEqual({ quantity: "current", value: 0.2, unit: "A" });
      expect(monitoredQuantity(s, "constantCurrent")).toEqual({ quantity: "voltage", value: 4.1, unit: "V" });
   });
});

describe("evaluateThreshold", () => {
   it("trips below the threshold in constant-voltage mode", () => {
      const tripped = evaluateThreshold(createSample(5, { voltage: 4, current: 0.05 }), cv);
      expect(tripped).toEqual({
         trip: true,
         cause: "threshold",
         quantity: "current",
         value: 0.05,
         message: "Current 0.0500 < 0.0900 A",
      });
      expect(evaluateThreshold(createSample(5, { voltage: 4, current: 0.15 }), cv)).toEqual({ trip: false });
   });

   it("does not trip exactly at the threshold", () => {
      expect(evaluateThreshold(createSample(5, { voltage: 4, current: 0.09 }), cv).trip).toBe(false);
   });

   it("compares current by magnitude", () => {
      expect(evaluateThreshold(createSample(5, { voltage: 4, current: -0.05 }), cv).trip).toBe(true);
      expect(evaluateThreshold(createSample(5, { voltage: 4, current: -0.15 }), cv).trip).toBe(false);
   });

   it("trips above the threshold on voltage in constant-current mode", () => {
      const cc = createSessionConfig({
         mode: "constantCurrent",
         thresholdDirection: "above",
         thresholdValue: 4.2,
         simulation: true,
      });
      const decision = evaluateThreshold(createSample(2, { voltage: 4.3, current: 0.5 }), cc);
      expect(decision).toEqual({
         trip: true,
         cause: "threshold",
         quantity: "voltage",
         value: 4.3,
         message: "Voltage 4.3000 > 4.2000 V",
      });
      expect(evaluateThreshold(createSample(2, { voltage: 4.1, current: 0.5 }), cc).trip).toBe(false);
   });

   it("ignores samples inside the settling window", () => {
      expect(evaluateThreshold(createSample(0.5, { voltage: 4, current: 0.05 }), cv).trip).toBe(false);
      expect(evaluateThreshold(createSample(1.0, { voltage: 4, current: 0.05 }), cv).trip).toBe(false);
      expect(evaluateThreshold(createSample(1.001, { voltage: 4, current: 0.05 }), cv).trip).toBe(true);

      const noSettle = { ...cv, settlingTimeMs: 0 };
      expect(evaluateThreshold(createSample(0, { voltage: 4, current: 0.05 }), noSettle).trip).toBe(false);
      expect(evaluateThreshold(createSample(0.001, { voltage: 4, current: 0.05 }), noSettle).trip).toBe(true);
   });

   it("stops on zero output once the session is older than a second", () => {
      const decision = evaluateThreshold(createSample(2, { voltage: 0, current: 0 }), cv);
      expect(decision).toEqual({
         trip: true,
         cause: "zeroOutput",
         quantity: "current",
         value: 0,
         message: "Zero V & I detected",
      });
      expect(evaluateThreshold(createSample(0.5, { voltage: 0, current: 0 }), cv).trip).toBe(false);
   });

   it("falls back to the threshold rule when zero-output stop is off", () => {
      const cfg = { ...cv, zeroOutputStop: false };
      const decision = evaluateThreshold(createSample(2, { voltage: 0, current: 0 }), cfg);
      expect(decision.trip && decision.cause).toBe("threshold");
   });
});
