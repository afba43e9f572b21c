import { delay, formatElapsed, nowIso, numberSlug } from "./generalUtils";


describe("generalUtils", () => {
   it("makes numbers filename-safe", () => {
      expect(numberSlug(4)).toBe("4");
      expect(numberSlug(0.5)).toBe("0_5");
      expect(numberSlug(-1.25)).toBe("m1_25");
   });

   it("stamps instants in UTC", () => {
      expect(nowIso(new Date(Date.UTC(2026, 9, 19, 12, 25, 1, 123)))).toBe("2026-10-19T12:25:01.123Z");
      expect(nowIso("2026-10-19T14:25:01.123+02:00")).toBe("2026-10-19T12:25:01.123Z");
      expect(nowIso()).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z$/);
   });

   it("formats elapsed time", () => {
      expect(formatElapsed(3_723_045)).toBe("01:02:03.045");
      expect(formatElapsed(-5)).toBe("00:00:00.000");
   });

   it("resolves delay early when aborted", async () => {
      const ctrl = new AbortController();
      const started = Date.now();
      const pending = delay(60_000, ctrl.signal);
      ctrl.abort();
      await pending;
      expect(Date.now() - started).toBeLessThan(1000);
   });
});
