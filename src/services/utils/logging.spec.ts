import { createLogger } from "./logging";


describe("createLogger", () => {
   afterEach(() => jest.restoreAllMocks());

   it("prefixes messages with the scope", () => {
      const log = jest.spyOn(console, "log").mockImplementation(() => undefined);
      createLogger("HW").info("Connected", 42);
      expect(log).toHaveBeenCalledWith("[PSU/HW] Connected", 42);
   });

   it("drops messages below the configured level", () => {
      const log = jest.spyOn(console, "log").mockImplementation(() => undefined);
      const warn = jest.spyOn(console, "warn").mockImplementation(() => undefined);
      const logger = createLogger("ACQ", "warn");
      logger.info("quiet");
      logger.warn("loud");
      expect(log).not.toHaveBeenCalled();
      expect(warn).toHaveBeenCalledWith("[PSU/ACQ] loud");
   });

   it("writes nothing when silent", () => {
      const error = jest.spyOn(console, "error").mockImplementation(() => undefined);
      createLogger("ACQ", "silent").error("nope");
      expect(error).not.toHaveBeenCalled();
   });
});
