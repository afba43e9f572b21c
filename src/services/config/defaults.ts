import type { SessionConfig } from "../../types/sessionTypes";


export const DEFAULT_SAVE_LOCATION = "logs";

/** Values used for every field a caller leaves out. */
export const DEFAULT_SESSION_CONFIG: SessionConfig = {
   voltage: 4.0,
   current: 0.5,
   mode: "constantVoltage",
   thresholdValue: 0.062,
   thresholdDirection: "below",
   samplingIntervalMs: 200,
   bufferCapacity: 1000,
   simulation: false,
   notes: "",
   cell: {
      anode: "",
      cathode: "",
      electrolyte: "",
      molarity: "",
   },

   settlingTimeMs: 1000,
   zeroOutputStop: true,
   instrument: {
      resourceName: "/dev/ttyUSB0",
      baudRate: 9600,
      readTimeoutMs: 5000,
   },
   exportFormat: "csv",
   saveLocation: DEFAULT_SAVE_LOCATION,
   logLevel: "info",
};
