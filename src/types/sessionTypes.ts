/* ──────────────────────────────────────────────────────────────────────────────
   Session constants
────────────────────────────────────────────────────────────────────────────── */
export const MIN_SAMPLING_INTERVAL_MS = 10;
export const MIN_BUFFER_CAPACITY = 10;

/** Below this magnitude a reading counts as "zero" for the zero-output stop. */
export const ZERO_OUTPUT_EPSILON = 0.001;
/** Zero-output stop is only armed once the session is older than this. */
export const ZERO_OUTPUT_DELAY_MS = 1000;

export const CONTROL_MODES = ["constantVoltage", "constantCurrent"] as const;
export const THRESHOLD_DIRECTIONS = ["below", "above"] as const;
export const EXPORT_FORMATS = ["csv", "xlsx", "json"] as const;
export const LOG_LEVELS = ["trace", "debug", "info", "warn", "error", "silent"] as const;

export type ControlMode = (typeof CONTROL_MODES)[number];
export type ThresholdDirection = (typeof THRESHOLD_DIRECTIONS)[number];
export type ExportFormat = (typeof EXPORT_FORMATS)[number];
export type ExportSelection = ExportFormat | "all";
export type LogLevel = (typeof LOG_LEVELS)[number];



/* ──────────────────────────────────────────────────────────────────────────────
   Samples
────────────────────────────────────────────────────────────────────────────── */
// ------ RAW ------
export type Measurement = {
   voltage: number;
   current: number;
};

// ------ SAMPLE ------
/**
 * One acquisition tick. `timestamp` is seconds since the session started
 * (monotonically non-decreasing within a session).
 * `resistance` is absent when the current is zero.
 */
export type Sample = Readonly<{
   timestamp: number;
   voltage: number;
   current: number;
   power: number;
   resistance?: number;
}>;



/* ──────────────────────────────────────────────────────────────────────────────
   Configuration
────────────────────────────────────────────────────────────────────────────── */
export type CellDetails = {
   anode: string;
   cathode: string;
   electrolyte: string;
   molarity: string;
};

export type InstrumentSettings = {
   resourceName: string;             // serial device path (e.g. /dev/ttyUSB0, COM5)
   baudRate: number;
   readTimeoutMs: number;
};

export type SessionConfig = Readonly<{
   voltage: number;
   current: number;
   mode: ControlMode;
   thresholdValue: number;
   thresholdDirection: ThresholdDirection;
   samplingIntervalMs: number;
   bufferCapacity: number;
   simulation: boolean;
   notes: string;
   cell: Readonly<CellDetails>;

   settlingTimeMs: number;
   zeroOutputStop: boolean;
   instrument: Readonly<InstrumentSettings>;
   exportFormat: ExportSelection;
   saveLocation: string;
   logLevel: LogLevel;
}>;

export type SessionConfigInput = Partial<Omit<SessionConfig, "cell" | "instrument">> & {
   cell?: Partial<CellDetails>;
   instrument?: Partial<InstrumentSettings>;
};



/* ──────────────────────────────────────────────────────────────────────────────
   Run state / outcome
────────────────────────────────────────────────────────────────────────────── */
export type RunState =
   | "idle"
   | "connecting"
   | "running"
   | "stoppingByUser"
   | "stoppingByThreshold"
   | "stoppingByError";

export type StopReason = "user" | "threshold" | "error";

export type TripCause = "threshold" | "zeroOutput";

export type TripDecision =
   | { trip: false }
   | {
         trip: true;
         cause: TripCause;
         quantity: "voltage" | "current";
         value: number;
         message: string;
      };

export type SessionResult = {
   reason: StopReason;
   config: SessionConfig;
   samples: readonly Sample[];
   startedAt: string;                // ISO
   endedAt: string;                  // ISO
   instrumentId?: string;
   trip?: Extract<TripDecision, { trip: true }>;
   error?: Error;
};
