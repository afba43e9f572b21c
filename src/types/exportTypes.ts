import type { ExportFormat, Sample, SessionConfig, StopReason } from "./sessionTypes";


export const EXPORT_HEADERS = [
   "Time (s)",
   "Voltage (V)",
   "Current (A)",
   "Power (W)",
   "Resistance (Ω)",
] as const;

export type SessionInfo = {
   startedAt?: string;
   endedAt?: string;
   stopReason?: StopReason;
   instrumentId?: string;
   sampleCount: number;
   exportedAt: string;
};

/** Everything a file needs to be read back without the application. */
export type ExportMetadata = {
   config: SessionConfig;
   notes: string;
   session: SessionInfo;
};

export type ExportDocument = {
   metadata: ExportMetadata;
   samples: readonly Sample[];
};

export type ExportedFile = {
   format: ExportFormat;
   path: string;
};
