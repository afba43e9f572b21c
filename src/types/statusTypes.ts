import type { Sample, StopReason } from "./sessionTypes";


export type StatusKind = "info" | "success" | "warning" | "error" | "dataPoint";

type StatusBase = {
   timestamp: string;                // ISO
   message: string;
};

export type StatusMessageEvent = StatusBase & {
   kind: Exclude<StatusKind, "dataPoint">;
   /** Set only on the single terminal event of a session. */
   stopReason?: StopReason;
};

export type DataPointEvent = StatusBase & {
   kind: "dataPoint";
   sample: Sample;
};

export type StatusEvent = StatusMessageEvent | DataPointEvent;

export type StatusListener = (evt: StatusEvent) => void;
