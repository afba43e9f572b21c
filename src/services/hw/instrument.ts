import type { ControlMode, Measurement } from "../../types/sessionTypes";


// ───────────────────────────────────────────────────────────────────────────────
// Instrument capability
// ───────────────────────────────────────────────────────────────────────────────
export type Protection = {
   /** OVP trip level; applied in constant-current mode only. */
   overVoltageLimit?: number;
};

/**
 * What the acquisition loop needs from a power supply. Implementations
 * classify every failure as ConnectionError or CommunicationError.
 */
export interface InstrumentChannel {
   readonly kind: "scpi" | "simulated";

   /** Open the link; resolves with the instrument identity. ConnectionError on failure. */
   open(): Promise<string>;

   /** ConnectionError if the link is not open or the instrument rejects the values. */
   configure(voltage: number, current: number, mode: ControlMode, protection?: Protection): Promise<void>;

   setOutput(on: boolean): Promise<void>;

   /** CommunicationError on timeout or malformed reply. */
   readMeasurement(): Promise<Measurement>;

   /** Idempotent. Always tries output-off before releasing the link; never throws. */
   close(): Promise<void>;
}


// ───────────────────────────────────────────────────────────────────────────────
// Line transport (serial / socket) used by the SCPI channel
// ───────────────────────────────────────────────────────────────────────────────
export interface ScpiTransport {
   readonly description: string;
   readonly isOpen: boolean;
   open(): Promise<void>;
   write(command: string): Promise<void>;
   /** Rejects with TransportTimeoutError when no line arrives within `timeoutMs`. */
   query(command: string, timeoutMs: number): Promise<string>;
   close(): Promise<void>;
}
