import type { ControlMode, Measurement } from "../../types/sessionTypes";
import {
   CommunicationError,
   ConnectionError,
   toPsuError,
} from "../utils/errors";
import { createNoopLogger, type Logger } from "../utils/logging";
import type { InstrumentChannel, Protection, ScpiTransport } from "./instrument";



/* ──────────────────────────────────────────────────────────────────────────────
   Command subset (single-channel bench supply, CH1)
────────────────────────────────────────────────────────────────────────────── */
export const SCPI = {
   IDN: "*IDN?",
   SYSTEM_ERROR: ":SYST:ERR?",
   OVP_LEVEL: (volts: number) => `:VOLT:PROT ${volts}`,
   OVP_ON: ":OUTP:OVP ON",
   OVP_OFF: ":OUTP:OVP OFF",
   APPLY: (volts: number, amps: number) => `:APPL CH1,${volts},${amps}`,
   OUTPUT: (on: boolean) => `:OUTP CH1,${on ? "ON" : "OFF"}`,
   MEAS_VOLT: ":MEAS:VOLT? CH1",
   MEAS_CURR: ":MEAS:CURR? CH1",
} as const;

const NUMERIC_REPLY = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/** Strict float parse of a measurement reply. */
export function parseNumericReply(reply: string): number | null {
   const text = reply.trim();
   if (!NUMERIC_REPLY.test(text)) return null;
   const n = Number(text);
   return Number.isFinite(n) ? n : null;
}

/** `0,"No error"` -> null; anything else -> the reply text. */
export function parseSystemError(reply: string): string | null {
   const text = reply.trim();
   const code = Number(text.split(",")[0]);
   return code === 0 ? null : text;
}



// ───────────────────────────────────────────────────────────────────────────────
// Channel
// ───────────────────────────────────────────────────────────────────────────────
export class ScpiInstrumentChannel implements InstrumentChannel {
   readonly kind = "scpi" as const;
   private opened = false;
   private closed = false;
   private identity = "";

   constructor(
      private readonly transport: ScpiTransport,
      private readonly timeoutMs: number,
      private readonly log: Logger = createNoopLogger()
   ) {}

   async open(): Promise<string> {
      if (this.opened) return this.identity;
      if (this.closed) throw new ConnectionError("Instrument channel already closed");
      this.log.info(`Connecting to ${this.transport.description}`);
      try {
         await this.transport.open();
         this.opened = true;
         this.identity = (await this.transport.query(SCPI.IDN, this.timeoutMs)).trim();
      } catch (err) {
         await this.releaseTransport();
         throw toPsuError(err, ConnectionError, `Cannot connect to ${this.transport.description}`);
      }
      this.log.info(`Connected: ${this.identity}`);
      return this.identity;
   }

   async configure(voltage: number, current: number, mode: ControlMode, protection: Protection = {}): Promise<void> {
      this.assertUsable(ConnectionError);
      try {
         if (mode === "constantCurrent" && protection.overVoltageLimit !== undefined) {
            await this.transport.write(SCPI.OVP_LEVEL(protection.overVoltageLimit));
            await this.transport.write(SCPI.OVP_ON);
            this.log.info(`OVP on, limit ${protection.overVoltageLimit} V`);
         } else {
            await this.transport.write(SCPI.OVP_OFF);
         }
         await this.transport.write(SCPI.APPLY(voltage, current));

         const sysErr = parseSystemError(await this.transport.query(SCPI.SYSTEM_ERROR, this.timeoutMs));
         if (sysErr) throw new ConnectionError(`Instrument rejected configuration: ${sysErr}`);
      } catch (err) {
         throw toPsuError(err, ConnectionError, "Instrument setup failed");
      }
      this.log.info(`Set ${voltage} V / ${current} A (${mode})`);
   }

   async setOutput(on: boolean): Promise<void> {
      this.assertUsable(CommunicationError);
      try {
         await this.transport.write(SCPI.OUTPUT(on));
      } catch (err) {
         throw toPsuError(err, CommunicationError, `Output ${on ? "on" : "off"} failed`);
      }
   }

   async readMeasurement(): Promise<Measurement> {
      this.assertUsable(CommunicationError);
      try {
         const voltage = parseNumericReply(await this.transport.query(SCPI.MEAS_VOLT, this.timeoutMs));
         const current = parseNumericReply(await this.transport.query(SCPI.MEAS_CURR, this.timeoutMs));
         if (voltage === null || current === null) {
            throw new CommunicationError("Malformed measurement reply");
         }
         return { voltage, current };
      } catch (err) {
         throw toPsuError(err, CommunicationError, "Read failed");
      }
   }

   async close(): Promise<void> {
      if (this.closed) return;
      this.closed = true;
      if (this.opened) {
         try {
            await this.transport.write(SCPI.OUTPUT(false));
         } catch (err) {
            this.log.warn("Output off during close failed", err);
         }
      }
      await this.releaseTransport();
      this.log.info("Instrument connection closed.");
   }

   private async releaseTransport(): Promise<void> {
      this.opened = false;
      if (!this.transport.isOpen) return;
      try {
         await this.transport.close();
      } catch (err) {
         this.log.warn("Transport close failed", err);
      }
   }

   private assertUsable(Err: typeof ConnectionError | typeof CommunicationError): void {
      if (this.closed) throw new Err("Instrument channel already closed");
      if (!this.opened) throw new Err("Instrument channel not open");
   }
}
