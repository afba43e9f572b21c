import type { SerialPort } from "serialport";

import { TransportTimeoutError } from "../utils/errors";
import { createNoopLogger, type Logger } from "../utils/logging";
import type { ScpiTransport } from "./instrument";


type PendingReply = {
   command: string;
   resolve: (line: string) => void;
   reject: (err: Error) => void;
   timer: NodeJS.Timeout;
};

/**
 * Newline-terminated SCPI over a serial port. Queries are serialized: one
 * command in flight at a time, each bounded by its own timeout.
 */
export class SerialScpiTransport implements ScpiTransport {
   private port: SerialPort | null = null;
   private pending: PendingReply | null = null;
   private chain: Promise<unknown> = Promise.resolve();

   constructor(
      private readonly path: string,
      private readonly baudRate: number,
      private readonly log: Logger = createNoopLogger()
   ) {}

   get description(): string {
      return `${this.path}@${this.baudRate}`;
   }

   get isOpen(): boolean {
      return this.port?.isOpen ?? false;
   }

   async open(): Promise<void> {
      if (this.isOpen) return;
      // loaded lazily so simulation runs never touch the native binding
      const { SerialPort: Port, ReadlineParser } = await import("serialport");
      const port = new Port({ path: this.path, baudRate: this.baudRate, autoOpen: false });

      await new Promise<void>((resolve, reject) => {
         port.open((err) => (err ? reject(err) : resolve()));
      });

      const parser = port.pipe(new ReadlineParser({ delimiter: "\n" }));
      parser.on("data", (chunk: Buffer | string) => this.onLine(chunk.toString().replace(/\r$/, "")));
      port.on("error", (err: Error) => this.failPending(err));
      port.on("close", () => this.failPending(new Error("serial port closed")));
      this.port = port;
   }

   write(command: string): Promise<void> {
      return this.enqueue(() => this.rawWrite(command));
   }

   query(command: string, timeoutMs: number): Promise<string> {
      return this.enqueue(async () => {
         const reply = this.expectReply(command, timeoutMs);
         try {
            // reply is observed from the start; a failed write disarms its timer
            const [, line] = await Promise.all([this.rawWrite(command), reply]);
            return line;
         } catch (err) {
            this.failPending(err instanceof Error ? err : new Error(String(err)));
            throw err;
         }
      });
   }

   async close(): Promise<void> {
      const port = this.port;
      this.port = null;
      if (!port?.isOpen) return;
      await new Promise<void>((resolve, reject) => {
         port.close((err) => (err ? reject(err) : resolve()));
      });
   }

   private enqueue<T>(task: () => Promise<T>): Promise<T> {
      const run = this.chain.then(task, task);
      this.chain = run.catch(() => undefined);
      return run;
   }

   private rawWrite(command: string): Promise<void> {
      const port = this.port;
      if (!port?.isOpen) return Promise.reject(new Error(`serial port ${this.path} is not open`));
      return new Promise<void>((resolve, reject) => {
         port.write(command + "\n", (err) => {
            if (err) return reject(err);
            port.drain((drainErr) => (drainErr ? reject(drainErr) : resolve()));
         });
      });
   }

   private expectReply(command: string, timeoutMs: number): Promise<string> {
      return new Promise<string>((resolve, reject) => {
         const timer = setTimeout(() => {
            this.pending = null;
            reject(new TransportTimeoutError(command, timeoutMs));
         }, timeoutMs);
         this.pending = { command, resolve, reject, timer };
      });
   }

   private onLine(line: string): void {
      const p = this.pending;
      if (!p) {
         this.log.debug("Unsolicited line dropped:", line);
         return;
      }
      clearTimeout(p.timer);
      this.pending = null;
      p.resolve(line);
   }

   private failPending(err: Error): void {
      const p = this.pending;
      if (!p) return;
      clearTimeout(p.timer);
      this.pending = null;
      p.reject(err);
   }
}
