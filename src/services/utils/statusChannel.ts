import type { Sample, StopReason } from "../../types/sessionTypes";
import type { StatusMessageEvent, StatusEvent, StatusListener } from "../../types/statusTypes";
import { nowIso } from "./generalUtils";
import { createNoopLogger, type Logger } from "./logging";


/**
 * One-way notification path from the acquisition loop to observers.
 *
 * Publishing never blocks: unread events sit in a bounded queue and the oldest
 * one is dropped when it is full. Listeners are called synchronously; a
 * throwing listener is logged and does not affect the publisher.
 */
export class StatusChannel {
   private queue: StatusEvent[] = [];
   private readonly listeners = new Set<StatusListener>();
   private _dropped = 0;

   constructor(
      readonly capacity: number = 256,
      private readonly log: Logger = createNoopLogger()
   ) {
      if (!Number.isInteger(capacity) || capacity < 1) {
         throw new RangeError(`status channel capacity must be a positive integer, got ${capacity}`);
      }
   }

   get size(): number {
      return this.queue.length;
   }

   /** Events discarded because the queue was full. */
   get dropped(): number {
      return this._dropped;
   }

   publish(evt: StatusEvent): void {
      if (this.queue.length >= this.capacity) {
         this.queue.shift();
         this._dropped++;
      }
      this.queue.push(evt);

      for (const fn of this.listeners) {
         try {
            fn(evt);
         } catch (err) {
            this.log.warn("status listener threw", err);
         }
      }
   }

   info(message: string) { this.message("info", message); }
   success(message: string) { this.message("success", message); }
   warning(message: string) { this.message("warning", message); }
   error(message: string) { this.message("error", message); }

   dataPoint(sample: Sample): void {
      this.publish({
         kind: "dataPoint",
         timestamp: nowIso(),
         message: `t=${sample.timestamp.toFixed(3)}s V=${sample.voltage} A=${sample.current}`,
         sample,
      });
   }

   /** The single event that ends a session. */
   terminal(kind: StatusMessageEvent["kind"], stopReason: StopReason, message: string): void {
      this.publish({ kind, timestamp: nowIso(), message, stopReason });
   }

   /** Remove and return everything unread, oldest first. */
   drain(): StatusEvent[] {
      const out = this.queue;
      this.queue = [];
      return out;
   }

   /** Returns unsubscribe. */
   subscribe(fn: StatusListener): () => void {
      this.listeners.add(fn);
      return () => { this.listeners.delete(fn); };
   }

   private message(kind: StatusMessageEvent["kind"], message: string): void {
      this.publish({ kind, timestamp: nowIso(), message });
   }
}
