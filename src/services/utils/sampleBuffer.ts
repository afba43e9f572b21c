import { MIN_BUFFER_CAPACITY, type Sample } from "../../types/sessionTypes";


/**
 * Fixed-capacity sliding window of the most recent samples, for live plots.
 * Oldest entries are evicted on overflow; order is acquisition order.
 * Not the source of truth for export (see AcquisitionSession.history).
 */
export class SampleBuffer {
   private slots: Array<Sample | undefined>;
   private head = 0;                 // index of the oldest element
   private count = 0;
   private _version = 0;

   constructor(capacity: number = 1000) {
      this.slots = new Array<Sample | undefined>(SampleBuffer.clampCapacity(capacity));
   }

   static clampCapacity(capacity: number): number {
      if (!Number.isFinite(capacity)) return MIN_BUFFER_CAPACITY;
      return Math.max(MIN_BUFFER_CAPACITY, Math.floor(capacity));
   }

   get capacity(): number {
      return this.slots.length;
   }

   get size(): number {
      return this.count;
   }

   /** Bumped on every mutation; lets consumers skip redraws when nothing changed. */
   get version(): number {
      return this._version;
   }

   push(sample: Sample): void {
      const cap = this.slots.length;
      if (this.count < cap) {
         this.slots[(this.head + this.count) % cap] = sample;
         this.count++;
      } else {
         this.slots[this.head] = sample;
         this.head = (this.head + 1) % cap;
      }
      this._version++;
   }

   /** Ordered copy, oldest first. */
   snapshot(): Sample[] {
      const out: Sample[] = [];
      const cap = this.slots.length;
      for (let i = 0; i < this.count; i++) {
         const s = this.slots[(this.head + i) % cap];
         if (s) out.push(s);
      }
      return out;
   }

   /** Change capacity going forward; shrinking drops from the oldest end. Returns the applied capacity. */
   resize(newCapacity: number): number {
      const cap = SampleBuffer.clampCapacity(newCapacity);
      const kept = this.snapshot().slice(-cap);
      this.slots = new Array<Sample | undefined>(cap);
      kept.forEach((s, i) => { this.slots[i] = s; });
      this.head = 0;
      this.count = kept.length;
      this._version++;
      return cap;
   }

   clear(): void {
      this.slots = new Array<Sample | undefined>(this.slots.length);
      this.head = 0;
      this.count = 0;
      this._version++;
   }
}
