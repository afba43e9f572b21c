import { performance } from "node:perf_hooks";
import { createActor, type Actor } from "xstate";

import type {
   RunState,
   Sample,
   SessionConfig,
   SessionConfigInput,
   SessionResult,
   StopReason,
} from "../../types/sessionTypes";
import { createSessionConfig } from "../config/sessionConfig";
import { createTerminalAlerter, type Alerter, type Trip } from "../utils/alert";
import { SessionStateError } from "../utils/errors";
import { delay, errorMessage, nowIso } from "../utils/generalUtils";
import { createLogger, type Logger } from "../utils/logging";
import { createSample } from "../utils/measurement";
import { SampleBuffer } from "../utils/sampleBuffer";
import { StatusChannel } from "../utils/statusChannel";
import { evaluateThreshold } from "../utils/threshold";
import { acquisitionMachine, runStateOf } from "./acquisitionMachine";
import { createInstrumentChannel, type ChannelFactory } from "./hardware";
import type { InstrumentChannel } from "./instrument";


export type AcquisitionDeps = {
   channelFactory?: ChannelFactory;
   buffer?: SampleBuffer;
   status?: StatusChannel;
   alerter?: Alerter;
   /** Monotonic milliseconds. */
   clock?: () => number;
   sleep?: (ms: number, signal: AbortSignal) => Promise<void>;
   /** Overrides the per-session logger built from config.logLevel. */
   logger?: Logger;
};

type LoopOutcome =
   | { reason: "user" }
   | { reason: "threshold"; trip: Trip };



// ───────────────────────────────────────────────────────────────────────────────
// Acquisition session
// ───────────────────────────────────────────────────────────────────────────────
/**
 * Owns the instrument channel and the full-history log while a session runs.
 * Consumers read live data through `buffer.snapshot()` and `status`; the
 * full history is only handed out (frozen) once the session is back in idle.
 */
export class AcquisitionSession {
   readonly buffer: SampleBuffer;
   readonly status: StatusChannel;

   private readonly actor: Actor<typeof acquisitionMachine>;
   private readonly channelFactory: ChannelFactory;
   private readonly alerter: Alerter;
   private readonly clock: () => number;
   private readonly sleep: (ms: number, signal: AbortSignal) => Promise<void>;

   private abort: AbortController | null = null;
   private inFlight: Promise<SessionResult> | null = null;
   private last: SessionResult | null = null;

   constructor(private readonly deps: AcquisitionDeps = {}) {
      this.buffer = deps.buffer ?? new SampleBuffer();
      this.status = deps.status ?? new StatusChannel();
      this.channelFactory = deps.channelFactory ?? createInstrumentChannel;
      this.alerter = deps.alerter ?? createTerminalAlerter();
      this.clock = deps.clock ?? (() => performance.now());
      this.sleep = deps.sleep ?? delay;
      this.actor = createActor(acquisitionMachine);
      this.actor.start();
   }

   get state(): RunState {
      return runStateOf(this.actor.getSnapshot());
   }

   /** Full history of the last finished session (empty before the first one). */
   get history(): readonly Sample[] {
      return this.last?.samples ?? [];
   }

   get lastResult(): SessionResult | null {
      return this.last;
   }

   /** Returns unsubscribe. */
   onStateChange(fn: (state: RunState) => void): () => void {
      const sub = this.actor.subscribe((snap) => fn(runStateOf(snap)));
      return () => sub.unsubscribe();
   }

   /**
    * Run one session to completion. Rejects only for ConfigError (before
    * anything is touched) or SessionStateError; every other failure resolves
    * with reason "error".
    */
   async start(input: SessionConfigInput = {}): Promise<SessionResult> {
      if (this.inFlight || this.state !== "idle") {
         throw new SessionStateError(`Session already active (${this.state})`);
      }
      const config = createSessionConfig(input);

      const run = this.run(config);
      this.inFlight = run;
      try {
         return await run;
      } finally {
         this.inFlight = null;
      }
   }

   /**
    * Ask the running session to stop. Observed between samples, so within one
    * sampling interval; an in-flight read completes first.
    * Resolves with the session result, or null when nothing was running.
    */
   async stop(): Promise<SessionResult | null> {
      const run = this.inFlight;
      if (!run || !this.abort) return null;
      if (!this.abort.signal.aborted) {
         this.status.info("Stop requested...");
         this.abort.abort();
      }
      return run;
   }


   private async run(config: SessionConfig): Promise<SessionResult> {
      const log = this.deps.logger ?? createLogger("ACQ", config.logLevel);
      const abort = new AbortController();
      this.abort = abort;

      this.buffer.resize(config.bufferCapacity);
      this.buffer.clear();

      const history: Sample[] = [];
      const startedAt = nowIso();
      let channel: InstrumentChannel | null = null;
      let outcome: LoopOutcome | null = null;
      let failure: Error | null = null;

      this.actor.send({ type: "START" });
      try {
         channel = this.channelFactory(config);
         this.status.info(channel.kind === "simulated" ? "Simulation mode active." : "Connecting to instrument...");

         const instrumentId = await channel.open();
         await channel.configure(config.voltage, config.current, config.mode, {
            overVoltageLimit: config.thresholdValue,
         });

         // a stop that arrived while connecting never switches the output on
         if (abort.signal.aborted) {
            this.status.info(`Connected to ${instrumentId}. Output left off.`);
            outcome = { reason: "user" };
            this.actor.send({ type: "STOP" });
         } else {
            await channel.setOutput(true);
            this.status.success(`Connected to ${instrumentId}. Output on: ${config.voltage} V, ${config.current} A.`);
            this.actor.send({ type: "CONNECTED", instrumentId });
            outcome = await this.sample(channel, config, history, abort.signal, log);
         }
      } catch (err) {
         failure = err instanceof Error ? err : new Error(errorMessage(err));
         log.error("Session failed:", failure.message);
         this.actor.send({ type: "FAIL", error: failure });
      } finally {
         Object.freeze(history);
         if (channel) await channel.close();
         this.abort = null;
      }

      const instrumentId = this.actor.getSnapshot().context.instrumentId;
      const result: SessionResult = {
         reason: failure ? "error" : (outcome?.reason ?? "user"),
         config,
         samples: history,
         startedAt,
         endedAt: nowIso(),
         ...(instrumentId ? { instrumentId } : {}),
         ...(outcome?.reason === "threshold" ? { trip: outcome.trip } : {}),
         ...(failure ? { error: failure } : {}),
      };

      this.emitTerminal(result);
      this.last = result;
      this.actor.send({ type: "CLOSED" });
      log.info(`Session ended (${result.reason}), ${history.length} points recorded.`);
      return result;
   }

   /** The sampling cycle. Throws whatever the channel throws (fail-fast). */
   private async sample(
      channel: InstrumentChannel,
      config: SessionConfig,
      history: Sample[],
      signal: AbortSignal,
      log: Logger
   ): Promise<LoopOutcome> {
      const t0 = this.clock();
      let lastTs = 0;
      this.status.info(`Logging started (Interval: ${config.samplingIntervalMs}ms).`);

      while (!signal.aborted) {
         const tickStart = this.clock();
         const measurement = await channel.readMeasurement();

         lastTs = Math.max(lastTs, (tickStart - t0) / 1000);
         const sample = createSample(lastTs, measurement);
         history.push(sample);
         this.buffer.push(sample);
         this.status.dataPoint(sample);

         const decision = evaluateThreshold(sample, config);
         if (decision.trip) {
            this.actor.send({ type: "TRIP", message: decision.message });
            this.status.warning(`Stop: ${decision.message}.`);
            try {
               await channel.setOutput(false);
            } catch (err) {
               log.warn("Output off after trip failed; close() will retry", err);
            }
            try {
               this.alerter.thresholdTripped(decision, sample);
            } catch (err) {
               log.warn("Alerter failed", err);
            }
            return { reason: "threshold", trip: decision };
         }

         const wait = config.samplingIntervalMs - (this.clock() - tickStart);
         await this.sleep(Math.max(0, wait), signal);
      }

      this.actor.send({ type: "STOP" });
      return { reason: "user" };
   }

   private emitTerminal(result: SessionResult): void {
      const n = result.samples.length;
      const byReason: Record<StopReason, () => void> = {
         threshold: () => this.status.terminal("warning", "threshold", `Auto-Stop Triggered: ${result.trip?.message ?? "threshold crossed"}. ${n} points recorded.`),
         user: () => this.status.terminal("success", "user", `Logger stopped. ${n} points recorded.`),
         error: () => this.status.terminal("error", "error", `${result.error?.message ?? "Unknown error"}. Stopped after ${n} points.`),
      };
      byReason[result.reason]();
   }
}
