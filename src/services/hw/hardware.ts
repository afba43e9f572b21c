import type { SessionConfig } from "../../types/sessionTypes";
import { createLogger } from "../utils/logging";
import type { InstrumentChannel, ScpiTransport } from "./instrument";
import { ScpiInstrumentChannel } from "./scpiChannel";
import { SerialScpiTransport } from "./serialTransport";
import { SimulatedInstrumentChannel, type SimulationOptions } from "./simulatedChannel";


export type ChannelFactory = (config: SessionConfig) => InstrumentChannel;

export type ChannelFactoryOptions = {
   simulation?: SimulationOptions;
   /** Replaces the serial link (tests, TCP bridges). */
   transport?: (config: SessionConfig) => ScpiTransport;
};


// ───────────────────────────────────────────────────────────────────────────────
// Instrument selection
// ───────────────────────────────────────────────────────────────────────────────
/**
 * Picks the real or simulated channel once, at session start.
 * The acquisition loop never branches on `config.simulation` itself.
 */
export function createChannelFactory(opts: ChannelFactoryOptions = {}): ChannelFactory {
   return (config) => {
      if (config.simulation) return new SimulatedInstrumentChannel(opts.simulation);

      const log = createLogger("HW", config.logLevel);
      const { resourceName, baudRate, readTimeoutMs } = config.instrument;
      const transport = opts.transport
         ? opts.transport(config)
         : new SerialScpiTransport(resourceName, baudRate, log);
      return new ScpiInstrumentChannel(transport, readTimeoutMs, log);
   };
}

export const createInstrumentChannel: ChannelFactory = createChannelFactory();
