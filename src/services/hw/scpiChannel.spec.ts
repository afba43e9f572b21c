import { CommunicationError, ConnectionError, TransportTimeoutError } from "../utils/errors";
import type { ScpiTransport } from "./instrument";
import { parseNumericReply, parseSystemError, ScpiInstrumentChannel, SCPI } from "./scpiChannel";


type Reply = string | Error;

/** Line transport with canned replies per query. */
class FakeTransport implements ScpiTransport {
   readonly description = "fake";
   isOpen = false;
   writes: string[] = [];
   queries: string[] = [];
   closeCalls = 0;
   openError: Error | null = null;
   writeError: Error | null = null;
   private readonly replies = new Map<string, Reply[]>();

   reply(command: string, ...replies: Reply[]): this {
      this.replies.set(command, [...(this.replies.get(command) ?? []), ...replies]);
      return this;
   }

   async open(): Promise<void> {
      if (this.openError) throw this.openError;
      this.isOpen = true;
   }

   async write(command: string): Promise<void> {
      if (this.writeError) throw this.writeError;
      this.writes.push(command);
   }

   async query(command: string, timeoutMs: number): Promise<string> {
      this.queries.push(command);
      const next = this.replies.get(command)?.shift();
      if (next === undefined) throw new TransportTimeoutError(command, timeoutMs);
      if (next instanceof Error) throw next;
      return next;
   }

   async close(): Promise<void> {
      this.closeCalls++;
      this.isOpen = false;
   }
}

const IDENTITY = "TEST,PSU1000,SN0001,1.0";

async function openChannel(transport = new FakeTransport()) {
   transport.reply(SCPI.IDN, `${IDENTITY}\n`).reply(SCPI.SYSTEM_ERROR, '0,"No error"');
   const channel = new ScpiInstrumentChannel(transport, 500);
   await channel.open();
   return { channel, transport };
}

describe("reply parsing", () => {
   it("parses strict numbers only", () => {
      expect(parseNumericReply("4.0012\n")).toBe(4.0012);
      expect(parseNumericReply(" +4.00 ")).toBe(4);
      expect(parseNumericReply("1.5E-3")).toBe(0.0015);
      expect(parseNumericReply(".5")).toBe(0.5);
      expect(parseNumericReply("")).toBeNull();
      expect(parseNumericReply("abc")).toBeNull();
      expect(parseNumericReply("1.2.3")).toBeNull();
      expect(parseNumericReply("NaN")).toBeNull();
      expect(parseNumericReply("4.0V")).toBeNull();
   });

   it("treats code 0 as no error", () => {
      expect(parseSystemError('0,"No error"')).toBeNull();
      expect(parseSystemError('+0,"No error"\n')).toBeNull();
      expect(parseSystemError('-222,"Data out of range"')).toBe('-222,"Data out of range"');
   });
});

describe("ScpiInstrumentChannel", () => {
   it("opens the link and returns the identity", async () => {
      const { channel, transport } = await openChannel();
      expect(transport.isOpen).toBe(true);
      expect(transport.queries).toEqual(["*IDN?"]);
      await expect(channel.open()).resolves.toBe(IDENTITY);
      expect(transport.queries).toEqual(["*IDN?"]);
   });

   it("reports an unreachable instrument as ConnectionError", async () => {
      const transport = new FakeTransport();
      transport.openError = new Error("port busy");
      const channel = new ScpiInstrumentChannel(transport, 500);

      const err = await channel.open().catch((e: unknown) => e);
      expect(err).toBeInstanceOf(ConnectionError);
      expect(err instanceof Error && err.message).toBe("Cannot connect to fake: port busy");
   });

   it("releases the link when the identity query times out", async () => {
      const transport = new FakeTransport();
      const channel = new ScpiInstrumentChannel(transport, 500);

      await expect(channel.open()).rejects.toThrow(ConnectionError);
      expect(transport.isOpen).toBe(false);
      expect(transport.closeCalls).toBe(1);
   });

   it("disables OVP and applies the set point in constant-voltage mode", async () => {
      const { channel, transport } = await openChannel();
      await channel.configure(4, 0.5, "constantVoltage", { overVoltageLimit: 4.2 });
      expect(transport.writes).toEqual([":OUTP:OVP OFF", ":APPL CH1,4,0.5"]);
      expect(transport.queries).toEqual(["*IDN?", ":SYST:ERR?"]);
   });

   it("arms OVP at the threshold in constant-current mode", async () => {
      const { channel, transport } = await openChannel();
      await channel.configure(4, 0.5, "constantCurrent", { overVoltageLimit: 4.2 });
      expect(transport.writes).toEqual([":VOLT:PROT 4.2", ":OUTP:OVP ON", ":APPL CH1,4,0.5"]);
   });

   it("fails configuration the instrument rejects", async () => {
      const transport = new FakeTransport().reply(SCPI.IDN, IDENTITY).reply(SCPI.SYSTEM_ERROR, '-222,"Data out of range"');
      const channel = new ScpiInstrumentChannel(transport, 500);
      await channel.open();

      await expect(channel.configure(40, 0.5, "constantVoltage")).rejects.toThrow(
         new ConnectionError('Instrument rejected configuration: -222,"Data out of range"')
      );
   });

   it("refuses to configure before open", async () => {
      const channel = new ScpiInstrumentChannel(new FakeTransport(), 500);
      await expect(channel.configure(4, 0.5, "constantVoltage")).rejects.toThrow(ConnectionError);
   });

   it("switches the output", async () => {
      const { channel, transport } = await openChannel();
      await channel.setOutput(true);
      await channel.setOutput(false);
      expect(transport.writes).toEqual([":OUTP CH1,ON", ":OUTP CH1,OFF"]);
   });

   it("reads voltage then current", async () => {
      const { channel, transport } = await openChannel();
      transport.reply(SCPI.MEAS_VOLT, "4.0012\n").reply(SCPI.MEAS_CURR, "0.2503\n");

      await expect(channel.readMeasurement()).resolves.toEqual({ voltage: 4.0012, current: 0.2503 });
      expect(transport.queries.slice(1)).toEqual([":MEAS:VOLT? CH1", ":MEAS:CURR? CH1"]);
   });

   it("rejects malformed measurement replies", async () => {
      const { channel, transport } = await openChannel();
      transport.reply(SCPI.MEAS_VOLT, "4.00").reply(SCPI.MEAS_CURR, "ERR");

      await expect(channel.readMeasurement()).rejects.toThrow(new CommunicationError("Malformed measurement reply"));
   });

   it("turns a read timeout into CommunicationError", async () => {
      const { channel } = await openChannel();

      const err = await channel.readMeasurement().catch((e: unknown) => e);
      expect(err).toBeInstanceOf(CommunicationError);
      expect(err instanceof Error && err.message).toBe('Read failed: no reply to ":MEAS:VOLT? CH1" within 500 ms');
      expect(err instanceof Error && err.cause).toBeInstanceOf(TransportTimeoutError);
   });

   it("turns the output off once on close and then refuses further use", async () => {
      const { channel, transport } = await openChannel();
      await channel.close();
      await channel.close();

      expect(transport.writes).toEqual([":OUTP CH1,OFF"]);
      expect(transport.closeCalls).toBe(1);
      await expect(channel.readMeasurement()).rejects.toThrow(new CommunicationError("Instrument channel already closed"));
      await expect(channel.open()).rejects.toThrow(ConnectionError);
   });

   it("still releases the link when output-off fails on close", async () => {
      const { channel, transport } = await openChannel();
      transport.writeError = new Error("EIO");

      await expect(channel.close()).resolves.toBeUndefined();
      expect(transport.isOpen).toBe(false);
   });

   it("skips output-off when the link never opened", async () => {
      const transport = new FakeTransport();
      await new ScpiInstrumentChannel(transport, 500).close();
      expect(transport.writes).toEqual([]);
      expect(transport.closeCalls).toBe(0);
   });
});
