export * from "./types/sessionTypes";
export * from "./types/statusTypes";
export * from "./types/exportTypes";

export { AcquisitionSession, type AcquisitionDeps } from "./services/hw/acquisitionLoop";
export { acquisitionMachine, runStateOf } from "./services/hw/acquisitionMachine";
export { createChannelFactory, createInstrumentChannel, type ChannelFactory } from "./services/hw/hardware";
export type { InstrumentChannel, ScpiTransport, Protection } from "./services/hw/instrument";
export { ScpiInstrumentChannel, SCPI } from "./services/hw/scpiChannel";
export { SerialScpiTransport } from "./services/hw/serialTransport";
export { SimulatedInstrumentChannel, type SimulationOptions } from "./services/hw/simulatedChannel";

export { SampleBuffer } from "./services/utils/sampleBuffer";
export { StatusChannel } from "./services/utils/statusChannel";
export { evaluateThreshold, monitoredQuantity } from "./services/utils/threshold";
export { createSample, derivePower, deriveResistance } from "./services/utils/measurement";
export { createTerminalAlerter, type Alerter } from "./services/utils/alert";
export { createLogger, type Logger } from "./services/utils/logging";
export * from "./services/utils/errors";

export { DEFAULT_SESSION_CONFIG } from "./services/config/defaults";
export { createSessionConfig, validateConfig, parseConfigInput } from "./services/config/sessionConfig";
export { loadSettingsFile, saveSettingsFile } from "./services/config/settingsFile";

export { exportSamples, exportSession, buildBaseFilename, type ExportReport } from "./services/export/sessionExporter";
export { readCsvExport, writeCsvExport } from "./services/export/csvFormat";
export { readXlsxExport, writeXlsxExport } from "./services/export/xlsxFormat";
export { readJsonExport, writeJsonExport } from "./services/export/jsonFormat";
