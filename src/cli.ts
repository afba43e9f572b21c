#!/usr/bin/env node
import { parseArgs } from "node:util";

import { EXPORT_FORMATS, type ExportSelection, type SessionConfigInput } from "./types/sessionTypes";
import type { StatusEvent } from "./types/statusTypes";
import { AcquisitionSession } from "./services/hw/acquisitionLoop";
import { createSessionConfig } from "./services/config/sessionConfig";
import { loadSettingsFile } from "./services/config/settingsFile";
import { exportSession } from "./services/export/sessionExporter";
import { ConfigError } from "./services/utils/errors";
import { formatElapsed } from "./services/utils/generalUtils";
import { createLogger } from "./services/utils/logging";


const USAGE = `Usage: psu-autostop [options]

  -c, --config <file>    settings JSON (default: psu-settings.json; missing file = defaults)
  -s, --simulate         use the simulated supply
  -f, --format <fmt>     csv | xlsx | json | all (overrides settings)
  -o, --out <dir>        export directory (overrides settings)
  -n, --notes <text>     notes stored with the export
  -h, --help             show this help

Ctrl+C stops the session; the data recorded so far is exported.`;

const SELECTIONS: readonly ExportSelection[] = [...EXPORT_FORMATS, "all"];


function printEvent(evt: StatusEvent): void {
   if (evt.kind === "dataPoint") {
      const s = evt.sample;
      const r = s.resistance === undefined ? "-" : s.resistance.toFixed(3);
      console.log(
         `  ${formatElapsed(s.timestamp * 1000)}  ${s.voltage.toFixed(4)} V  ${s.current.toFixed(4)} A  ${s.power.toFixed(4)} W  ${r} Ω`
      );
      return;
   }
   const line = `[${evt.kind.toUpperCase()}] ${evt.message}`;
   if (evt.kind === "error") console.error(line);
   else console.log(line);
}

export async function main(argv: string[]): Promise<number> {
   const log = createLogger("CLI");
   const { values } = parseArgs({
      args: argv,
      options: {
         config: { type: "string", short: "c", default: "psu-settings.json" },
         simulate: { type: "boolean", short: "s", default: false },
         format: { type: "string", short: "f" },
         out: { type: "string", short: "o" },
         notes: { type: "string", short: "n" },
         help: { type: "boolean", short: "h", default: false },
      },
   });

   if (values.help) {
      console.log(USAGE);
      return 0;
   }

   const format = values.format === undefined ? undefined : SELECTIONS.find((f) => f === values.format);
   if (values.format !== undefined && format === undefined) {
      console.error(`Unknown format "${values.format}". ${USAGE}`);
      return 64;
   }

   let input: SessionConfigInput;
   try {
      const settings = await loadSettingsFile(values.config ?? "psu-settings.json");
      input = {
         ...settings,
         ...(values.simulate ? { simulation: true } : {}),
         ...(format ? { exportFormat: format } : {}),
         ...(values.out ? { saveLocation: values.out } : {}),
         ...(values.notes !== undefined ? { notes: values.notes } : {}),
      };
      createSessionConfig(input);
   } catch (err) {
      if (err instanceof ConfigError) {
         for (const issue of err.issues) console.error(`  ${issue.field}: ${issue.message}`);
         return 78;
      }
      throw err;
   }

   const session = new AcquisitionSession();
   session.status.subscribe(printEvent);

   const onSigint = () => {
      log.info("SIGINT received, stopping...");
      session.stop().catch((err: unknown) => log.error("Stop failed", err));
   };
   process.on("SIGINT", onSigint);

   try {
      const result = await session.start(input);
      const report = await exportSession(result, { status: session.status });
      if (result.reason === "error") return 1;
      return report.failed.length > 0 ? 2 : 0;
   } finally {
      process.off("SIGINT", onSigint);
   }
}


if (require.main === module) {
   main(process.argv.slice(2)).then(
      (code) => { process.exitCode = code; },
      (err: unknown) => {
         console.error(err);
         process.exitCode = 1;
      }
   );
}
