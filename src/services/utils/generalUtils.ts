import dayjs from "../../lib/dayjs-setup";


/** Resolves after `ms`, or early (without rejecting) once `signal` aborts. */
export const delay = (ms: number, signal?: AbortSignal): Promise<void> => {
   return new Promise<void>((resolve) => {
      if (signal?.aborted) return resolve();
      const onAbort = () => {
         clearTimeout(t);
         resolve();
      };
      const t = setTimeout(() => {
         signal?.removeEventListener("abort", onAbort);
         resolve();
      }, Math.max(0, ms));
      signal?.addEventListener("abort", onAbort, { once: true });
   });
};

/** UTC ISO-8601, e.g. 2026-10-19T12:25:01.123Z */
export const nowIso = (d?: Date | number | string) => dayjs.utc(d).toISOString();

/** Local wall-clock stamp used in export filenames: 20261019_142501_123 */
export const fileStamp = (d?: Date | number | string) => dayjs(d).format("YYYYMMDD_HHmmss_SSS");

/** 4.05 -> "4_05" (filename-safe). */
export const numberSlug = (value: number) => String(value).replace(/\./g, "_").replace(/-/g, "m");

export const formatElapsed = (ms: number) => dayjs.duration(Math.max(0, ms)).format("HH:mm:ss.SSS");

export const errorMessage = (err: unknown): string =>
   err instanceof Error ? err.message : String(err);
