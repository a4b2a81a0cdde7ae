// Frame Pipeline - Run summary rendering

import type { RunReport } from "./types.js";

const BYTES_PER_MEGABYTE = 1024 * 1024;

/** Bytes as megabytes with two decimals, e.g. 1572864 → "1.50". */
export function formatMegabytes(bytes: number): string {
  return (bytes / BYTES_PER_MEGABYTE).toFixed(2);
}

/**
 * Renders the end-of-run summary, one line per entry:
 *   ----- SUMMARY -----
 *   Run ID: ...
 *   ...
 *   -------------------
 */
export function formatReport(report: RunReport): string[] {
  return [
    "----- SUMMARY -----",
    `Run ID: ${report.runId}`,
    `Total frames generated: ${report.generated}`,
    `Total frames saved: ${report.saved}`,
    `Failed saves: ${report.failed}`,
    `Total data written: ${formatMegabytes(report.bytesWritten)} MB`,
    `Average rate: ${report.averageRate.toFixed(2)} frames/s`,
    `Frames pending in queue: ${report.pendingInQueue}`,
    `Frames dropped by backpressure: ${report.droppedByBackpressure}`,
    "-------------------",
  ];
}
