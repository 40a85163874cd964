import type { Detection } from "@/analysis/types";
import { REPORT_REASONS } from "./constants";

/** Anything with a `write` method, e.g. process.stdout. */
export interface ReportSink {
  write(chunk: string): unknown;
}

export function formatDetection(detection: Detection): string | null {
  if (detection.verdict === "clear") return null;
  return `Hacking due to ${REPORT_REASONS[detection.verdict]}. Line: ${detection.line.raw}`;
}

export function formatSummary(totalLinesProcessed: number, violationCount: number): string {
  return `Processed ${totalLinesProcessed} lines. Found ${violationCount} possible hacking attempts.`;
}

/**
 * Streams report lines to a sink as detections arrive, then the summary.
 */
export function createReporter(sink: ReportSink) {
  return {
    detection(detection: Detection): void {
      const line = formatDetection(detection);
      if (line !== null) sink.write(line + "\n");
    },

    summary(totalLinesProcessed: number, violationCount: number): void {
      sink.write(formatSummary(totalLinesProcessed, violationCount) + "\n");
    },
  };
}
