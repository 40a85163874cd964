import { describe, it, expect, vi } from "vitest";
import type { Detection } from "@/analysis/types";
import { scanLog } from "../index";
import { authLine, lookups } from "./fixtures";

const BANNED = "203.0.113.9";

async function* stream(lines: string[]): AsyncGenerator<string> {
  for (const line of lines) yield line;
}

describe("scanLog", () => {
  it("discards the header block and reports a single denylisted line", async () => {
    const body = [
      authLine("09:00:00", "10001"),
      authLine("09:01:00", "10002", { failed: false }),
      authLine("09:02:00", "10003", { ip: BANNED }),
      authLine("09:03:00", "10004"),
      authLine("09:04:00", "10005", { failed: false }),
    ];
    const result = await scanLog(
      stream(["HTTP/1.1 200 OK", "Content-Type: text/plain", "", ...body]),
      lookups([], [BANNED])
    );

    expect(result.totalLinesProcessed).toBe(5);
    expect(result.violationCount).toBe(1);
    expect(result.detections).toHaveLength(1);
    expect(result.detections[0]).toMatchObject({
      lineNumber: 3,
      verdict: "banned-ip",
      rule: "denylist",
    });
    expect(result.detections[0].line.raw).toBe(body[2]);
    expect(result.flaggedAccounts).toEqual(["10003"]);
  });

  it("treats a carriage-return-only line as the end of the header", async () => {
    const result = await scanLog(
      stream(["HTTP/1.1 200 OK\r", "\r", authLine("09:00:00", "10001") + "\r"]),
      lookups()
    );
    expect(result.totalLinesProcessed).toBe(1);
  });

  it("stops at the first empty body line", async () => {
    const result = await scanLog(
      stream([authLine("09:00:00", "10001"), "", authLine("09:00:01", "10002")]),
      lookups(),
      { skipHeaderBlock: false }
    );
    expect(result.totalLinesProcessed).toBe(1);
  });

  it("scans nothing when the header block never ends", async () => {
    const result = await scanLog(stream(["HTTP/1.1 200 OK", authLine("09:00:00", "10001")]), lookups());
    expect(result.totalLinesProcessed).toBe(0);
    expect(result.detections).toEqual([]);
  });

  it("accepts a plain iterable", async () => {
    const result = await scanLog([authLine("09:00:00", "10001")], lookups(), {
      skipHeaderBlock: false,
    });
    expect(result.totalLinesProcessed).toBe(1);
  });

  it("counts lines without an account identifier as skipped but processed", async () => {
    const result = await scanLog(
      stream(["Aug 29 09:00:00 gateway cron[99]: session opened", authLine("09:00:01", "10001")]),
      lookups(),
      { skipHeaderBlock: false }
    );
    expect(result.totalLinesProcessed).toBe(2);
    expect(result.skippedLineCount).toBe(1);
  });

  it("reports each detection through onDetection in line order", async () => {
    const seen: Detection[] = [];
    const onDetection = vi.fn((d: Detection) => seen.push(d));
    const lines = [
      authLine("09:00:00", "10001"),
      authLine("09:00:05", "10001"),
      authLine("09:00:10", "10001"),
      authLine("09:00:15", "10001"),
      authLine("09:30:00", "10001", { failed: false }),
      authLine("09:31:00", "10002"),
    ];
    const result = await scanLog(stream(lines), lookups(), {
      skipHeaderBlock: false,
      onDetection,
    });

    expect(onDetection).toHaveBeenCalledTimes(2);
    expect(seen.map((d) => [d.lineNumber, d.verdict, d.rule])).toEqual([
      [4, "frequency-violation", "frequency"],
      [5, "banned-ip", "flagged"],
    ]);
    expect(result.violationCount).toBe(2);
    expect(result.flaggedAccounts).toEqual(["10001"]);
  });

  it("applies the configured year and policy", async () => {
    const lines = [authLine("09:00:00", "10001"), authLine("09:00:30", "10001"), authLine("09:01:00", "10001")];
    const result = await scanLog(stream(lines), lookups(), {
      skipHeaderBlock: false,
      year: 2024,
      policy: { windowSeconds: 60, maxCloseFailures: 1 },
    });
    expect(result.detections).toHaveLength(1);
    expect(result.detections[0].line.seconds).toBe(Date.UTC(2024, 7, 29, 9, 1, 0) / 1000);
  });
});
