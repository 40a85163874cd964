import { describe, it, expect } from "vitest";
import type { Detection } from "@/analysis/types";
import { createReporter, formatDetection, formatSummary } from "../reporter";

const RAW = "Aug 29 11:01:01 gateway sshd[12345]: Failed password for root from 10.0.0.5 port 22 ssh2";

function detection(verdict: Detection["verdict"], rule: Detection["rule"]): Detection {
  return {
    verdict,
    rule,
    lineNumber: 1,
    line: { raw: RAW, seconds: 0, accountId: "12345", failed: true },
  };
}

describe("formatDetection", () => {
  it("formats a banned IP report", () => {
    expect(formatDetection(detection("banned-ip", "denylist"))).toBe(
      `Hacking due to banned IP. Line: ${RAW}`
    );
  });

  it("uses the banned IP reason for already-flagged accounts", () => {
    expect(formatDetection(detection("banned-ip", "flagged"))).toBe(
      `Hacking due to banned IP. Line: ${RAW}`
    );
  });

  it("formats a frequency report", () => {
    expect(formatDetection(detection("frequency-violation", "frequency"))).toBe(
      `Hacking due to frequency. Line: ${RAW}`
    );
  });

  it("returns null for clear lines", () => {
    expect(formatDetection(detection("clear", null))).toBeNull();
  });
});

describe("formatSummary", () => {
  it("states lines processed and attempts found", () => {
    expect(formatSummary(5, 1)).toBe("Processed 5 lines. Found 1 possible hacking attempts.");
  });
});

describe("createReporter", () => {
  it("writes one line per detection and the summary", () => {
    const chunks: string[] = [];
    const reporter = createReporter({ write: (chunk: string) => chunks.push(chunk) });

    reporter.detection(detection("frequency-violation", "frequency"));
    reporter.detection(detection("clear", null));
    reporter.summary(7, 1);

    expect(chunks).toEqual([
      `Hacking due to frequency. Line: ${RAW}\n`,
      "Processed 7 lines. Found 1 possible hacking attempts.\n",
    ]);
  });
});
