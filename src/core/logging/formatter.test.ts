import { describe, expect, test } from "vitest";
import { createFormatterStream, formatCompact, formatHybrid, formatMinimal, getFormatter } from "./formatter.js";

// Strip ANSI color codes
function plain(text: string): string {
  return text.replace(/\x1b\[\d+m/g, "");
}

const log = {
  level: 30,
  time: "2024-05-06T07:08:09.123Z",
  component: "pipeline",
  event: "pipeline_complete",
  result: true,
  skipped: ["s3"],
};

describe("formatters", () => {
  test("compact puts everything on one line", () => {
    expect(plain(formatCompact(log))).toBe(
      '07:08:09.123 INFO  [pipeline] pipeline_complete result=true skipped=["s3"]',
    );
  });

  test("hybrid moves the fields to a second line", () => {
    expect(plain(formatHybrid(log))).toBe('07:08:09.123 INFO  [pipeline] pipeline_complete\n  result=true skipped=["s3"]');
  });

  test("minimal keeps seconds and the event only", () => {
    expect(plain(formatMinimal(log))).toBe('09.123 pipeline_complete result=true skipped=["s3"]');
  });

  test("falls back to compact", () => {
    expect(getFormatter("compact")).toBe(formatCompact);
  });
});

describe("createFormatterStream", () => {
  test("writes formatted lines at or above LOG_LEVEL", () => {
    const saved = process.env.LOG_LEVEL;
    process.env.LOG_LEVEL = "warn";
    const lines: string[] = [];
    const stream = createFormatterStream("minimal", { write: (line) => lines.push(line) });

    try {
      stream.write(JSON.stringify({ ...log, level: 30 }));
      stream.write(JSON.stringify({ ...log, level: 40, event: "origin_unavailable" }));
    } finally {
      if (saved === undefined) {
        delete process.env.LOG_LEVEL;
      } else {
        process.env.LOG_LEVEL = saved;
      }
    }

    expect(lines.map(plain)).toEqual(['09.123 origin_unavailable result=true skipped=["s3"]\n']);
  });

  test("passes through lines that are not JSON", () => {
    const lines: string[] = [];
    createFormatterStream("compact", { write: (line) => lines.push(line) }).write("not json\n");

    expect(lines).toEqual(["not json\n"]);
  });
});
