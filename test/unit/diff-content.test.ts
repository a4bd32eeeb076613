import { describe, it, expect } from "vitest";
import { extractActualContent } from "../../src/extract/diff-content.js";

describe("extractActualContent", () => {
  it("keeps added lines without their prefix", () => {
    expect(extractActualContent("+x\n")).toBe("x");
  });

  it("drops removed and context lines when additions exist", () => {
    const body = " func handle() {\n-  doWork()\n+  span := tracer.Start(\"handle\")\n+  doWork()\n }\n";
    expect(extractActualContent(body)).toBe('  span := tracer.Start("handle")\n  doWork()');
  });

  it("preserves the order of added lines across hunks", () => {
    const body = "@@ -1,2 +1,3 @@\n+first\n context\n@@ -9,1 +10,2 @@\n+second\n";
    expect(extractActualContent(body)).toBe("first\nsecond");
  });

  it("skips a leading file header", () => {
    const body = "--- a/main.go\n+++ b/main.go\n+log.Println(\"start\")\n";
    expect(extractActualContent(body)).toBe('log.Println("start")');
  });

  it("keeps an added line that happens to start with ++", () => {
    expect(extractActualContent("+++counter;\n")).toBe("++counter;");
  });

  it("falls back to context lines when the diff has no additions", () => {
    const body = "metrics.Inc(\"orders\")\n-oldCall()\n log.Info(\"done\")\n";
    expect(extractActualContent(body)).toBe('metrics.Inc("orders")\nlog.Info("done")');
  });

  it("ignores no-newline markers and trailing blank lines", () => {
    expect(extractActualContent("+a\n\\ No newline at end of file\n+\n\n")).toBe("a");
  });

  it("returns an empty string for a removal-only diff", () => {
    expect(extractActualContent("-gone\n")).toBe("");
  });
});
