import { describe, it, expect } from "vitest";
import { classifyDiffLine, parsePatch } from "../../src/utils/diff-parser.js";
import { SIMPLE_PATCH, MULTI_HUNK_PATCH } from "../fixtures/sample-patch.js";

describe("diff-parser", () => {
  it("parses a simple patch with additions and deletions", () => {
    const result = parsePatch("server.ts", SIMPLE_PATCH, "modified");

    expect(result.filename).toBe("server.ts");
    expect(result.status).toBe("modified");
    expect(result.additions).toBe(5);
    expect(result.deletions).toBe(1);
    expect(result.hunks).toHaveLength(1);
  });

  it("numbers added lines on the new side", () => {
    const result = parsePatch("server.ts", SIMPLE_PATCH, "modified");
    const added = result.hunks[0].lines.filter((l) => l.type === "add").map((l) => l.newLineNumber);

    expect(added).toEqual([3, 4, 6, 8, 9]);
  });

  it("parses multi-hunk patches", () => {
    const result = parsePatch("orders.go", MULTI_HUNK_PATCH, "modified");

    expect(result.hunks).toHaveLength(2);
    expect(result.hunks[1].newStart).toBe(25);
    expect(result.additions).toBe(5);
  });

  it("handles an empty patch", () => {
    const result = parsePatch("empty.ts", undefined, "added");

    expect(result.status).toBe("added");
    expect(result.hunks).toHaveLength(0);
    expect(result.additions).toBe(0);
  });

  it("normalizes file status", () => {
    expect(parsePatch("b.ts", "", "removed").status).toBe("removed");
    expect(parsePatch("c.ts", "", "renamed").status).toBe("renamed");
    expect(parsePatch("e.ts", "", "changed").status).toBe("modified");
  });
});

describe("classifyDiffLine", () => {
  it("strips the prefix of each line kind", () => {
    expect(classifyDiffLine("+added")).toEqual({ kind: "add", content: "added" });
    expect(classifyDiffLine("-removed")).toEqual({ kind: "del", content: "removed" });
    expect(classifyDiffLine(" same")).toEqual({ kind: "context", content: "same" });
    expect(classifyDiffLine("bare")).toEqual({ kind: "context", content: "bare" });
  });

  it("marks hunk headers and no-newline markers as meta", () => {
    expect(classifyDiffLine("@@ -1 +1 @@").kind).toBe("meta");
    expect(classifyDiffLine("\\ No newline at end of file").kind).toBe("meta");
  });
});
