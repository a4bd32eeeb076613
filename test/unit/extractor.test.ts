import { describe, it, expect } from "vitest";
import {
  extractAlertSuggestions,
  extractCodeSuggestions,
  extractDashboardSuggestions,
  extractResponse,
  extractSummary,
  hasNoFeedback,
} from "../../src/extract/extractor.js";
import { SummaryNotFoundError } from "../../src/utils/errors.js";
import {
  ALERT_RESPONSE,
  ALERTS_JSON,
  CODE_REVIEW_RESPONSE,
  DASHBOARD_RESPONSE,
  PANELS_JSON,
  QUERIES_JSON,
} from "../fixtures/llm-responses.js";

const F = "```";

describe("extractCodeSuggestions", () => {
  it("extracts a single well-formed block exactly", () => {
    const text = `FILE: a.go\nLINE: 10\nSUGGESTION:\n${F}diff\n+x\n${F}`;
    expect(extractCodeSuggestions(text)).toEqual([{ fileName: "a.go", lineNum: "10", content: "x" }]);
  });

  it("extracts every block in order", () => {
    expect(extractCodeSuggestions(CODE_REVIEW_RESPONSE)).toEqual([
      {
        fileName: "services/payments/refund.go",
        lineNum: "27",
        content: '  log.Info("refund requested", "order", o.ID)\n  return payments.Refund(o.ID)',
      },
      {
        fileName: "services/orders/order.go",
        lineNum: "12",
        content: "  metrics.OrdersSaved.Inc()",
      },
    ]);
  });

  it("returns nothing when the response contains LGTM", () => {
    const text = `LGTM, but FYI:\nFILE: a.go\nLINE: 10\nSUGGESTION:\n${F}diff\n+x\n${F}`;
    expect(extractCodeSuggestions(text)).toEqual([]);
  });

  it("skips a block whose line reference is not numeric", () => {
    const text = `FILE: a.go\nLINE: ten\nSUGGESTION:\n${F}diff\n+x\n${F}`;
    expect(extractCodeSuggestions(text)).toEqual([]);
  });

  it("skips a block whose fence is not tagged diff", () => {
    const text = `FILE: a.go\nLINE: 3\nSUGGESTION:\n${F}go\n+x\n${F}`;
    expect(extractCodeSuggestions(text)).toEqual([]);
  });

  it("returns an empty list for prose", () => {
    expect(extractCodeSuggestions("No structured output here.")).toEqual([]);
  });
});

describe("extractDashboardSuggestions", () => {
  it("keeps the three JSON bodies as raw text", () => {
    expect(extractDashboardSuggestions(DASHBOARD_RESPONSE)).toEqual([
      {
        name: "Refund Health",
        type: "grafana",
        priority: "high",
        queries: `${QUERIES_JSON}\n`,
        panels: `${PANELS_JSON}\n`,
        alerts: `${ALERTS_JSON}\n`,
      },
    ]);
  });

  it("does not parse the JSON bodies", () => {
    const text = `DASHBOARD: Broken\nTYPE: grafana\nPRIORITY: low\nQUERIES:\n${F}json\nnot json\n${F}\nPANELS:\n${F}json\n[\n${F}\nALERTS:\n${F}json\n{}\n${F}`;
    const [suggestion] = extractDashboardSuggestions(text);
    expect(suggestion.queries).toBe("not json\n");
    expect(suggestion.panels).toBe("[\n");
    expect(suggestion.alerts).toBe("{}\n");
  });

  it("discards a block with the sections out of order", () => {
    const text = `DASHBOARD: X\nTYPE: grafana\nPRIORITY: low\nPANELS:\n${F}json\n[]\n${F}\nQUERIES:\n${F}json\n[]\n${F}\nALERTS:\n${F}json\n[]\n${F}`;
    expect(extractDashboardSuggestions(text)).toEqual([]);
  });

  it("returns nothing on LGTM", () => {
    expect(extractDashboardSuggestions(`${DASHBOARD_RESPONSE}\nLGTM`)).toEqual([]);
  });
});

describe("extractAlertSuggestions", () => {
  it("extracts every field and trims the query", () => {
    expect(extractAlertSuggestions(ALERT_RESPONSE)).toEqual([
      {
        name: "Refund error rate",
        type: "metric",
        priority: "P1",
        query: "sum(last_5m):sum:refunds.errors{*}.as_count() > 10",
        description: "Refund requests are failing",
        threshold: "> 10 errors",
        duration: "5m",
        notification: "#payments-oncall",
        runbookLink: "https://runbooks.example.com/refunds",
      },
      {
        name: "Refund latency",
        type: "apm",
        priority: "P2",
        query: "avg(last_10m):avg:refunds.latency{*} > 2",
        description: "Refunds are slow",
        threshold: "> 2s",
        duration: "10m",
        notification: "#payments",
        runbookLink: "none",
      },
    ]);
  });

  it("accepts a single trailing newline after the runbook link", () => {
    const text = `ALERT: A\nTYPE: log\nPRIORITY: P3\nQUERY:\n${F}\nq\n${F}\nDESCRIPTION: d\nTHRESHOLD: t\nDURATION: 1m\nNOTIFICATION: n\nRUNBOOK_LINK: r\n`;
    expect(extractAlertSuggestions(text).map((a) => a.runbookLink)).toEqual(["r"]);
  });

  it("discards a block missing a labelled field", () => {
    const text = `ALERT: A\nTYPE: log\nPRIORITY: P3\nQUERY:\n${F}\nq\n${F}\nDESCRIPTION: d\nDURATION: 1m\nNOTIFICATION: n\nRUNBOOK_LINK: r`;
    expect(extractAlertSuggestions(text)).toEqual([]);
  });

  it("returns nothing on LGTM", () => {
    expect(extractAlertSuggestions(`LGTM\n\n${ALERT_RESPONSE}`)).toEqual([]);
  });
});

describe("extractSummary", () => {
  it("stops at the next FILE block", () => {
    expect(extractSummary("SUMMARY:\nHello world\n\nFILE: a.go")).toBe("Hello world");
  });

  it("stops at the next markdown section", () => {
    expect(extractSummary(CODE_REVIEW_RESPONSE)).toBe("The new refund path has no logging or metrics.");
  });

  it("runs to the end of text when no marker follows", () => {
    expect(extractSummary("Intro\nSUMMARY:  Multi\nline summary.\n")).toBe("Multi\nline summary.");
  });

  it("throws SummaryNotFoundError without a summary label", () => {
    expect(() => extractSummary("FILE: a.go")).toThrow(SummaryNotFoundError);
    expect(() => extractSummary("FILE: a.go")).toThrow("could not extract summary from response");
  });
});

describe("hasNoFeedback", () => {
  it("detects the marker anywhere in the text", () => {
    expect(hasNoFeedback("Everything checks out. LGTM!")).toBe(true);
    expect(hasNoFeedback("lgtm")).toBe(false);
  });
});

describe("extractResponse", () => {
  it("runs only the requested extractions", () => {
    const result = extractResponse(CODE_REVIEW_RESPONSE, ["code"]);
    expect(result.code).toHaveLength(2);
    expect(result.dashboards).toEqual([]);
    expect(result.alerts).toEqual([]);
    expect(result.summary).toBe("The new refund path has no logging or metrics.");
  });

  it("keeps extracted lists when the summary is missing", () => {
    const result = extractResponse(ALERT_RESPONSE, ["alerts"]);
    expect(result.summary).toBeUndefined();
    expect(result.alerts).toHaveLength(2);
  });
});
