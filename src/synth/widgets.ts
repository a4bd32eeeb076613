import { createChildLogger, type Logger } from "../utils/logger.js";
import type { DashboardSuggestion } from "../extract/types.js";
import {
  coerceInteger,
  describeKind,
  field,
  parseFragment,
  stringField,
  type LooseMapping,
  type LooseValue,
} from "./loose-value.js";
import {
  DASHBOARD_DESCRIPTION,
  DEFAULT_LAYOUT,
  DEFAULT_PANEL_QUERY,
  DEFAULT_WIDGET_QUERY,
  DEFAULT_WIDGET_TITLE,
  ENV_TEMPLATE_VARIABLE,
  LINE_STYLE,
  stringTargetQuery,
  type DashboardSpec,
  type LayoutRect,
  type WidgetSpec,
} from "./types.js";

const defaultLog = createChildLogger({ module: "widget-synthesizer" });

export interface SynthesizeOptions {
  log?: Logger;
}

type DashboardFragments = Pick<DashboardSuggestion, "name" | "queries" | "panels" | "alerts">;

/**
 * Turns one dashboard suggestion into a positioned widget layout.
 *
 * Throws `FragmentParseError` when any of the three JSON bodies is not an
 * array of objects. Problems inside a panel never throw: the panel is skipped
 * (bad `title`/`gridPos`) or the field falls back to its default.
 */
export function synthesizeDashboard(
  suggestion: DashboardFragments,
  opts: SynthesizeOptions = {}
): DashboardSpec {
  const log = (opts.log ?? defaultLog).child({ dashboard: suggestion.name });

  const queries = parseFragment("queries", suggestion.queries);
  const panels = parseFragment("panels", suggestion.panels);
  const alerts = parseFragment("alerts", suggestion.alerts);
  log.debug(
    { queries: queries.length, panels: panels.length, alerts: alerts.length },
    "Parsed dashboard fragments"
  );

  const widgets: WidgetSpec[] = [];
  panels.forEach((panel, index) => {
    const widget = panelToWidget(panel, queries, log.child({ panel: index }));
    if (widget) widgets.push(widget);
  });

  if (widgets.length === 0) {
    log.warn("No valid widgets created, adding a default widget");
    widgets.push(defaultWidget());
  }

  return {
    title: suggestion.name,
    description: DASHBOARD_DESCRIPTION,
    layoutType: "ordered",
    widgets,
    templateVariables: [{ ...ENV_TEMPLATE_VARIABLE }],
    notifyList: [],
  };
}

export function defaultWidget(): WidgetSpec {
  return {
    title: DEFAULT_WIDGET_TITLE,
    query: DEFAULT_WIDGET_QUERY,
    displayType: "line",
    layout: { ...DEFAULT_LAYOUT },
  };
}

function panelToWidget(
  panel: LooseMapping,
  queries: readonly LooseMapping[],
  log: Logger
): WidgetSpec | null {
  const title = stringField(panel, "title");
  if (title === undefined) {
    log.warn({ got: describeKind(field(panel, "title")) }, "Panel title is not a string, skipping panel");
    return null;
  }

  const gridPos = field(panel, "gridPos");
  if (gridPos.kind !== "mapping") {
    log.warn({ title, got: describeKind(gridPos) }, "Panel gridPos is not a mapping, skipping panel");
    return null;
  }

  return {
    title,
    query: resolvePanelQuery(title, field(panel, "targets"), queries, log),
    displayType: "line",
    style: { ...LINE_STYLE },
    legendSize: "small",
    layout: resolveLayout(gridPos.fields, title, log),
  };
}

/**
 * Picks the panel's query: the `expr` of the last target whose `refId`
 * names a known query, else a fallback. A string `targets` switches the
 * fallback to a title-based query.
 */
export function resolvePanelQuery(
  title: string,
  targets: LooseValue,
  queries: readonly LooseMapping[],
  log: Logger = defaultLog
): string {
  let fallback = DEFAULT_PANEL_QUERY;
  let candidates: LooseValue[] = [];
  let resolved: string | undefined;

  switch (targets.kind) {
    case "list":
      candidates = targets.items;
      break;
    case "mapping":
      candidates = [targets];
      break;
    case "absent":
      log.warn({ title }, "Panel has no targets, using default query");
      break;
    case "string":
      log.warn({ title }, "Panel targets is a string, using panel title as query");
      fallback = stringTargetQuery(title);
      break;
    default:
      log.warn({ title, got: describeKind(targets) }, "Panel targets has unexpected type, using default query");
  }

  for (const target of candidates) {
    if (target.kind !== "mapping") {
      log.warn({ title, got: describeKind(target) }, "Target is not a mapping, skipping target");
      continue;
    }
    const refId = stringField(target.fields, "refId");
    if (refId === undefined) {
      log.warn({ title }, "Target refId is not a string, skipping target");
      continue;
    }
    const expr = lookupQueryExpr(refId, queries);
    if (expr === undefined) {
      log.warn({ title, refId }, "No matching query found for refId");
      continue;
    }
    // later targets override earlier ones
    resolved = expr;
  }

  if (resolved !== undefined) return resolved;
  log.debug({ title, query: fallback }, "Using fallback query for panel");
  return fallback;
}

function lookupQueryExpr(refId: string, queries: readonly LooseMapping[]): string | undefined {
  for (const query of queries) {
    if (stringField(query, "refId") !== refId) continue;
    const expr = stringField(query, "expr");
    if (expr !== undefined && expr.trim() !== "") return expr;
  }
  return undefined;
}

const GRID_FIELDS = [
  ["x", "x"],
  ["y", "y"],
  ["w", "width"],
  ["h", "height"],
] as const;

export function resolveLayout(gridPos: LooseMapping, title: string, log: Logger = defaultLog): LayoutRect {
  const layout: LayoutRect = { ...DEFAULT_LAYOUT };
  for (const [key, target] of GRID_FIELDS) {
    const value = coerceInteger(field(gridPos, key));
    if (value === undefined) {
      log.warn({ title, field: key, fallback: DEFAULT_LAYOUT[target] }, "Grid position is not a number, using default");
      continue;
    }
    layout[target] = value;
  }
  return layout;
}
