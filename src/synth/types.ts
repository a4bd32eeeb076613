export interface LayoutRect {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface WidgetStyle {
  palette: string;
  lineType: "solid" | "dashed" | "dotted";
  lineWidth: "thin" | "normal" | "thick";
}

export interface WidgetSpec {
  title: string;
  /** Never empty. */
  query: string;
  displayType: "line";
  style?: WidgetStyle;
  legendSize?: string;
  layout: LayoutRect;
}

export interface TemplateVariable {
  name: string;
  prefix: string;
  default: string;
}

/** A dashboard ready for the backend. `widgets` always has at least one entry. */
export interface DashboardSpec {
  title: string;
  description: string;
  layoutType: "ordered";
  widgets: WidgetSpec[];
  templateVariables: TemplateVariable[];
  notifyList: string[];
}

export const DEFAULT_PANEL_QUERY = "avg:system.cpu.user{*} by {host}.rollup(avg, 30)";
export const DEFAULT_WIDGET_QUERY = "avg:system.cpu.user{*}";
export const DEFAULT_WIDGET_TITLE = "Default Widget";
export const DASHBOARD_DESCRIPTION = "Created by tracelens";

export const DEFAULT_LAYOUT: Readonly<LayoutRect> = { x: 0, y: 0, width: 12, height: 8 };

export const LINE_STYLE: Readonly<WidgetStyle> = {
  palette: "black_on_light_green",
  lineType: "solid",
  lineWidth: "normal",
};

export const ENV_TEMPLATE_VARIABLE: Readonly<TemplateVariable> = {
  name: "env",
  prefix: "env",
  default: "*",
};

/** Query used when a panel's `targets` is a bare string instead of target objects. */
export function stringTargetQuery(title: string): string {
  return `avg:system.load.1{$env} by {host}.rollup(avg, 60) as "${title}"`;
}
