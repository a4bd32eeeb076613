import { client, v1 } from "@datadog/datadog-api-client";
import type { Env } from "../config/env.js";
import { isDatadogEnabled } from "../config/env.js";
import type { DashboardSpec, WidgetSpec } from "../synth/types.js";
import { DashboardSubmissionError, errorMessage, getErrorStatus } from "../utils/errors.js";
import { createChildLogger } from "../utils/logger.js";

const log = createChildLogger({ module: "datadog" });

/** What submission needs from the SDK; `v1.DashboardsApi` satisfies it. */
export interface DashboardsApi {
  createDashboard(params: { body: v1.Dashboard }): Promise<{ id?: string }>;
}

let _api: DashboardsApi | null = null;

/** Lazily built Datadog client, or `null` when no API/app key pair is configured. */
export function getDashboardsApi(env: Env): DashboardsApi | null {
  if (!isDatadogEnabled(env)) return null;
  if (_api) return _api;

  const configuration = client.createConfiguration({
    authMethods: {
      apiKeyAuth: env.DATADOG_API_KEY,
      appKeyAuth: env.DATADOG_APP_KEY,
    },
  });
  configuration.setServerVariables({ site: env.DATADOG_SITE });
  _api = new v1.DashboardsApi(configuration);
  return _api;
}

function toDatadogWidget(widget: WidgetSpec): v1.Widget {
  const request: v1.TimeseriesWidgetRequest = {
    q: widget.query,
    displayType: widget.displayType,
  };
  if (widget.style) {
    request.style = {
      palette: widget.style.palette,
      lineType: widget.style.lineType,
      lineWidth: widget.style.lineWidth,
    };
  }

  const definition: v1.TimeseriesWidgetDefinition = {
    type: "timeseries",
    title: widget.title,
    requests: [request],
  };
  if (widget.legendSize) definition.legendSize = widget.legendSize;

  return {
    definition,
    layout: {
      x: widget.layout.x,
      y: widget.layout.y,
      width: widget.layout.width,
      height: widget.layout.height,
    },
  };
}

export function toDatadogDashboard(spec: DashboardSpec): v1.Dashboard {
  return {
    title: spec.title,
    description: spec.description,
    layoutType: spec.layoutType,
    widgets: spec.widgets.map(toDatadogWidget),
    templateVariables: spec.templateVariables.map((v) => ({
      name: v.name,
      prefix: v.prefix,
      defaults: [v.default],
    })),
    notifyList: [...spec.notifyList],
  };
}

/** Creates the dashboard and returns its Datadog id. */
export async function createDatadogDashboard(spec: DashboardSpec, api: DashboardsApi): Promise<string> {
  log.info({ title: spec.title, widgets: spec.widgets.length }, "Creating Datadog dashboard");

  let created: { id?: string };
  try {
    created = await api.createDashboard({ body: toDatadogDashboard(spec) });
  } catch (err) {
    const status = getErrorStatus(err);
    log.error({ err, status, title: spec.title }, "Failed to create Datadog dashboard");
    throw new DashboardSubmissionError(`failed to create Datadog dashboard: ${errorMessage(err)}`, status);
  }

  if (!created.id) {
    throw new DashboardSubmissionError("Datadog returned a dashboard without an id");
  }

  log.info({ title: spec.title, dashboardId: created.id }, "Created Datadog dashboard");
  return created.id;
}
