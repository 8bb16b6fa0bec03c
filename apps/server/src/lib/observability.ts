type Primitive = string | number | boolean;

type LabelValue = Primitive | null | undefined;

type Labels = Record<string, LabelValue>;

type Sample = { name: string; labels: Labels; value: number };

function escapeLabelValue(value: string) {
  return value.replace(/\\/g, "\\\\").replace(/"/g, '\\"').replace(/\n/g, "\\n");
}

function normalizeLabels(labels: Labels = {}) {
  return Object.entries(labels)
    .filter(([, value]) => value !== undefined && value !== null)
    .map(([key, value]) => [key, String(value)] as const)
    .sort(([a], [b]) => a.localeCompare(b));
}

function keyFor(name: string, labels: Labels = {}) {
  const entries = normalizeLabels(labels);
  if (!entries.length) return name;
  return `${name}|${entries.map(([k, v]) => `${k}=${v}`).join(",")}`;
}

function renderLabelSet(labels: Labels = {}) {
  const entries = normalizeLabels(labels);
  if (!entries.length) return "";
  return `{${entries.map(([k, v]) => `${k}="${escapeLabelValue(v)}"`).join(",")}}`;
}

function metricName(raw: string) {
  return raw.replace(/[^a-zA-Z0-9_:]/g, "_");
}

/** Route pattern Express matched, so unknown URLs share one series. */
export function routeLabel(route: unknown) {
  if (route && typeof route === "object" && "path" in route && typeof route.path === "string") {
    return route.path;
  }
  return "unmatched";
}

export function statusClass(statusCode: number) {
  const base = Math.floor(statusCode / 100);
  if (base < 1 || base > 5) return "other";
  return `${base}xx`;
}

export class MetricsRegistry {
  private counters = new Map<string, Sample>();
  private gauges = new Map<string, Sample>();

  incrementCounter(name: string, labels: Labels = {}, value = 1) {
    const normalizedName = metricName(name);
    const key = keyFor(normalizedName, labels);
    const existing = this.counters.get(key);
    if (existing) {
      existing.value += value;
      return;
    }
    this.counters.set(key, { name: normalizedName, labels, value });
  }

  incrementGauge(name: string, delta = 1, labels: Labels = {}) {
    const normalizedName = metricName(name);
    const key = keyFor(normalizedName, labels);
    const existing = this.gauges.get(key);
    if (!existing) {
      this.gauges.set(key, { name: normalizedName, labels, value: delta });
      return;
    }
    existing.value += delta;
  }

  renderPrometheus(extraGauges: Array<{ name: string; value: number; labels?: Labels }> = []) {
    const byName = (a: Sample, b: Sample) => a.name.localeCompare(b.name);
    const samples = [
      ...Array.from(this.counters.values()).sort(byName),
      ...Array.from(this.gauges.values()).sort(byName),
      ...extraGauges.map((gauge) => ({ name: metricName(gauge.name), labels: gauge.labels || {}, value: gauge.value }))
    ];
    const lines = samples.map((sample) => `${sample.name}${renderLabelSet(sample.labels)} ${sample.value}`);
    return `${lines.join("\n")}\n`;
  }
}

export type LogLevel = "info" | "warn" | "error";

type LogPayload = Record<string, unknown>;

export type Logger = Record<LogLevel, (message: string, payload?: LogPayload) => void>;

function normalizeError(error: unknown) {
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack
    };
  }
  return error;
}

function shouldLogLevel(level: LogLevel, minimum: LogLevel) {
  const order: Record<LogLevel, number> = { info: 20, warn: 30, error: 40 };
  return order[level] >= order[minimum];
}

export function createStructuredLogger(
  service = "steptoken-server",
  minimumLevel: LogLevel = "info",
  sink: (line: string) => void = (line) => process.stdout.write(line)
): Logger {
  const write = (level: LogLevel, message: string, payload: LogPayload = {}) => {
    if (!shouldLogLevel(level, minimumLevel)) return;
    const normalizedPayload: LogPayload = { ...payload };
    if ("error" in normalizedPayload) {
      normalizedPayload.error = normalizeError(normalizedPayload.error);
    }
    const line = {
      ts: new Date().toISOString(),
      level,
      service,
      msg: message,
      ...normalizedPayload
    };
    sink(`${JSON.stringify(line)}\n`);
  };
  return {
    info: (message, payload) => write("info", message, payload),
    warn: (message, payload) => write("warn", message, payload),
    error: (message, payload) => write("error", message, payload)
  };
}
