export type MetricLabels = Record<string, string | number | boolean>;

type MetricType = "counter" | "gauge";

type MetricEntry = {
  name: string;
  labels: MetricLabels;
  value: number;
  type: MetricType;
};

const normalizeLabels = (labels: MetricLabels) =>
  Object.entries(labels)
    .map(([key, value]) => [key, String(value)] as const)
    .sort((a, b) => a[0].localeCompare(b[0]));

const entryKey = (name: string, labels: MetricLabels) =>
  `${name}:${JSON.stringify(normalizeLabels(labels))}`;

const formatLabels = (labels: MetricLabels) => {
  const entries = normalizeLabels(labels);
  if (!entries.length) return "";
  const formatted = entries.map(([key, value]) => `${key}="${value.replace(/"/g, '\\"')}"`);
  return `{${formatted.join(",")}}`;
};

export type MetricsRegistry = ReturnType<typeof createMetricsRegistry>;

export const createMetricsRegistry = (baseLabels: MetricLabels = {}) => {
  const entries = new Map<string, MetricEntry>();

  const upsert = (name: string, labels: MetricLabels, type: MetricType) => {
    const merged = { ...baseLabels, ...labels };
    const key = entryKey(name, merged);
    const existing = entries.get(key);
    if (existing) return existing;
    const created: MetricEntry = { name, labels: merged, value: 0, type };
    entries.set(key, created);
    return created;
  };

  const incCounter = (name: string, labels: MetricLabels = {}, delta = 1) => {
    upsert(name, labels, "counter").value += delta;
  };

  const setGauge = (name: string, labels: MetricLabels = {}, value: number) => {
    upsert(name, labels, "gauge").value = value;
  };

  const render = () => {
    const lines: string[] = [];
    const typed = new Set<string>();
    for (const entry of entries.values()) {
      if (!typed.has(entry.name)) {
        lines.push(`# TYPE ${entry.name} ${entry.type}`);
        typed.add(entry.name);
      }
      lines.push(`${entry.name}${formatLabels(entry.labels)} ${entry.value}`);
    }
    return lines.join("\n") + "\n";
  };

  return { incCounter, setGauge, render };
};
