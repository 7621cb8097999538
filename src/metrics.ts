export const METRIC_NAMES = [
  "scan_success",
  "scan_no_ingredients",
  "scan_decode_failed",
  "scan_detection_failed",
  "recipe_match_success",
  "recipe_match_degraded",
  "session_write_failed",
] as const;

export type MetricName = (typeof METRIC_NAMES)[number];

type MetricsState = Record<MetricName, number>;

const buildEmptyCounts = (): MetricsState =>
  METRIC_NAMES.reduce((acc, name) => {
    acc[name] = 0;
    return acc;
  }, {} as MetricsState);

const totals = buildEmptyCounts();
let windowCounts = buildEmptyCounts();
const startedAt = new Date().toISOString();
let lastFlushAt = startedAt;
let flushTimer: ReturnType<typeof setInterval> | null = null;

export const incrementMetric = (name: MetricName, amount = 1): void => {
  totals[name] += amount;
  windowCounts[name] += amount;
};

const ratio = (part: number, whole: number): number | null =>
  whole > 0 ? Math.round((part / whole) * 1000) / 1000 : null;

export const getMetricsSnapshot = () => {
  const scans =
    totals.scan_success + totals.scan_no_ingredients + totals.scan_decode_failed + totals.scan_detection_failed;
  const matches = totals.recipe_match_success + totals.recipe_match_degraded;

  return {
    startedAt,
    lastFlushAt,
    totals: { ...totals },
    window: { ...windowCounts },
    // null until the first scan / match
    rates: {
      scanSuccess: ratio(totals.scan_success, scans),
      recipeMatchDegraded: ratio(totals.recipe_match_degraded, matches),
    },
  };
};

const formatCounts = (counts: MetricsState): string =>
  METRIC_NAMES.map((name) => `${name}=${counts[name]}`).join(" ");

export const startMetricsFlush = (intervalMs = 60_000): void => {
  if (flushTimer) return;

  flushTimer = setInterval(() => {
    const hasActivity = METRIC_NAMES.some((name) => windowCounts[name] > 0);
    if (hasActivity) {
      console.log(`[Metrics] window ${formatCounts(windowCounts)}`);
    }
    windowCounts = buildEmptyCounts();
    lastFlushAt = new Date().toISOString();
  }, intervalMs);
  flushTimer.unref();
};

export const stopMetricsFlush = (): void => {
  if (!flushTimer) return;
  clearInterval(flushTimer);
  flushTimer = null;
};
