export const TELEMETRY_UNAVAILABLE = "N/A";

export type TelemetryMetric = "stapm" | "ppt_fast" | "ppt_slow" | "cpu_temp" | "power_draw";

// every metric is either the numeric text found in ryzenadj --info or TELEMETRY_UNAVAILABLE
export type TelemetrySnapshot = Record<TelemetryMetric, string>;
