import { ProfileValues } from '../interfaces/IProfileFile';
import { TELEMETRY_UNAVAILABLE, TelemetryMetric, TelemetrySnapshot } from '../interfaces/ITelemetry';
import { debugLog } from '../utils/log';
import { defaultProfileValues, enabledKey, NUMERIC_OPTIONS } from './options';

const NUMBER = String.raw`(-?\d+(?:\.\d+)?)`;

// tried in order, the first matching pattern wins
const INFO_PATTERNS: Record<TelemetryMetric, RegExp[]> = {
    stapm: [new RegExp(String.raw`stapm[^\n]*?` + NUMBER, "i")],
    ppt_fast: [new RegExp(String.raw`ppt\s*fast[^\n]*?` + NUMBER, "i"), new RegExp(String.raw`fast[^\n]*?` + NUMBER, "i")],
    ppt_slow: [new RegExp(String.raw`ppt\s*slow[^\n]*?` + NUMBER, "i"), new RegExp(String.raw`slow[^\n]*?` + NUMBER, "i")],
    cpu_temp: [new RegExp(String.raw`(?:cpu\s*temp|tctl|temperature)[^\n]*?` + NUMBER, "i")],
    power_draw: [new RegExp(String.raw`(?:current\s*power\s*draw|package\s*power|cpu\s*power)[^\n]*?` + NUMBER, "i")]
};

export const TELEMETRY_METRICS: readonly TelemetryMetric[] = ["stapm", "ppt_fast", "ppt_slow", "cpu_temp", "power_draw"];

/**
 * Extracts the metrics shown by the monitor from `ryzenadj --info` output.
 * The output format is not stable, so each metric falls back to "N/A" on its own.
 */
export function parseInfoOutput(output: string): TelemetrySnapshot {
    const text = output.toLowerCase();
    const parsed: TelemetrySnapshot = {
        stapm: TELEMETRY_UNAVAILABLE,
        ppt_fast: TELEMETRY_UNAVAILABLE,
        ppt_slow: TELEMETRY_UNAVAILABLE,
        cpu_temp: TELEMETRY_UNAVAILABLE,
        power_draw: TELEMETRY_UNAVAILABLE
    };
    for (const metric of TELEMETRY_METRICS) {
        for (const pattern of INFO_PATTERNS[metric]) {
            const match = pattern.exec(text);
            if (match) {
                parsed[metric] = match[1];
                break;
            }
        }
    }
    return parsed;
}

/**
 * Rebuilds a full profile from `ryzenadj --info` text, used for the read-only baseline.
 * Every option found in the text is marked enabled, the others keep their defaults.
 */
export function parseProfileValuesFromInfo(output: string): ProfileValues {
    const values = defaultProfileValues();
    const lines = output.split(/\r?\n/);

    for (const spec of NUMERIC_OPTIONS) {
        const token = spec.cli.replace(/^-+/, "").toLowerCase();
        const tokenAlt = token.replace(/-/g, " ");

        for (const line of lines) {
            const lowered = line.toLowerCase();
            if (!lowered.includes(token) && !lowered.includes(tokenAlt)) {
                continue;
            }
            const match = new RegExp(NUMBER).exec(line);
            if (!match) {
                continue;
            }
            let parsedValue = Math.trunc(parseFloat(match[1]));
            // --info reports watts where the control interface takes milliwatts;
            // only rescale when the unscaled value could not already be a raw one
            if (spec.uiScale > 1 && parsedValue <= Math.floor(spec.maximum / spec.uiScale)) {
                parsedValue *= spec.uiScale;
            }
            values[spec.key] = Math.max(0, parsedValue);
            values[enabledKey(spec.key)] = true;
            debugLog(`[parseProfileValuesFromInfo]: ${spec.key} = ${values[spec.key]} from "${line.trim()}"`);
            break;
        }
    }

    return values;
}
