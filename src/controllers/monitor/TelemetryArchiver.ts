import { TELEMETRY_UNAVAILABLE, TelemetryMetric, TelemetrySnapshot } from "../../interfaces/ITelemetry";
import { TELEMETRY_METRICS } from "../../libs/telemetry";

export type RowColor = "white" | "red" | "green" | "yellow";

// changes above these are flagged with " !" and color the row
export const RELEVANT_CHANGE: Record<TelemetryMetric, number> = {
    stapm: 5,
    ppt_fast: 5,
    ppt_slow: 5,
    cpu_temp: 5,
    power_draw: 5
};

export interface ITelemetryRow {
    values: Record<TelemetryMetric, string>;
    color: RowColor;
}

function toNumber(value: string | undefined): number | undefined {
    if (value === undefined || value === TELEMETRY_UNAVAILABLE) {
        return undefined;
    }
    const parsed = parseFloat(value);
    return Number.isFinite(parsed) ? parsed : undefined;
}

/**
 * Keeps the last two snapshots of ryzenadj --info to show what changed between refreshes.
 */
export class TelemetryArchiver {

    private previousRecord: TelemetrySnapshot | undefined;
    private currentRecord: TelemetrySnapshot | undefined;

    setCurrentRecord(record: TelemetrySnapshot) {
        this.previousRecord = this.currentRecord;
        this.currentRecord = record;
    }

    getCurrentRecord() {
        return this.currentRecord;
    }

    getPreviousRecord() {
        return this.previousRecord;
    }

    // metrics missing from either snapshot have no difference
    getDifferences(): Partial<Record<TelemetryMetric, number>> {
        const differences: Partial<Record<TelemetryMetric, number>> = {};
        for (const metric of TELEMETRY_METRICS) {
            const current = toNumber(this.currentRecord?.[metric]);
            const previous = toNumber(this.previousRecord?.[metric]);
            if (current !== undefined && previous !== undefined) {
                differences[metric] = current - previous;
            }
        }
        return differences;
    }

    checkTemperatureTooHigh(limitCelsius: number): boolean {
        const temperature = toNumber(this.currentRecord?.cpu_temp);
        return temperature !== undefined && temperature >= limitCelsius;
    }

    buildRow(temperatureLimit: number): ITelemetryRow {
        const values: Record<TelemetryMetric, string> = {
            stapm: TELEMETRY_UNAVAILABLE,
            ppt_fast: TELEMETRY_UNAVAILABLE,
            ppt_slow: TELEMETRY_UNAVAILABLE,
            cpu_temp: TELEMETRY_UNAVAILABLE,
            power_draw: TELEMETRY_UNAVAILABLE,
            ...this.currentRecord
        };
        if (this.checkTemperatureTooHigh(temperatureLimit)) {
            return { values, color: "red" };
        }
        let color: RowColor = "white";
        let emergency = false;
        const differences = this.getDifferences();
        for (const metric of TELEMETRY_METRICS) {
            const difference = differences[metric];
            if (difference === undefined || Math.round(difference) === 0) {
                continue;
            }
            values[metric] += `${Math.abs(difference) > RELEVANT_CHANGE[metric] ? " !" : " "}(${difference > 0 ? "+" : ""}${Math.trunc(difference)})`;
            if (emergency === false) {
                if (difference > RELEVANT_CHANGE[metric]) {
                    color = "red";
                    emergency = true;
                } else if (color !== "yellow" && difference < -RELEVANT_CHANGE[metric]) {
                    color = "green";
                } else if (color === "green" && difference > 0) {
                    color = "yellow";
                }
            }
        }
        return { values, color };
    }
}
