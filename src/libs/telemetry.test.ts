import { describe, expect, it } from "vitest";
import { parseInfoOutput, parseProfileValuesFromInfo } from "./telemetry";

const INFO_TABLE = [
    "|        Name         |   Value   |     Parameter      |",
    "|---------------------|-----------|--------------------|",
    "| STAPM LIMIT         |    25.000 | stapm-limit        |",
    "| STAPM VALUE         |     6.142 |                    |",
    "| PPT LIMIT FAST      |    35.000 | fast-limit         |",
    "| PPT LIMIT SLOW      |    30.000 | slow-limit         |",
    "| StapmTimeConst      |   200.000 | stapm-time         |",
    "| THM LIMIT CORE      |    90.000 | tctl-temp          |"
].join("\n");

describe("parseInfoOutput", () => {
    it("reports every metric as unavailable for unrelated text", () => {
        const expected = { stapm: "N/A", ppt_fast: "N/A", ppt_slow: "N/A", cpu_temp: "N/A", power_draw: "N/A" };
        expect(parseInfoOutput("")).toEqual(expected);
        expect(parseInfoOutput("ryzenadj: unable to init\n")).toEqual(expected);
    });

    it("extracts the first number after each label", () => {
        const output = [
            "STAPM LIMIT: 25.000",
            "PPT FAST: 35.5",
            "PPT SLOW: 30",
            "CPU Temperature: 61.25",
            "Package Power: 12.4"
        ].join("\n");
        expect(parseInfoOutput(output)).toEqual({
            stapm: "25.000",
            ppt_fast: "35.5",
            ppt_slow: "30",
            cpu_temp: "61.25",
            power_draw: "12.4"
        });
    });

    it("prefers the specific pattern over the generic fallback", () => {
        const output = "fast charging 5\nppt fast 35";
        expect(parseInfoOutput(output).ppt_fast).toBe("35");
        expect(parseInfoOutput("Fast boost limit 40").ppt_fast).toBe("40");
    });

    it("keeps signs and never matches across lines", () => {
        expect(parseInfoOutput("cpu temp: -3.5").cpu_temp).toBe("-3.5");
        expect(parseInfoOutput("stapm\n42").stapm).toBe("N/A");
    });

    it("reads the ryzenadj info table", () => {
        const parsed = parseInfoOutput(INFO_TABLE);
        expect(parsed.stapm).toBe("25.000");
        expect(parsed.ppt_fast).toBe("35.000");
        expect(parsed.ppt_slow).toBe("30.000");
        expect(parsed.cpu_temp).toBe("N/A");
    });
});

describe("parseProfileValuesFromInfo", () => {
    it("scales watt readings up to milliwatts", () => {
        const values = parseProfileValuesFromInfo("STAPM LIMIT | 25 | stapm-limit");
        expect(values.stapm_limit).toBe(25000);
        expect(values.stapm_limit_enabled).toBe(true);
    });

    it("does not rescale values already in raw units", () => {
        const values = parseProfileValuesFromInfo("stapm-limit 25000");
        expect(values.stapm_limit).toBe(25000);
        expect(values.stapm_limit_enabled).toBe(true);
    });

    it("scales only up to the maximum divided by the scale", () => {
        expect(parseProfileValuesFromInfo("fast-limit 200").fast_limit).toBe(200000);
        expect(parseProfileValuesFromInfo("fast-limit 201").fast_limit).toBe(201);
    });

    it("matches the spaced form of the flag and truncates decimals", () => {
        const values = parseProfileValuesFromInfo("Tctl Temp 85.7 C");
        expect(values.tctl_temp).toBe(85);
        expect(values.tctl_temp_enabled).toBe(true);
    });

    it("clamps negative readings to zero", () => {
        const values = parseProfileValuesFromInfo("slow-time -5");
        expect(values.slow_time).toBe(0);
        expect(values.slow_time_enabled).toBe(true);
    });

    it("skips matching lines without a number", () => {
        const values = parseProfileValuesFromInfo("stapm-limit: n/a\nstapm limit 30");
        expect(values.stapm_limit).toBe(30000);
    });

    it("rebuilds a baseline from the info table", () => {
        const values = parseProfileValuesFromInfo(INFO_TABLE);
        expect(values.stapm_limit).toBe(25000);
        expect(values.fast_limit).toBe(35000);
        expect(values.slow_limit).toBe(30000);
        expect(values.stapm_time).toBe(200);
        expect(values.tctl_temp).toBe(90);
        expect(values.tctl_temp_enabled).toBe(true);
        expect(values.apu_slow_limit).toBe(30000);
        expect(values.apu_slow_limit_enabled).toBe(false);
        expect(values.vrm_current).toBe(100);
        expect(values.vrm_current_enabled).toBe(false);
        expect(values.power_saving).toBe(false);
    });
});
