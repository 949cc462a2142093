import { ValueEdit } from "../controllers/RyzenadjController";

export function stringList(value: unknown): string[] {
    if (Array.isArray(value)) {
        return value.filter((item): item is string => typeof item === "string");
    }
    return typeof value === "string" ? [value] : [];
}

export function optionalString(value: unknown): string | undefined {
    return typeof value === "string" && value.trim() ? value : undefined;
}

// "stapm_limit=15" -> 15 W expressed in display units
export function parseAssignment(assignment: string): ValueEdit {
    const separator = assignment.indexOf("=");
    if (separator <= 0) {
        throw new Error(`Expected key=value, got "${assignment}"`);
    }
    const key = assignment.slice(0, separator).trim();
    const rawValue = assignment.slice(separator + 1).trim();
    const displayValue = Number(rawValue);
    if (!rawValue || !Number.isFinite(displayValue)) {
        throw new Error(`Value for ${key} is not a number: "${rawValue}"`);
    }
    return { kind: "set", key, displayValue };
}

/**
 * Turns the parsed command line into value edits: --set, then --enable, --disable, --flag and --unflag.
 */
export function parseEdits(options: Record<string, unknown>): ValueEdit[] {
    return [
        ...stringList(options.set).map(parseAssignment),
        ...stringList(options.enable).map((key): ValueEdit => ({ kind: "enable", key })),
        ...stringList(options.disable).map((key): ValueEdit => ({ kind: "disable", key })),
        ...stringList(options.flag).map((key): ValueEdit => ({ kind: "flag", key, on: true })),
        ...stringList(options.unflag).map((key): ValueEdit => ({ kind: "flag", key, on: false }))
    ];
}
