import { OPTION_CATEGORIES, RYZENADJ_BOOLEAN_OPTIONS, RYZENADJ_NUMERIC_OPTIONS } from '../headers/ryzenadjOptions';
import { IBooleanOptionSpec, IOptionSpec, OptionCategory } from '../interfaces/IOptionSpec';
import { ProfileValues } from '../interfaces/IProfileFile';

export const NUMERIC_OPTIONS = RYZENADJ_NUMERIC_OPTIONS;
export const BOOLEAN_OPTIONS = RYZENADJ_BOOLEAN_OPTIONS;

export function enabledKey(key: string): string {
    return `${key}_enabled`;
}

/**
 * Every numeric option at its default and disabled, every boolean option off.
 */
export function defaultProfileValues(): ProfileValues {
    const values: ProfileValues = {};
    for (const spec of NUMERIC_OPTIONS) {
        values[spec.key] = spec.default;
    }
    for (const spec of NUMERIC_OPTIONS) {
        values[enabledKey(spec.key)] = false;
    }
    for (const spec of BOOLEAN_OPTIONS) {
        values[spec.key] = false;
    }
    return values;
}

export function optionsByCategory(): Record<OptionCategory, IOptionSpec[]> {
    const categories: Record<OptionCategory, IOptionSpec[]> = { Power: [], Current: [], Clocks: [], Advanced: [] };
    for (const category of OPTION_CATEGORIES) {
        categories[category] = NUMERIC_OPTIONS.filter(spec => spec.category === category);
    }
    return categories;
}

export function findNumericOption(key: string): IOptionSpec | undefined {
    return NUMERIC_OPTIONS.find(spec => spec.key === key);
}

export function findBooleanOption(key: string): IBooleanOptionSpec | undefined {
    return BOOLEAN_OPTIONS.find(spec => spec.key === key);
}

export function toDisplayValue(spec: IOptionSpec, rawValue: number): number {
    return Math.floor(rawValue / Math.max(1, spec.uiScale));
}

// display units come from the user, so they are held to the option range like the spin boxes were
export function toRawValue(spec: IOptionSpec, displayValue: number): number {
    const raw = Math.trunc(displayValue) * Math.max(1, spec.uiScale);
    return Math.min(spec.maximum, Math.max(spec.minimum, raw));
}

export function formatDisplayValue(spec: IOptionSpec, rawValue: number): string {
    return `${toDisplayValue(spec, rawValue)}${spec.uiSuffix}`;
}
