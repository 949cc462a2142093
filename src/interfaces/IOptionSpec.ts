export type OptionCategory = "Power" | "Current" | "Clocks" | "Advanced";

export interface IOptionSpec {
    key: string;
    cli: string; // ryzenadj flag, e.g. "--stapm-limit"
    label: string;
    category: OptionCategory;
    minimum: number; // raw units
    maximum: number;
    default: number;
    tooltip: string;
    uiScale: number; // raw value / uiScale = value shown to the user
    uiSuffix: string;
}

export interface IBooleanOptionSpec {
    key: string;
    cli: string;
    label: string;
    category: OptionCategory;
    tooltip: string;
}
