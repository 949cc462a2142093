import { existsSync, readFileSync } from "fs";
import { homedir } from "os";
import { join } from "path";
import { ISettingsFile } from "../interfaces/ISettingsFile";
import { INTEGRATION_BINARY, RYZENADJ_BINARY } from "../libs/command";
import { isRecord } from "./json";

export const APP_NAME = "ryzenadj-control";
export const SETTINGS_FILE_NAME = "settings.json";

export const DEFAULT_SETTINGS: ISettingsFile = {
    usePkexec: true,
    binary: RYZENADJ_BINARY,
    integrationBinary: INTEGRATION_BINARY,
    autoSyncIntegration: true,
    refreshIntervalSeconds: 5
};

export function resolveConfigDir(env: NodeJS.ProcessEnv = process.env): string {
    const override = env.RYZENADJ_CONTROL_CONFIG_DIR?.trim();
    if (override) {
        return override;
    }
    return join(env.HOME || homedir(), ".config", APP_NAME);
}

function pick<T>(raw: Record<string, unknown>, key: keyof ISettingsFile, guard: (value: unknown) => value is T, fallback: T): T {
    const value = raw[key];
    return guard(value) ? value : fallback;
}

const isBoolean = (value: unknown): value is boolean => typeof value === "boolean";
const isNonEmptyString = (value: unknown): value is string => typeof value === "string" && value.trim().length > 0;
const isFiniteNumber = (value: unknown): value is number => typeof value === "number" && Number.isFinite(value);

/**
 * Reads `settings.json` from the config directory, falling back to defaults
 * for a missing file and for every missing or mistyped entry.
 */
export function openSettings(configDir: string = resolveConfigDir()): ISettingsFile {
    const settingsPath = join(configDir, SETTINGS_FILE_NAME);
    if (!existsSync(settingsPath)) {
        return { ...DEFAULT_SETTINGS };
    }
    const raw: unknown = JSON.parse(readFileSync(settingsPath).toString());
    if (!isRecord(raw)) {
        throw new Error(`Invalid settings file ${settingsPath}: expected a JSON object`);
    }
    const refreshIntervalSeconds = pick(raw, "refreshIntervalSeconds", isFiniteNumber, DEFAULT_SETTINGS.refreshIntervalSeconds);
    return {
        usePkexec: pick(raw, "usePkexec", isBoolean, DEFAULT_SETTINGS.usePkexec),
        binary: pick(raw, "binary", isNonEmptyString, DEFAULT_SETTINGS.binary),
        integrationBinary: pick(raw, "integrationBinary", isNonEmptyString, DEFAULT_SETTINGS.integrationBinary),
        autoSyncIntegration: pick(raw, "autoSyncIntegration", isBoolean, DEFAULT_SETTINGS.autoSyncIntegration),
        refreshIntervalSeconds: Math.min(300, Math.max(1, Math.round(refreshIntervalSeconds)))
    };
}
