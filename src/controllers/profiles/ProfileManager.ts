import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs';
import { join } from 'path';
import { IProfileFile, ProfileValues } from '../../interfaces/IProfileFile';
import { defaultProfileValues } from '../../libs/options';
import { isRecord, stringifySorted } from '../../utils/json';
import { debugLog } from '../../utils/log';
import { resolveConfigDir } from '../../utils/settings';
import { describeError, ProfileError } from './ProfileError';

export const PROFILES_FILE_NAME = "profiles.json";
// machine baseline captured from ryzenadj --info, only used by "reset to defaults"
export const INITIAL_DEFAULT_PROFILE_NAME = "Initial Default";

function emptyDocument(): IProfileFile {
    return {
        selected: "",
        profiles: {}
    };
}

function toNonNegativeInteger(value: unknown): number | undefined {
    if (typeof value === "boolean") {
        return value ? 1 : 0;
    }
    if (typeof value === "number" && Number.isFinite(value)) {
        return Math.max(0, Math.trunc(value));
    }
    if (typeof value === "string" && /^\s*[+-]?\d+\s*$/.test(value)) {
        return Math.max(0, parseInt(value, 10));
    }
    return undefined;
}

/**
 * Fills every catalog key, drops unknown ones, coerces flags and clamps numbers to >= 0.
 * Numbers that cannot be read keep their default. normalizeProfile(normalizeProfile(v)) equals normalizeProfile(v).
 */
export function normalizeProfile(rawProfile: Record<string, unknown>): ProfileValues {
    const normalized = defaultProfileValues();
    for (const [key, value] of Object.entries(rawProfile)) {
        if (!Object.hasOwn(normalized, key)) {
            continue;
        }
        if (typeof normalized[key] === "boolean") {
            normalized[key] = Boolean(value);
        } else {
            const parsed = toNonNegativeInteger(value);
            if (parsed !== undefined) {
                normalized[key] = parsed;
            }
        }
    }
    return normalized;
}

function normalizeProfiles(rawProfiles: unknown): IProfileFile["profiles"] {
    const cleaned: Array<[string, ProfileValues]> = [];
    if (!isRecord(rawProfiles)) {
        return {};
    }
    for (const [name, profile] of Object.entries(rawProfiles)) {
        if (isRecord(profile)) {
            cleaned.push([name, normalizeProfile(profile)]);
        } else {
            debugLog(`[ProfileManager]: dropping profile "${name}", not an object`);
        }
    }
    // fromEntries defines own properties, so a profile named "__proto__" stays a profile
    return Object.fromEntries(cleaned);
}

function setProfile(profiles: IProfileFile["profiles"], name: string, values: ProfileValues): void {
    Object.defineProperty(profiles, name, { value: values, enumerable: true, writable: true, configurable: true });
}

export function isReadOnlyProfile(name: string): boolean {
    return name.trim() === INITIAL_DEFAULT_PROFILE_NAME;
}

export function visibleProfileNames(data: IProfileFile): string[] {
    return Object.keys(data.profiles).filter(name => name !== INITIAL_DEFAULT_PROFILE_NAME);
}

/**
 * Profiles live in a single JSON document; every mutating call reads it,
 * changes it and writes it back whole.
 */
export class ProfileManager {

    public readonly path: string;

    constructor(public readonly configDir: string = resolveConfigDir()) {
        this.path = join(configDir, PROFILES_FILE_NAME);
        mkdirSync(configDir, { recursive: true });
    }

    public loadAll(): IProfileFile {
        if (!existsSync(this.path)) {
            const data = emptyDocument();
            this.saveAll(data);
            return data;
        }
        const data = this.readAll();
        this.saveAll(data);
        return data;
    }

    /**
     * Normalized view of the file without writing it back, for watchers of the file.
     */
    public readAll(): IProfileFile {
        if (!existsSync(this.path)) {
            return emptyDocument();
        }

        let raw: unknown;
        try {
            raw = JSON.parse(readFileSync(this.path, "utf-8"));
        } catch (err) {
            throw new ProfileError(`Failed to read ${this.path}: ${describeError(err)}`);
        }

        const profiles = normalizeProfiles(isRecord(raw) ? raw.profiles : undefined);
        let selected = isRecord(raw) && typeof raw.selected === "string" ? raw.selected : "";
        if (!Object.hasOwn(profiles, selected)) {
            selected = "";
        }

        return { selected, profiles };
    }

    public saveAll(data: IProfileFile): void {
        try {
            writeFileSync(this.path, stringifySorted(data), "utf-8");
        } catch (err) {
            throw new ProfileError(`Failed to write ${this.path}: ${describeError(err)}`);
        }
    }

    public upsertProfile(name: string, profileValues: Record<string, unknown>): IProfileFile {
        if (isReadOnlyProfile(name)) {
            throw new ProfileError(`Reserved name. ${INITIAL_DEFAULT_PROFILE_NAME} is internal and read-only.`);
        }
        return this.writeProfile(name, profileValues);
    }

    /**
     * Stores the baseline captured from ryzenadj --info without touching the user's selection.
     */
    public storeBaseline(profileValues: Record<string, unknown>): IProfileFile {
        const previous = this.loadAll().selected;
        const data = this.writeProfile(INITIAL_DEFAULT_PROFILE_NAME, profileValues);
        data.selected = visibleProfileNames(data).includes(previous) ? previous : "";
        this.saveAll(data);
        return data;
    }

    public deleteProfile(name: string): IProfileFile {
        const data = this.loadAll();
        if (!Object.hasOwn(data.profiles, name)) {
            throw new ProfileError(`Profile '${name}' does not exist.`);
        }
        if (isReadOnlyProfile(name)) {
            throw new ProfileError("This profile is read-only and cannot be deleted.");
        }
        delete data.profiles[name];
        // never falls back to the baseline
        if (data.selected === name || visibleProfileNames(data).length === 0) {
            data.selected = visibleProfileNames(data)[0] ?? "";
        }
        this.saveAll(data);
        return data;
    }

    public selectProfile(name: string): IProfileFile {
        const data = this.loadAll();
        if (name !== "" && (!Object.hasOwn(data.profiles, name) || isReadOnlyProfile(name))) {
            throw new ProfileError(`Profile '${name}' does not exist.`);
        }
        data.selected = name;
        this.saveAll(data);
        return data;
    }

    public exportProfiles(destination: string): void {
        const data = this.loadAll();
        try {
            writeFileSync(destination, stringifySorted(data), "utf-8");
        } catch (err) {
            throw new ProfileError(`Failed to export profiles: ${describeError(err)}`);
        }
    }

    /**
     * Replaces the whole store with the profiles found in `source`.
     */
    public importProfiles(source: string): IProfileFile {
        let imported: unknown;
        try {
            imported = JSON.parse(readFileSync(source, "utf-8"));
        } catch (err) {
            throw new ProfileError(`Failed to import profiles: ${describeError(err)}`);
        }

        if (!isRecord(imported)) {
            throw new ProfileError("Invalid profile file format.");
        }
        if (!isRecord(imported.profiles)) {
            throw new ProfileError("Imported file is missing 'profiles'.");
        }

        const cleaned = normalizeProfiles(imported.profiles);
        const names = Object.keys(cleaned);
        if (names.length === 0) {
            throw new ProfileError("No valid profiles were found in imported file.");
        }

        const selected = typeof imported.selected === "string" && Object.hasOwn(cleaned, imported.selected) ? imported.selected : names[0];
        const data: IProfileFile = { selected, profiles: cleaned };
        this.saveAll(data);
        return data;
    }

    private writeProfile(name: string, profileValues: Record<string, unknown>): IProfileFile {
        if (!name.trim()) {
            throw new ProfileError("Profile name must not be empty.");
        }
        const data = this.loadAll();
        setProfile(data.profiles, name, normalizeProfile(profileValues));
        data.selected = name;
        this.saveAll(data);
        return data;
    }
}
