import _ from 'lodash';
import { ICommandResult } from '../interfaces/ICommandResult';
import { IProfileFile, ProfileValues } from '../interfaces/IProfileFile';
import { ISettingsFile } from '../interfaces/ISettingsFile';
import { TelemetrySnapshot } from '../interfaces/ITelemetry';
import { buildRyzenadjCommand, hasActiveSettings, shellJoin } from '../libs/command';
import { defaultProfileValues, enabledKey, findBooleanOption, findNumericOption, toRawValue } from '../libs/options';
import { classifyOutcome } from '../libs/outcome';
import { parseInfoOutput, parseProfileValuesFromInfo } from '../libs/telemetry';
import { appendOutput, updateStatus } from '../utils/log';
import { CommandExecutor } from './executor/CommandExecutor';
import { AutostartManager } from './integration/AutostartManager';
import { SystemdManager } from './integration/SystemdManager';
import { ProfileError } from './profiles/ProfileError';
import { INITIAL_DEFAULT_PROFILE_NAME, isReadOnlyProfile, ProfileManager } from './profiles/ProfileManager';

export interface IActionStatus {
    success: boolean;
    message: string;
}

export type ValueEdit =
    | { kind: "set"; key: string; displayValue: number }
    | { kind: "enable"; key: string }
    | { kind: "disable"; key: string }
    | { kind: "flag"; key: string; on: boolean };

export interface IIntegrationRequest {
    boot: boolean;
    resume: boolean;
    autostart: boolean;
}

export interface IIntegrationState {
    boot: boolean;
    resume: boolean;
    autostart: boolean;
}

// only one of the two ryzenadj modes can be active at a time
const EXCLUSIVE_FLAGS: Record<string, string> = {
    power_saving: "max_performance",
    max_performance: "power_saving"
};

/**
 * Everything the interactive front-end does besides drawing: applying values,
 * profile actions, the baseline capture and the boot/resume/login integrations.
 */
export class RyzenadjController {

    constructor(
        private readonly profiles: ProfileManager,
        private readonly executor: CommandExecutor,
        private readonly systemd: SystemdManager,
        private readonly autostart: AutostartManager,
        private readonly settings: ISettingsFile
    ) { }

    /**
     * Applies edits in order on a copy of `base`. Turning on one of the two
     * mode flags turns the other one off.
     */
    public static collectValues(base: ProfileValues, edits: ValueEdit[]): ProfileValues {
        const values = { ...defaultProfileValues(), ..._.cloneDeep(base) };
        for (const edit of edits) {
            if (edit.kind === "flag") {
                if (!findBooleanOption(edit.key)) {
                    throw new Error(`Unknown flag: ${edit.key}`);
                }
                values[edit.key] = edit.on;
                if (edit.on && EXCLUSIVE_FLAGS[edit.key]) {
                    values[EXCLUSIVE_FLAGS[edit.key]] = false;
                }
                continue;
            }
            const spec = findNumericOption(edit.key);
            if (!spec) {
                throw new Error(`Unknown option: ${edit.key}`);
            }
            switch (edit.kind) {
                case "set":
                    values[spec.key] = toRawValue(spec, edit.displayValue);
                    values[enabledKey(spec.key)] = true;
                    break;
                case "enable":
                    values[enabledKey(spec.key)] = true;
                    break;
                case "disable":
                    values[enabledKey(spec.key)] = false;
                    break;
            }
        }
        return values;
    }

    public loadProfiles(): IProfileFile {
        try {
            return this.profiles.loadAll();
        } catch (err) {
            if (err instanceof ProfileError) {
                this.report(err.message, false);
                return { selected: "", profiles: {} };
            }
            throw err;
        }
    }

    public currentValues(): ProfileValues {
        const data = this.loadProfiles();
        return data.selected ? data.profiles[data.selected] : defaultProfileValues();
    }

    public async integrationState(): Promise<IIntegrationState> {
        return {
            boot: await this.systemd.isBootIntegrationEnabled(),
            resume: this.systemd.isResumeIntegrationEnabled(),
            autostart: this.autostart.isEnabled()
        };
    }

    public saveProfile(name: string, values: ProfileValues): IActionStatus {
        const trimmed = name.trim();
        if (!trimmed) {
            return this.report("Please type a profile name.", false);
        }
        if (isReadOnlyProfile(trimmed)) {
            return this.report(`Reserved name. ${INITIAL_DEFAULT_PROFILE_NAME} is internal and read-only.`, false);
        }
        return this.withProfiles(() => {
            this.profiles.upsertProfile(trimmed, values);
            return this.report(`Profile saved: ${trimmed}`, true);
        });
    }

    public selectProfile(name: string): IActionStatus {
        const trimmed = name.trim();
        if (isReadOnlyProfile(trimmed)) {
            return this.report(`${INITIAL_DEFAULT_PROFILE_NAME} is hidden from selection and only used by Reset to Default`, false);
        }
        return this.withProfiles(() => {
            this.profiles.selectProfile(trimmed);
            return this.report(`Loaded profile: ${trimmed}`, true);
        });
    }

    public async deleteProfile(name: string): Promise<IActionStatus> {
        const trimmed = name.trim();
        if (isReadOnlyProfile(trimmed)) {
            return this.report("This profile is read-only and cannot be deleted.", false);
        }
        const wasSelected = this.loadProfiles().selected === trimmed;
        const status = this.withProfiles(() => {
            this.profiles.deleteProfile(trimmed);
            return this.report(`Deleted profile: ${trimmed}`, true);
        });
        if (!status.success || !wasSelected) {
            return status;
        }
        const state = await this.integrationState();
        if (!state.boot && !state.resume) {
            return status;
        }
        return this.removeProfileBoundIntegrations();
    }

    public importProfiles(source: string): IActionStatus {
        return this.withProfiles(() => {
            this.profiles.importProfiles(source);
            return this.report(`Imported profiles from ${source}`, true);
        });
    }

    public exportProfiles(destination: string): IActionStatus {
        return this.withProfiles(() => {
            this.profiles.exportProfiles(destination);
            return this.report(`Exported profiles to ${destination}`, true);
        });
    }

    public async applyValues(values: ProfileValues): Promise<IActionStatus> {
        const command = buildRyzenadjCommand(values, this.settings.binary);
        if (!hasActiveSettings(command)) {
            appendOutput(shellJoin(command), "", "No active settings selected.");
            return this.report("No active settings selected for Apply", false);
        }

        if (this.settings.autoSyncIntegration) {
            const state = await this.integrationState();
            if (state.boot || state.resume) {
                return this.applyWithIntegrationSync(values, state);
            }
        }

        const result = await this.executor.run(command, this.settings.usePkexec);
        appendOutput(result.command, result.stdout, result.stderr);
        switch (classifyOutcome(result)) {
            case "success":
                return this.report("Profile applied successfully", true);
            case "warning":
                return this.report("Profile applied with warnings", true);
            default: {
                const hint = result.stderr.toLowerCase().includes("permission denied") && !this.settings.usePkexec ? " (enable usePkexec in settings.json)" : "";
                return this.report(`Apply failed${hint}`, false);
            }
        }
    }

    public async captureInitialDefault(): Promise<IActionStatus> {
        const result = await this.readInfo();
        if (!result.success) {
            return this.report("Failed to capture initial defaults", false);
        }
        const values = parseProfileValuesFromInfo(result.stdout);
        return this.withProfiles(() => {
            this.profiles.storeBaseline(values);
            return this.report("Initial default profile captured", true);
        });
    }

    /**
     * Returns the baseline values and clears the selection; nothing is applied.
     */
    public resetToDefaults(): IActionStatus & { values?: ProfileValues } {
        const data = this.loadProfiles();
        const values = data.profiles[INITIAL_DEFAULT_PROFILE_NAME];
        if (!values) {
            return this.report(`${INITIAL_DEFAULT_PROFILE_NAME} profile not set yet`, false);
        }
        const status = this.withProfiles(() => {
            this.profiles.selectProfile("");
            return this.report("Initial defaults loaded. Apply them to activate these values.", true);
        });
        return status.success ? { ...status, values } : status;
    }

    public async refreshMonitor(): Promise<IActionStatus & { snapshot?: TelemetrySnapshot; raw?: string }> {
        const result = await this.readInfo();
        if (!result.success) {
            return this.report("Monitoring refresh failed", false);
        }
        return { ...this.report("Monitoring data refreshed", true), snapshot: parseInfoOutput(result.stdout), raw: result.stdout };
    }

    public async applySystemIntegration(request: IIntegrationRequest, values: ProfileValues): Promise<IActionStatus> {
        let command = buildRyzenadjCommand(values, this.settings.integrationBinary);
        if ((request.boot || request.resume) && !hasActiveSettings(command)) {
            return this.report("Enable at least one setting before applying boot/resume integration.", false);
        }
        if (!hasActiveSettings(command)) {
            command = [this.settings.integrationBinary];
        }

        const script = this.systemd.buildSyncScript(command, request.boot, request.resume);
        const result = await this.executor.runShell(script, this.settings.usePkexec);
        appendOutput(result.command, result.stdout, result.stderr);

        const autostart = this.autostart.setEnabled(request.autostart);
        const outcome = classifyOutcome(result);
        if (outcome === "success" && autostart.ok) {
            return this.report("Integration settings updated", true);
        }
        if (outcome === "warning" && autostart.ok) {
            return this.report("Integration updated with warnings", true);
        }
        const issues: string[] = [];
        if (!result.success) {
            issues.push("system integration update failed");
        }
        if (!autostart.ok) {
            issues.push(autostart.message);
        }
        return this.report(issues.join("; "), false);
    }

    private async applyWithIntegrationSync(values: ProfileValues, state: IIntegrationState): Promise<IActionStatus> {
        const command = buildRyzenadjCommand(values, this.settings.integrationBinary);
        if (!hasActiveSettings(command)) {
            appendOutput(this.settings.integrationBinary, "", "No active settings selected.");
            return this.report("No active settings selected for Apply", false);
        }
        const script = this.systemd.buildApplyAndSyncScript(command, state.boot, state.resume);
        const result = await this.executor.runShell(script, this.settings.usePkexec);
        appendOutput(result.command, result.stdout, result.stderr);
        switch (classifyOutcome(result)) {
            case "success":
                return this.report("Profile applied and active integration updated", true);
            case "warning":
                return this.report("Profile applied and integration updated with warnings", true);
            default:
                return this.report("Apply or integration sync failed", false);
        }
    }

    private async removeProfileBoundIntegrations(): Promise<IActionStatus> {
        const script = this.systemd.buildSyncScript([this.settings.integrationBinary], false, false);
        const result = await this.executor.runShell(script, this.settings.usePkexec);
        appendOutput(result.command, result.stdout, result.stderr);
        if (result.success) {
            return this.report("Deleted active profile and removed boot/resume integration", true);
        }
        return this.report("Profile deleted, but removing boot/resume integration failed", false);
    }

    private readInfo(): Promise<ICommandResult> {
        return this.executor.run([this.settings.binary, "--info"], this.settings.usePkexec).then(result => {
            appendOutput(result.command, result.stdout, result.stderr);
            return result;
        });
    }

    private withProfiles(action: () => IActionStatus): IActionStatus {
        try {
            return action();
        } catch (err) {
            if (err instanceof ProfileError) {
                return this.report(err.message, false);
            }
            throw err;
        }
    }

    private report(message: string, success: boolean): IActionStatus {
        updateStatus(message, success);
        return { success, message };
    }
}
