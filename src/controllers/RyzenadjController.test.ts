import { EventEmitter } from "events";
import { existsSync, mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { PassThrough } from "stream";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { ISettingsFile } from "../interfaces/ISettingsFile";
import { defaultProfileValues } from "../libs/options";
import { CommandExecutor } from "./executor/CommandExecutor";
import { AutostartManager } from "./integration/AutostartManager";
import { SystemdManager } from "./integration/SystemdManager";
import { INITIAL_DEFAULT_PROFILE_NAME, ProfileManager } from "./profiles/ProfileManager";
import { RyzenadjController } from "./RyzenadjController";

interface IScriptedRun {
    code: number;
    stdout?: string;
    stderr?: string;
}

class FakeProcess extends EventEmitter {
    public readonly stdout = new PassThrough();
    public readonly stderr = new PassThrough();
}

const SETTINGS: ISettingsFile = {
    usePkexec: false,
    binary: "ryzenadj",
    integrationBinary: "/usr/bin/ryzenadj",
    autoSyncIntegration: true,
    refreshIntervalSeconds: 5
};

const enabledStapm = { ...defaultProfileValues(), stapm_limit: 15000, stapm_limit_enabled: true };

describe("RyzenadjController.collectValues", () => {
    it("sets display values and enables them", () => {
        const values = RyzenadjController.collectValues({}, [{ kind: "set", key: "stapm_limit", displayValue: 15 }]);
        expect(values.stapm_limit).toBe(15000);
        expect(values.stapm_limit_enabled).toBe(true);
        expect(values.fast_limit_enabled).toBe(false);
    });

    it("toggles enabled flags without touching values", () => {
        const values = RyzenadjController.collectValues(enabledStapm, [
            { kind: "disable", key: "stapm_limit" },
            { kind: "enable", key: "tctl_temp" }
        ]);
        expect(values.stapm_limit).toBe(15000);
        expect(values.stapm_limit_enabled).toBe(false);
        expect(values.tctl_temp).toBe(90);
        expect(values.tctl_temp_enabled).toBe(true);
    });

    it("keeps the two modes exclusive, last one wins", () => {
        const values = RyzenadjController.collectValues({}, [
            { kind: "flag", key: "power_saving", on: true },
            { kind: "flag", key: "max_performance", on: true }
        ]);
        expect(values.power_saving).toBe(false);
        expect(values.max_performance).toBe(true);

        const cleared = RyzenadjController.collectValues(values, [{ kind: "flag", key: "max_performance", on: false }]);
        expect(cleared.power_saving).toBe(false);
        expect(cleared.max_performance).toBe(false);
    });

    it("does not modify its input", () => {
        const base = { ...enabledStapm };
        RyzenadjController.collectValues(base, [{ kind: "set", key: "stapm_limit", displayValue: 20 }]);
        expect(base.stapm_limit).toBe(15000);
    });

    it("rejects unknown keys", () => {
        expect(() => RyzenadjController.collectValues({}, [{ kind: "set", key: "nope", displayValue: 1 }])).toThrow("Unknown option: nope");
        expect(() => RyzenadjController.collectValues({}, [{ kind: "flag", key: "turbo", on: true }])).toThrow("Unknown flag: turbo");
    });
});

describe("RyzenadjController", () => {
    let dir: string;
    let runs: IScriptedRun[];
    let calls: Array<[string, string[]]>;
    let profiles: ProfileManager;
    let systemd: SystemdManager;
    let autostart: AutostartManager;
    let hookPath: string;

    const createController = (settings: Partial<ISettingsFile> = {}) => {
        const executor = new CommandExecutor({
            spawnFn: (command, args) => {
                calls.push([command, args]);
                const child = new FakeProcess();
                const run = runs.shift() ?? { code: 0 };
                setImmediate(() => {
                    if (run.stdout) {
                        child.stdout.emit("data", Buffer.from(run.stdout));
                    }
                    if (run.stderr) {
                        child.stderr.emit("data", Buffer.from(run.stderr));
                    }
                    child.emit("close", run.code);
                });
                return child;
            },
            isPrivileged: () => true
        });
        return new RyzenadjController(profiles, executor, systemd, autostart, { ...SETTINGS, ...settings });
    };

    beforeEach(() => {
        dir = mkdtempSync(join(tmpdir(), "ryzenadj-controller-"));
        runs = [];
        calls = [];
        hookPath = join(dir, "ryzenadj-control-resume");
        profiles = new ProfileManager(join(dir, "config"));
        systemd = new SystemdManager(join(dir, "units", "ryzenadj-control.service"), hookPath);
        autostart = new AutostartManager(join(dir, "autostart", "ryzenadj-control.desktop"), join(dir, "missing"), "/opt/monitor.js");
        vi.spyOn(systemd, "isBootIntegrationEnabled").mockResolvedValue(false);
        vi.spyOn(console, "log").mockImplementation(() => undefined);
        vi.spyOn(console, "error").mockImplementation(() => undefined);
    });

    afterEach(() => {
        vi.restoreAllMocks();
        rmSync(dir, { recursive: true, force: true });
    });

    it("refuses to apply without active settings", async () => {
        const status = await createController().applyValues(defaultProfileValues());
        expect(status).toEqual({ success: false, message: "No active settings selected for Apply" });
        expect(calls).toEqual([]);
    });

    it("applies the built command", async () => {
        const status = await createController().applyValues(enabledStapm);
        expect(calls).toEqual([["ryzenadj", ["--stapm-limit", "15000"]]]);
        expect(status).toEqual({ success: true, message: "Profile applied successfully" });
        expect(console.log).toHaveBeenCalledWith("SUCCESS: Profile applied successfully");
    });

    it("treats unsupported options as warnings", async () => {
        runs.push({ code: 1, stderr: "Set stapm_limit is not supported on this family" });
        const status = await createController().applyValues(enabledStapm);
        expect(status).toEqual({ success: true, message: "Profile applied with warnings" });
    });

    it("hints at pkexec when permission is denied", async () => {
        runs.push({ code: 1, stderr: "Permission denied" }, { code: 1, stderr: "Permission denied" });
        expect((await createController().applyValues(enabledStapm)).message).toBe("Apply failed (enable usePkexec in settings.json)");
        expect((await createController({ usePkexec: true }).applyValues(enabledStapm)).message).toBe("Apply failed");
        expect(console.error).toHaveBeenCalledWith("ERROR: Apply failed");
    });

    it("rewrites the active hooks on apply", async () => {
        writeFileSync(hookPath, "");
        const controller = createController();

        const status = await controller.applyValues(enabledStapm);

        expect(calls).toEqual([["/usr/bin/bash", ["-lc", systemd.buildApplyAndSyncScript(["/usr/bin/ryzenadj", "--stapm-limit", "15000"], false, true)]]]);
        expect(status).toEqual({ success: true, message: "Profile applied and active integration updated" });
    });

    it("skips the hook rewrite when auto sync is off", async () => {
        writeFileSync(hookPath, "");

        await createController({ autoSyncIntegration: false }).applyValues(enabledStapm);

        expect(calls).toEqual([["ryzenadj", ["--stapm-limit", "15000"]]]);
    });

    it("captures the baseline and resets to it", async () => {
        runs.push({ code: 0, stdout: "| STAPM LIMIT | 25.000 | stapm-limit |\n| THM LIMIT CORE | 95.000 | tctl-temp |" });
        const controller = createController();
        controller.saveProfile("Quiet", enabledStapm);

        expect(await controller.captureInitialDefault()).toEqual({ success: true, message: "Initial default profile captured" });
        expect(calls).toEqual([["ryzenadj", ["--info"]]]);
        expect(profiles.loadAll().selected).toBe("Quiet");

        const reset = controller.resetToDefaults();
        expect(reset.message).toBe("Initial defaults loaded. Apply them to activate these values.");
        expect(reset.values?.stapm_limit).toBe(25000);
        expect(reset.values?.tctl_temp).toBe(95);
        expect(reset.values?.fast_limit_enabled).toBe(false);
        expect(profiles.loadAll().selected).toBe("");
        expect(calls).toHaveLength(1);
    });

    it("reports a failed capture", async () => {
        runs.push({ code: 1, stderr: "Unable to init ryzenadj" });
        const controller = createController();
        expect(await controller.captureInitialDefault()).toEqual({ success: false, message: "Failed to capture initial defaults" });
        expect(controller.resetToDefaults()).toEqual({ success: false, message: "Initial Default profile not set yet" });
    });

    it("saves, selects and deletes profiles", async () => {
        const controller = createController();
        expect(controller.saveProfile("  ", enabledStapm)).toEqual({ success: false, message: "Please type a profile name." });
        expect(controller.saveProfile(INITIAL_DEFAULT_PROFILE_NAME, enabledStapm).message).toBe("Reserved name. Initial Default is internal and read-only.");
        expect(controller.saveProfile(" Quiet ", enabledStapm)).toEqual({ success: true, message: "Profile saved: Quiet" });
        expect(controller.saveProfile("Loud", {})).toEqual({ success: true, message: "Profile saved: Loud" });

        expect(controller.selectProfile("Quiet")).toEqual({ success: true, message: "Loaded profile: Quiet" });
        expect(controller.currentValues().stapm_limit).toBe(15000);
        expect(controller.selectProfile("Missing")).toEqual({ success: false, message: "Profile 'Missing' does not exist." });

        expect(await controller.deleteProfile("Loud")).toEqual({ success: true, message: "Deleted profile: Loud" });
        expect(await controller.deleteProfile("Loud")).toEqual({ success: false, message: "Profile 'Loud' does not exist." });
        expect(await controller.deleteProfile(INITIAL_DEFAULT_PROFILE_NAME)).toEqual({ success: false, message: "This profile is read-only and cannot be deleted." });
        expect(calls).toEqual([]);
    });

    it("removes the hooks when the active profile is deleted", async () => {
        const controller = createController();
        controller.saveProfile("Quiet", enabledStapm);
        writeFileSync(hookPath, "");

        const status = await controller.deleteProfile("Quiet");

        expect(status).toEqual({ success: true, message: "Deleted active profile and removed boot/resume integration" });
        expect(calls).toEqual([["/usr/bin/bash", ["-lc", systemd.buildSyncScript(["/usr/bin/ryzenadj"], false, false)]]]);
    });

    it("refreshes the monitor from ryzenadj --info", async () => {
        runs.push({ code: 0, stdout: "STAPM LIMIT: 25.000\nPPT FAST: 35.5" }, { code: 1, stderr: "boom" });
        const controller = createController();

        const refreshed = await controller.refreshMonitor();
        expect(refreshed.message).toBe("Monitoring data refreshed");
        expect(refreshed.snapshot?.stapm).toBe("25.000");
        expect(refreshed.snapshot?.ppt_fast).toBe("35.5");
        expect(refreshed.snapshot?.cpu_temp).toBe("N/A");
        expect(refreshed.raw).toBe("STAPM LIMIT: 25.000\nPPT FAST: 35.5");

        expect(await controller.refreshMonitor()).toEqual({ success: false, message: "Monitoring refresh failed" });
    });

    it("needs an active setting for boot or resume", async () => {
        const status = await createController().applySystemIntegration({ boot: true, resume: false, autostart: false }, defaultProfileValues());
        expect(status).toEqual({ success: false, message: "Enable at least one setting before applying boot/resume integration." });
        expect(calls).toEqual([]);
    });

    it("updates autostart and removes hooks without active settings", async () => {
        const status = await createController().applySystemIntegration({ boot: false, resume: false, autostart: true }, defaultProfileValues());

        expect(status).toEqual({ success: true, message: "Integration settings updated" });
        expect(calls).toEqual([["/usr/bin/bash", ["-lc", systemd.buildSyncScript(["/usr/bin/ryzenadj"], false, false)]]]);
        expect(existsSync(autostart.autostartPath)).toBe(true);
    });

    it("collects integration failures", async () => {
        runs.push({ code: 1, stderr: "Permission denied" });
        const status = await createController().applySystemIntegration({ boot: true, resume: true, autostart: false }, enabledStapm);
        expect(status).toEqual({ success: false, message: "system integration update failed" });
    });

    it("reports an unreadable store instead of throwing", () => {
        writeFileSync(profiles.path, "{ broken");
        const controller = createController();
        expect(controller.loadProfiles()).toEqual({ selected: "", profiles: {} });
        expect(controller.saveProfile("Quiet", {}).success).toBe(false);
    });

    it("imports and exports profiles", () => {
        const controller = createController();
        controller.saveProfile("Quiet", enabledStapm);
        const file = join(dir, "profiles-export.json");

        expect(controller.exportProfiles(file)).toEqual({ success: true, message: `Exported profiles to ${file}` });
        controller.saveProfile("Loud", {});
        expect(controller.importProfiles(file)).toEqual({ success: true, message: `Imported profiles from ${file}` });
        expect(Object.keys(profiles.loadAll().profiles)).toEqual(["Quiet"]);
    });
});
