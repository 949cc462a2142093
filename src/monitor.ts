#!/usr/bin/env node
import { FSWatcher, watch } from 'chokidar';
import { Table } from 'console-table-printer';
import { setIntervalAsync } from 'set-interval-async';
import * as si from 'systeminformation';
import { CommandExecutor } from './controllers/executor/CommandExecutor';
import { TelemetryArchiver } from './controllers/monitor/TelemetryArchiver';
import { ProfileManager } from './controllers/profiles/ProfileManager';
import { ProfileValues } from './interfaces/IProfileFile';
import { ISettingsFile } from './interfaces/ISettingsFile';
import { parseInfoOutput } from './libs/telemetry';
import { enabledKey, findNumericOption } from './libs/options';
import { debugLog } from './utils/log';
import { openSettings, resolveConfigDir } from './utils/settings';

const TCTL_TEMP = "tctl_temp";

class SelectedProfileWatcher {
    private selected = "";
    private values: ProfileValues | undefined;
    private listener: FSWatcher | undefined;

    constructor(private readonly profiles: ProfileManager) { }

    start() {
        this.read();
        this.listener = watch(this.profiles.path, { ignoreInitial: true });
        this.listener.on('all', () => this.read());
    }

    getSelected() {
        return this.selected || "(none)";
    }

    // the profile's own Tctl target when it sets one, the catalog default otherwise
    getTemperatureLimit(): number {
        const spec = findNumericOption(TCTL_TEMP);
        const fallback = spec ? spec.default : 90;
        if (this.values && this.values[enabledKey(TCTL_TEMP)] === true) {
            return Number(this.values[TCTL_TEMP]);
        }
        return fallback;
    }

    private read() {
        try {
            const data = this.profiles.readAll();
            this.selected = data.selected;
            this.values = data.selected ? data.profiles[data.selected] : undefined;
        } catch (err) {
            debugLog(err);
        }
    }
}

async function describeCpu(): Promise<string> {
    try {
        const cpu = await si.cpu();
        if (!cpu.manufacturer.toLowerCase().includes("amd")) {
            console.error(`WARNING: ${cpu.manufacturer} ${cpu.brand} is not an AMD CPU, ryzenadj will not work`);
        }
        return `${cpu.manufacturer} ${cpu.brand}`;
    } catch (err) {
        debugLog(err);
        return "CPU";
    }
}

async function printData(settings: ISettingsFile, executor: CommandExecutor, archiver: TelemetryArchiver, watcher: SelectedProfileWatcher, cpuName: string) {
    const result = await executor.run([settings.binary, "--info"], settings.usePkexec);
    if (!result.success) {
        console.error(`ERROR: ${result.command}: ${result.stderr || "no output"}`);
        return;
    }
    archiver.setCurrentRecord(parseInfoOutput(result.stdout));
    const row = archiver.buildRow(watcher.getTemperatureLimit());

    console.clear();
    const date = new Date();
    const p = new Table({ title: `${cpuName} - profile: ${watcher.getSelected()} (Last update at: ${date.toTimeString().split(' ')[0]})` });
    p.addRow(row.values, { color: row.color });
    p.printTable();
}

async function main() {
    const settings = openSettings();
    const executor = new CommandExecutor();
    const archiver = new TelemetryArchiver();
    const watcher = new SelectedProfileWatcher(new ProfileManager(resolveConfigDir()));
    watcher.start();
    const cpuName = await describeCpu();
    await printData(settings, executor, archiver, watcher, cpuName);
    setIntervalAsync(async () => {
        await printData(settings, executor, archiver, watcher, cpuName);
    }, settings.refreshIntervalSeconds * 1000);
}

main().catch(console.error);
