import { existsSync, mkdirSync, rmSync, writeFileSync } from 'fs';
import { homedir } from 'os';
import { basename, dirname, join } from 'path';
import { describeError } from '../profiles/ProfileError';

export const AUTOSTART_FILE_NAME = "ryzenadj-control.desktop";
export const INSTALLED_MONITOR = "/usr/bin/ryzenadj-monitor";

export interface IAutostartResult {
    ok: boolean;
    message: string;
}

/**
 * Login autostart of the monitor through a freedesktop autostart entry.
 */
export class AutostartManager {

    constructor(
        public readonly autostartPath: string = join(homedir(), ".config", "autostart", AUTOSTART_FILE_NAME),
        private readonly installedExecutable: string = INSTALLED_MONITOR,
        private readonly fallbackEntry: string = join(__dirname, "..", "..", "monitor.js")
    ) { }

    public resolveExecCommand(): string {
        if (existsSync(this.installedExecutable)) {
            return basename(this.installedExecutable);
        }
        return `node ${this.fallbackEntry}`;
    }

    public buildDesktopEntry(execCommand: string): string {
        return [
            "[Desktop Entry]",
            "Type=Application",
            "Name=RyzenAdj Control",
            "Comment=Frontend for ryzenadj",
            `Exec=${execCommand}`,
            "Icon=utilities-system-monitor",
            "Terminal=true",
            "Categories=System;Settings;",
            "StartupNotify=true",
            ""
        ].join("\n");
    }

    public isEnabled(): boolean {
        return existsSync(this.autostartPath);
    }

    public setEnabled(enabled: boolean): IAutostartResult {
        try {
            if (enabled) {
                mkdirSync(dirname(this.autostartPath), { recursive: true });
                writeFileSync(this.autostartPath, this.buildDesktopEntry(this.resolveExecCommand()), "utf-8");
            } else {
                rmSync(this.autostartPath, { force: true });
            }
            return { ok: true, message: "" };
        } catch (err) {
            return { ok: false, message: `Autostart update failed: ${describeError(err)}` };
        }
    }
}
