import { execFile } from 'child_process';
import { existsSync } from 'fs';
import { posix } from 'path';
import { shellJoin, shellQuote } from '../../libs/command';
import { debugLog } from '../../utils/log';

export const SERVICE_NAME = "ryzenadj-control.service";
export const SERVICE_DIR = "/etc/systemd/system";
export const SERVICE_PATH = `${SERVICE_DIR}/${SERVICE_NAME}`;
export const HOOK_DIR = "/usr/lib/systemd/system-sleep";
export const HOOK_PATH = `${HOOK_DIR}/ryzenadj-control-resume`;

const SCRIPT_HEADER = "set -euo pipefail";

/**
 * Generates the shell scripts that install or remove the boot service and the
 * resume hook. The scripts are meant to run as root; nothing is executed here.
 */
export class SystemdManager {

    constructor(private readonly servicePath: string = SERVICE_PATH, private readonly hookPath: string = HOOK_PATH) { }

    public buildServiceContent(command: string[]): string {
        return [
            "[Unit]",
            "Description=Apply ryzenadj profile (ryzenadj-control)",
            "After=multi-user.target",
            "",
            "[Service]",
            "Type=oneshot",
            `ExecStart=${shellJoin(command)}`,
            "",
            "[Install]",
            "WantedBy=multi-user.target",
            ""
        ].join("\n");
    }

    public buildSleepHookContent(command: string[]): string {
        return [
            "#!/usr/bin/env bash",
            `if [ "$1" = "post" ]; then`,
            `  ${shellJoin(command)}`,
            "fi",
            ""
        ].join("\n");
    }

    public buildSyncScript(command: string[], enableBoot: boolean, enableResume: boolean): string {
        return [
            SCRIPT_HEADER,
            `mkdir -p ${posix.dirname(this.servicePath)}`,
            `mkdir -p ${posix.dirname(this.hookPath)}`,
            ...this.bootLines(command, enableBoot),
            ...this.resumeLines(command, enableResume)
        ].join("\n");
    }

    public buildBootScript(command: string[], enableBoot: boolean): string {
        return [
            SCRIPT_HEADER,
            `mkdir -p ${posix.dirname(this.servicePath)}`,
            ...this.bootLines(command, enableBoot)
        ].join("\n");
    }

    public buildResumeScript(command: string[], enableResume: boolean): string {
        return [
            SCRIPT_HEADER,
            `mkdir -p ${posix.dirname(this.hookPath)}`,
            ...this.resumeLines(command, enableResume)
        ].join("\n");
    }

    // applies the values right away, then rewrites the active hooks with the same command
    public buildApplyAndSyncScript(command: string[], enableBoot: boolean, enableResume: boolean): string {
        return [
            SCRIPT_HEADER,
            shellJoin(command),
            this.buildSyncScript(command, enableBoot, enableResume)
        ].join("\n");
    }

    public isBootIntegrationEnabled(): Promise<boolean> {
        return new Promise(resolve => {
            execFile("systemctl", ["is-enabled", SERVICE_NAME], (err, stdout) => {
                if (err) {
                    debugLog(`[SystemdManager]: systemctl is-enabled ${SERVICE_NAME}: ${err.message}`);
                }
                resolve(!err && stdout.trim() === "enabled");
            });
        });
    }

    public isResumeIntegrationEnabled(): boolean {
        return existsSync(this.hookPath);
    }

    private bootLines(command: string[], enableBoot: boolean): string[] {
        if (enableBoot) {
            return [
                `printf '%s' ${shellQuote(this.buildServiceContent(command))} > ${this.servicePath}`,
                `chmod 644 ${this.servicePath}`,
                "systemctl daemon-reload",
                `systemctl enable ${SERVICE_NAME}`,
                `systemctl restart ${SERVICE_NAME} || true`
            ];
        }
        return [
            `systemctl disable ${SERVICE_NAME} || true`,
            `rm -f ${this.servicePath}`,
            "systemctl daemon-reload"
        ];
    }

    private resumeLines(command: string[], enableResume: boolean): string[] {
        if (enableResume) {
            return [
                `printf '%s' ${shellQuote(this.buildSleepHookContent(command))} > ${this.hookPath}`,
                `chmod 755 ${this.hookPath}`
            ];
        }
        return [`rm -f ${this.hookPath}`];
    }
}
