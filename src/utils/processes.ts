export const PKEXEC = "pkexec";

export function isRunningAsRoot(): boolean {
    return typeof process.geteuid === "function" && process.geteuid() === 0;
}

/**
 * Prefixes the escalation helper unless the process already runs as root.
 */
export function prependPrivilege(command: string[], usePkexec: boolean, privileged: boolean = isRunningAsRoot()): string[] {
    if (privileged || !usePkexec) {
        return command;
    }
    return [PKEXEC, ...command];
}
