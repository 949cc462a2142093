import { CommandOutcome, ICommandResult } from '../interfaces/ICommandResult';

// ryzenadj prints these for limits the current CPU family does not expose
export const WARNING_PATTERNS = [
    "not supported on this family",
    "is not supported"
];

export const FATAL_PATTERNS = [
    "permission denied",
    "command not found",
    "no such file",
    "failed to",
    "traceback",
    "unable to",
    "polkit",
    "authentication"
];

export function isWarningDominatedOutput(stdout: string, stderr: string): boolean {
    const text = [stdout, stderr].join("\n").trim().toLowerCase();
    if (!text) {
        return false;
    }
    if (!WARNING_PATTERNS.some(pattern => text.includes(pattern))) {
        return false;
    }
    return !FATAL_PATTERNS.some(pattern => text.includes(pattern));
}

export function classifyOutcome(result: ICommandResult): CommandOutcome {
    if (result.success) {
        return "success";
    }
    return isWarningDominatedOutput(result.stdout, result.stderr) ? "warning" : "failure";
}
