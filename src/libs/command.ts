import { BOOLEAN_OPTIONS, enabledKey, NUMERIC_OPTIONS } from './options';

export const RYZENADJ_BINARY = "ryzenadj";
// boot and resume hooks run without the session PATH
export const INTEGRATION_BINARY = "/usr/bin/ryzenadj";

function toInteger(value: unknown): number {
    const parsed = Math.trunc(Number(value ?? 0));
    return Number.isFinite(parsed) ? parsed : 0;
}

/**
 * Builds the ryzenadj argument list for a (possibly sparse) profile value map.
 *
 * Numeric options are emitted only when their `<key>_enabled` flag is truthy and
 * always in catalog order, so the same values give the same command line.
 * A result holding only the binary means there is nothing to apply.
 */
export function buildRyzenadjCommand(values: Readonly<Record<string, unknown>>, binary: string = RYZENADJ_BINARY): string[] {
    const command = [binary];

    for (const spec of NUMERIC_OPTIONS) {
        if (!values[enabledKey(spec.key)]) {
            continue;
        }
        command.push(spec.cli, toInteger(values[spec.key]).toString());
    }

    for (const spec of BOOLEAN_OPTIONS) {
        if (values[spec.key]) {
            command.push(spec.cli);
        }
    }

    return command;
}

export function hasActiveSettings(command: string[]): boolean {
    return command.length > 1;
}

/** Minimal POSIX shell quoting. */
export function shellQuote(arg: string): string {
    if (arg === "") {
        return "''";
    }
    if (/^[A-Za-z0-9_@%+=:,./-]+$/.test(arg)) {
        return arg;
    }
    return "'" + arg.replace(/'/g, `'"'"'`) + "'";
}

export function shellJoin(args: string[]): string {
    return args.map(shellQuote).join(" ");
}
