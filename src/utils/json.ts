import _ from 'lodash';

export function isRecord(value: unknown): value is Record<string, unknown> {
    return _.isPlainObject(value);
}

const INDENT = "  ";

// objects always list integer-like keys first, so sorted output is rendered from sorted pairs
function render(value: unknown, depth: number): string | undefined {
    const outer = INDENT.repeat(depth);
    const inner = INDENT.repeat(depth + 1);

    if (Array.isArray(value)) {
        if (value.length === 0) {
            return "[]";
        }
        const items = value.map(item => `${inner}${render(item, depth + 1) ?? "null"}`);
        return `[\n${items.join(",\n")}\n${outer}]`;
    }

    if (isRecord(value)) {
        const members = _.sortBy(Object.entries(value), ([key]) => key)
            .map(([key, member]): [string, string | undefined] => [key, render(member, depth + 1)])
            .filter((pair): pair is [string, string] => pair[1] !== undefined)
            .map(([key, rendered]) => `${inner}${JSON.stringify(key)}: ${rendered}`);
        if (members.length === 0) {
            return "{}";
        }
        return `{\n${members.join(",\n")}\n${outer}}`;
    }

    const rendered: unknown = JSON.stringify(value);
    return typeof rendered === "string" ? rendered : undefined;
}

// sorted keys and fixed indentation keep the written files diffable
export function stringifySorted(value: unknown): string {
    return render(value, 0) ?? "null";
}
