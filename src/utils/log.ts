const isDebug = process.env.DEBUG === "true";

export function debugLog(input: unknown) {
    if(isDebug === true) {
        console.debug(input);
    }
}

export function formatTimestamp(date: Date): string {
    const pad = (value: number) => value.toString().padStart(2, "0");
    return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

export function formatOutputBlock(command: string, stdout: string, stderr: string, date: Date = new Date()): string {
    const lines = [`[${formatTimestamp(date)}] $ ${command}`];
    if (stdout) {
        lines.push(stdout);
    }
    if (stderr) {
        lines.push(stderr);
    }
    if (!stdout && !stderr) {
        lines.push("(no output)");
    }
    lines.push("");
    return lines.join("\n");
}

export function formatStatus(text: string, success: boolean): string {
    return `${success ? "SUCCESS" : "ERROR"}: ${text}`;
}

// command/output log, one block per executed command
export function appendOutput(command: string, stdout: string, stderr: string) {
    console.log(formatOutputBlock(command, stdout, stderr));
}

export function updateStatus(text: string, success: boolean) {
    if (success) {
        console.log(formatStatus(text, success));
    } else {
        console.error(formatStatus(text, success));
    }
}
