import { spawn } from "child_process";
import { Readable } from "stream";
import { CommandCallback, ICommandResult } from "../../interfaces/ICommandResult";
import { shellJoin } from "../../libs/command";
import { debugLog } from "../../utils/log";
import { isRunningAsRoot, prependPrivilege } from "../../utils/processes";

export const SHELL = "/usr/bin/bash";
export const COMMAND_NOT_FOUND_MESSAGE = "Command not found. Is ryzenadj installed?";

// the part of ChildProcess the executor relies on
export interface ISpawnedProcess {
    stdout: Readable | null;
    stderr: Readable | null;
    once(event: "error", listener: (err: NodeJS.ErrnoException) => void): unknown;
    once(event: "close", listener: (code: number | null) => void): unknown;
}

export type SpawnFunction = (command: string, args: string[]) => ISpawnedProcess;

export interface ICommandExecutorOptions {
    spawnFn?: SpawnFunction;
    isPrivileged?: () => boolean;
}

const toBuffer = (chunk: Buffer | string): Buffer => typeof chunk === "string" ? Buffer.from(chunk) : chunk;

const defaultSpawn: SpawnFunction = (command, args) => spawn(command, args);

/**
 * Runs ryzenadj and generated scripts in child processes.
 *
 * Every invocation reports exactly once through its callback and never throws;
 * launch errors and non-zero exits arrive as `success: false`.
 * Invocations are independent and may overlap.
 */
export class CommandExecutor {

    private readonly spawnFn: SpawnFunction;
    private readonly isPrivileged: () => boolean;
    private readonly activeProcesses = new Set<ISpawnedProcess>();

    constructor(options: ICommandExecutorOptions = {}) {
        this.spawnFn = options.spawnFn ?? defaultSpawn;
        this.isPrivileged = options.isPrivileged ?? isRunningAsRoot;
    }

    public get activeCount(): number {
        return this.activeProcesses.size;
    }

    public runAsync(command: string[], usePkexec: boolean, callback: CommandCallback): void {
        this.spawnWorker(prependPrivilege(command, usePkexec, this.isPrivileged()), callback);
    }

    public runShellAsync(script: string, usePkexec: boolean, callback: CommandCallback): void {
        this.runAsync([SHELL, "-lc", script], usePkexec, callback);
    }

    public run(command: string[], usePkexec: boolean): Promise<ICommandResult> {
        return new Promise(resolve => this.runAsync(command, usePkexec, resolve));
    }

    public runShell(script: string, usePkexec: boolean): Promise<ICommandResult> {
        return new Promise(resolve => this.runShellAsync(script, usePkexec, resolve));
    }

    private spawnWorker(command: string[], callback: CommandCallback): void {
        const commandDisplay = shellJoin(command);
        debugLog(`[CommandExecutor]: running ${commandDisplay}`);

        let child: ISpawnedProcess;
        try {
            child = this.spawnFn(command[0], command.slice(1));
        } catch (err) {
            const stderr = err instanceof Error ? err.message : String(err);
            setImmediate(() => callback({ success: false, stdout: "", stderr, command: commandDisplay }));
            return;
        }

        let settled = false;
        // decoded once on close so multi-byte characters split across chunks survive
        const stdoutChunks: Buffer[] = [];
        const stderrChunks: Buffer[] = [];
        const finish = (result: ICommandResult) => {
            if (settled) {
                return;
            }
            settled = true;
            this.activeProcesses.delete(child);
            debugLog(`[CommandExecutor]: finished ${commandDisplay} (success: ${result.success})`);
            callback(result);
        };

        this.activeProcesses.add(child);
        child.stdout?.on("data", (chunk: Buffer | string) => stdoutChunks.push(toBuffer(chunk)));
        child.stderr?.on("data", (chunk: Buffer | string) => stderrChunks.push(toBuffer(chunk)));

        child.once("error", err => {
            finish({
                success: false,
                stdout: "",
                stderr: err.code === "ENOENT" ? COMMAND_NOT_FOUND_MESSAGE : err.message,
                command: commandDisplay
            });
        });
        child.once("close", code => {
            let stderr = Buffer.concat(stderrChunks).toString("utf8").trim();
            if (code === 127 && !stderr) {
                stderr = COMMAND_NOT_FOUND_MESSAGE;
            }
            finish({
                success: code === 0,
                stdout: Buffer.concat(stdoutChunks).toString("utf8").trim(),
                stderr,
                command: commandDisplay
            });
        });
    }
}
