export interface ICommandResult {
    success: boolean;
    stdout: string;
    stderr: string;
    command: string; // shell-quoted command line actually executed
}

export type CommandCallback = (result: ICommandResult) => void;

export type CommandOutcome = "success" | "warning" | "failure";
