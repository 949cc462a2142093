export interface ISettingsFile {
    usePkexec: boolean;
    binary: string; // interactive use, resolved through PATH
    integrationBinary: string; // boot/resume hooks run without the session PATH
    autoSyncIntegration: boolean; // rewrite active boot/resume hooks on every apply
    refreshIntervalSeconds: number;
}
