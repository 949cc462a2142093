import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { INTEGRATION_BINARY, RYZENADJ_BINARY } from "../libs/command";
import { DEFAULT_SETTINGS, openSettings, resolveConfigDir } from "./settings";

describe("resolveConfigDir", () => {
    it("prefers the override", () => {
        expect(resolveConfigDir({ RYZENADJ_CONTROL_CONFIG_DIR: " /srv/ryzen ", HOME: "/home/test" })).toBe("/srv/ryzen");
    });

    it("defaults to the user config directory", () => {
        expect(resolveConfigDir({ HOME: "/home/test" })).toBe("/home/test/.config/ryzenadj-control");
        expect(resolveConfigDir({ RYZENADJ_CONTROL_CONFIG_DIR: "  ", HOME: "/home/test" })).toBe("/home/test/.config/ryzenadj-control");
    });
});

describe("openSettings", () => {
    let dir: string;

    beforeEach(() => {
        dir = mkdtempSync(join(tmpdir(), "ryzenadj-settings-"));
    });

    afterEach(() => {
        rmSync(dir, { recursive: true, force: true });
    });

    it("uses defaults without a settings file", () => {
        expect(openSettings(dir)).toEqual(DEFAULT_SETTINGS);
        expect(DEFAULT_SETTINGS.binary).toBe(RYZENADJ_BINARY);
        expect(DEFAULT_SETTINGS.integrationBinary).toBe(INTEGRATION_BINARY);
    });

    it("reads valid entries and ignores mistyped ones", () => {
        writeFileSync(join(dir, "settings.json"), JSON.stringify({
            usePkexec: false,
            binary: "",
            integrationBinary: "/opt/bin/ryzenadj",
            autoSyncIntegration: "no",
            refreshIntervalSeconds: 2.6
        }));
        expect(openSettings(dir)).toEqual({
            usePkexec: false,
            binary: "ryzenadj",
            integrationBinary: "/opt/bin/ryzenadj",
            autoSyncIntegration: true,
            refreshIntervalSeconds: 3
        });
    });

    it("clamps the refresh interval", () => {
        writeFileSync(join(dir, "settings.json"), JSON.stringify({ refreshIntervalSeconds: 0 }));
        expect(openSettings(dir).refreshIntervalSeconds).toBe(1);
        writeFileSync(join(dir, "settings.json"), JSON.stringify({ refreshIntervalSeconds: 1000 }));
        expect(openSettings(dir).refreshIntervalSeconds).toBe(300);
    });

    it("rejects a file that is not an object", () => {
        const path = join(dir, "settings.json");
        writeFileSync(path, "[1, 2]");
        expect(() => openSettings(dir)).toThrow(`Invalid settings file ${path}: expected a JSON object`);
    });
});
