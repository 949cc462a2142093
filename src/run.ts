#!/usr/bin/env node
import commandLineArgs from 'command-line-args';
import { Table } from 'console-table-printer';
import { CommandExecutor } from './controllers/executor/CommandExecutor';
import { AutostartManager } from './controllers/integration/AutostartManager';
import { SystemdManager } from './controllers/integration/SystemdManager';
import { INITIAL_DEFAULT_PROFILE_NAME, ProfileManager, visibleProfileNames } from './controllers/profiles/ProfileManager';
import { IActionStatus, RyzenadjController } from './controllers/RyzenadjController';
import { ProfileValues } from './interfaces/IProfileFile';
import { BOOLEAN_OPTIONS, enabledKey, formatDisplayValue, optionsByCategory } from './libs/options';
import { optionalString, parseEdits } from './utils/cliArgs';
import { openSettings, resolveConfigDir } from './utils/settings';

const optionDefinitions = [
    { name: 'command', type: String, defaultOption: true },
    { name: 'profile', alias: 'p', type: String },
    { name: 'file', alias: 'f', type: String },
    { name: 'set', alias: 's', type: String, multiple: true },
    { name: 'enable', alias: 'e', type: String, multiple: true },
    { name: 'disable', alias: 'd', type: String, multiple: true },
    { name: 'flag', type: String, multiple: true },
    { name: 'unflag', type: String, multiple: true },
    { name: 'boot', type: Boolean },
    { name: 'resume', type: Boolean },
    { name: 'autostart', type: Boolean },
    { name: 'apply', type: Boolean },
    { name: 'no-pkexec', type: Boolean }
];

const USAGE = `Usage: ryzenadj-control <command> [options]

Commands:
  list                      list saved profiles
  show [-p name]            show the values of a profile (default: selected one)
  apply [-p name]           apply a profile, plus any edits, with ryzenadj
  save -p name              save the selected profile plus edits under a name
  select -p name            make a profile the selected one
  delete -p name            delete a profile
  import -f file            replace all profiles with the ones in file
  export -f file            write all profiles to file
  capture-default           store the machine baseline read from ryzenadj --info
  reset [--apply]           load the baseline values, optionally applying them
  info                      print the telemetry read from ryzenadj --info
  integrate [--boot] [--resume] [--autostart]
                            install or remove boot/resume hooks and login autostart
  status                    show which integrations are installed

Edits:
  --set key=value           set an option in display units (W for power limits) and enable it
  --enable key, --disable key
  --flag key, --unflag key  power_saving or max_performance
  --no-pkexec               do not prefix privileged commands with pkexec`;

function printProfile(name: string, values: ProfileValues) {
    const p = new Table({ title: `Profile: ${name}` });
    for (const spec of Object.values(optionsByCategory()).flat()) {
        const active = values[enabledKey(spec.key)] === true;
        p.addRow({
            option: spec.key,
            label: spec.label,
            category: spec.category,
            value: formatDisplayValue(spec, Number(values[spec.key])),
            active: active ? "yes" : "no"
        }, { color: active ? "green" : "white" });
    }
    for (const spec of BOOLEAN_OPTIONS) {
        const active = values[spec.key] === true;
        p.addRow({ option: spec.key, label: spec.label, category: spec.category, value: active ? "on" : "off", active: active ? "yes" : "no" }, { color: active ? "green" : "white" });
    }
    p.printTable();
}

function requireArgument(value: string | undefined, flag: string): string {
    if (!value) {
        throw new Error(`Missing ${flag}. Run without arguments for usage.`);
    }
    return value;
}

async function main() {
    const options: Record<string, unknown> = commandLineArgs(optionDefinitions);
    const settings = openSettings();
    if (options["no-pkexec"] === true) {
        settings.usePkexec = false;
    }

    const profileManager = new ProfileManager(resolveConfigDir());
    const controller = new RyzenadjController(profileManager, new CommandExecutor(), new SystemdManager(), new AutostartManager(), settings);
    const command = optionalString(options.command);
    const profileName = optionalString(options.profile);
    const file = optionalString(options.file);

    const baseValues = (): ProfileValues => {
        const data = controller.loadProfiles();
        if (profileName && data.profiles[profileName]) {
            return data.profiles[profileName];
        }
        return controller.currentValues();
    };
    const editedValues = () => RyzenadjController.collectValues(baseValues(), parseEdits(options));

    let status: IActionStatus = { success: true, message: "" };
    switch (command) {
        case "list": {
            const data = controller.loadProfiles();
            for (const name of visibleProfileNames(data)) {
                console.log(`${name === data.selected ? "*" : " "} ${name}`);
            }
            if (data.profiles[INITIAL_DEFAULT_PROFILE_NAME]) {
                console.log(`(${INITIAL_DEFAULT_PROFILE_NAME} captured)`);
            }
            break;
        }
        case "show":
            printProfile(profileName ?? (controller.loadProfiles().selected || "(current)"), editedValues());
            break;
        case "apply":
            status = await controller.applyValues(editedValues());
            break;
        case "save":
            status = controller.saveProfile(requireArgument(profileName, "--profile"), editedValues());
            break;
        case "select":
            status = controller.selectProfile(requireArgument(profileName, "--profile"));
            break;
        case "delete":
            status = await controller.deleteProfile(requireArgument(profileName, "--profile"));
            break;
        case "import":
            status = controller.importProfiles(requireArgument(file, "--file"));
            break;
        case "export":
            status = controller.exportProfiles(requireArgument(file, "--file"));
            break;
        case "capture-default":
            status = await controller.captureInitialDefault();
            break;
        case "reset": {
            const reset = controller.resetToDefaults();
            status = reset;
            if (reset.values) {
                printProfile(INITIAL_DEFAULT_PROFILE_NAME, reset.values);
                if (options.apply === true) {
                    status = await controller.applyValues(reset.values);
                }
            }
            break;
        }
        case "info": {
            const refresh = await controller.refreshMonitor();
            status = refresh;
            if (refresh.snapshot) {
                console.table(refresh.snapshot);
            }
            break;
        }
        case "integrate":
            status = await controller.applySystemIntegration({
                boot: options.boot === true,
                resume: options.resume === true,
                autostart: options.autostart === true
            }, editedValues());
            break;
        case "status":
            console.table(await controller.integrationState());
            break;
        default:
            console.log(USAGE);
            status = { success: command === undefined, message: "" };
    }

    if (!status.success) {
        process.exitCode = 1;
    }
}

main().catch(err => {
    console.error(err instanceof Error ? err.message : err);
    process.exitCode = 1;
});
