import { IBooleanOptionSpec, IOptionSpec, OptionCategory } from "../interfaces/IOptionSpec";

function option(key: string, label: string, category: OptionCategory, minimum: number, maximum: number, defaultValue: number, tooltip: string, uiScale = 1, uiSuffix = ""): IOptionSpec {
    return {
        key,
        cli: "--" + key.replace(/_/g, "-"),
        label,
        category,
        minimum,
        maximum,
        default: defaultValue,
        tooltip,
        uiScale,
        uiSuffix
    };
}

// order matters: ryzenadj command lines are always emitted in this order
export const RYZENADJ_NUMERIC_OPTIONS: readonly IOptionSpec[] = [
    option("stapm_limit", "STAPM Limit", "Power", 0, 200000, 25000, "Sustained platform power limit in W.", 1000, " W"),
    option("fast_limit", "PPT Fast Limit", "Power", 0, 200000, 35000, "Short boost power limit in W.", 1000, " W"),
    option("slow_limit", "PPT Slow Limit", "Power", 0, 200000, 30000, "Long-duration package power limit in W.", 1000, " W"),
    option("slow_time", "Slow Time", "Power", 0, 512, 64, "Time window for slow limit."),
    option("stapm_time", "STAPM Time", "Power", 0, 512, 64, "Time window for STAPM behavior."),
    option("tctl_temp", "Tctl Temp", "Power", 0, 105, 90, "Thermal control target temperature in C."),
    option("apu_slow_limit", "APU Slow Limit", "Power", 0, 200000, 30000, "APU-specific slow power limit in W.", 1000, " W"),
    option("skin_temp_limit", "Skin Temp Limit", "Power", 0, 100, 60, "Skin temperature control threshold."),
    option("apu_skin_temp", "APU Skin Temp", "Power", 0, 100, 55, "APU skin temperature target."),
    option("dgpu_skin_temp", "dGPU Skin Temp", "Power", 0, 100, 60, "dGPU skin temperature target."),
    option("vrm_current", "VRM Current", "Current", 0, 400, 100, "CPU VRM current limit in A."),
    option("vrmsoc_current", "VRMSoC Current", "Current", 0, 400, 80, "SoC VRM current limit in A."),
    option("vrmmax_current", "VRM Max Current", "Current", 0, 500, 130, "Maximum CPU VRM peak current in A."),
    option("vrmsocmax_current", "VRMSoC Max Current", "Current", 0, 500, 110, "Maximum SoC VRM peak current in A."),
    option("psi0_current", "PSI0 Current", "Current", 0, 500, 80, "PSI0 current threshold for CPU rails."),
    option("psi0soc_current", "PSI0SoC Current", "Current", 0, 500, 60, "PSI0 current threshold for SoC rails."),
    option("max_socclk_frequency", "Max SoC Clock", "Clocks", 0, 4000, 1800, "Maximum SoC clock frequency in MHz."),
    option("min_socclk_frequency", "Min SoC Clock", "Clocks", 0, 4000, 400, "Minimum SoC clock frequency in MHz."),
    option("max_fclk_frequency", "Max FCLK", "Clocks", 0, 4000, 1800, "Maximum fabric clock in MHz."),
    option("min_fclk_frequency", "Min FCLK", "Clocks", 0, 4000, 400, "Minimum fabric clock in MHz."),
    option("max_vcn", "Max VCN", "Clocks", 0, 4000, 1200, "Maximum VCN clock in MHz."),
    option("min_vcn", "Min VCN", "Clocks", 0, 4000, 300, "Minimum VCN clock in MHz."),
    option("max_lclk", "Max LCLK", "Clocks", 0, 4000, 1200, "Maximum LCLK in MHz."),
    option("min_lclk", "Min LCLK", "Clocks", 0, 4000, 300, "Minimum LCLK in MHz."),
    option("max_gfxclk", "Max GFX Clock", "Clocks", 0, 4000, 2200, "Maximum graphics clock in MHz."),
    option("min_gfxclk", "Min GFX Clock", "Clocks", 0, 4000, 400, "Minimum graphics clock in MHz."),
    option("prochot_deassertion_ramp", "Prochot Deassertion Ramp", "Advanced", 0, 255, 50, "Ramp behavior after PROCHOT release.")
];

// power_saving and max_performance exclude each other, see RyzenadjController.collectValues
export const RYZENADJ_BOOLEAN_OPTIONS: readonly IBooleanOptionSpec[] = [
    {
        key: "power_saving",
        cli: "--power-saving",
        label: "Power Saving",
        category: "Advanced",
        tooltip: "Enable ryzenadj power-saving mode."
    },
    {
        key: "max_performance",
        cli: "--max-performance",
        label: "Max Performance",
        category: "Advanced",
        tooltip: "Enable ryzenadj max-performance mode."
    }
];

export const OPTION_CATEGORIES: readonly OptionCategory[] = ["Power", "Current", "Clocks", "Advanced"];
