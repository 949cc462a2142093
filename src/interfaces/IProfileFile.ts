// <option key> -> raw value, <option key>_enabled -> flag, <boolean option key> -> flag
export type ProfileValues = Record<string, number | boolean>;

export interface IProfileFile {
    selected: string; // "" or a key of profiles
    profiles: {
        [profileName: string]: ProfileValues; // "Initial Default" is the read-only baseline captured from ryzenadj --info
    };
}
