// src/config_arbiter/types.ts

export type OptionValue =
    | string
    | number
    | boolean
    | null
    | OptionValue[]
    | { [key: string]: OptionValue };

export type OptionMap = Record<string, OptionValue>;

/** Pre-defined settings that come from the environment (hardware limits, read-only inputs). */
export interface BaselineEntry {
    info: string;
    group: string;
    options: OptionMap;
}

/** A behaviour the user enabled; must be honoured exactly or resolution fails. */
export interface FunctionalClaim {
    feature: string;
    group: string;
    options: OptionMap;
}

export interface PerformanceClaimEntry {
    group: string;
    options: OptionMap;
    fallback?: () => void;
}

/** An optimization; dropped as a whole when any entry collides. */
export interface PerformanceClaim {
    perf: string;
    entries: PerformanceClaimEntry[];
}

export interface ArbitrationInput {
    baselines: BaselineEntry[];
    functional: FunctionalClaim[];
    performance: PerformanceClaim[];
}

export type ResolvedConfig = Readonly<Record<string, Readonly<Record<string, OptionValue>>>>;

export type OptionSources = Record<string, Record<string, string>>;

export interface DroppedClaim {
    perf: string;
    group: string;
    option: string;
    proposed: OptionValue;
    existing: OptionValue;
    existing_source: string;
}

export interface ArbitrationResult {
    resolved: ResolvedConfig;
    sources: OptionSources;
    dropped: DroppedClaim[];
}
