/**
 * Config Arbitrator — merges feature requests into one conflict-free configuration.
 *
 * Functional claims are hard requirements: two of them wanting different values
 * for the same option is fatal (ConfigConflictError). Performance claims are
 * optimizations: a claim that collides with anything already decided is dropped
 * as a whole and its fallback runs instead.
 *
 * The resolution itself is the pure function `arbitrate()`; every rank of a
 * multi-worker build computes the same result from the same ordered claims.
 */

import { createLogger, Logger } from "../logger";
import {
    ArbitrationReuseError,
    CommonRecoveryOptions,
    ConfigConflictError,
    InconsistentBaselineError,
    InvalidOptionError,
    StructuredError,
    createStructuredError,
} from "../structured_error";
import { OptionStore, optionValuesEqual } from "./option_store";
import {
    ArbitrationInput,
    ArbitrationResult,
    BaselineEntry,
    DroppedClaim,
    FunctionalClaim,
    OptionMap,
    OptionValue,
    PerformanceClaim,
    ResolvedConfig,
} from "./types";

const defaultLog = createLogger("arbitrator");

/* -------------------------------------------------------------------------- */
/* Validation                                                                 */
/* -------------------------------------------------------------------------- */

function checkName(kind: string, name: unknown): void {
    if (typeof name !== "string" || name.trim() === "") {
        throw new InvalidOptionError(`${kind} must be a non-empty string`, { kind, name: String(name) });
    }
}

function checkValue(value: unknown, at: string): void {
    if (value === null) return;
    switch (typeof value) {
        case "string":
        case "boolean":
            return;
        case "number":
            if (!Number.isFinite(value)) {
                throw new InvalidOptionError(`Invalid value for '${at}': ${value}`, { option: at });
            }
            return;
        case "object":
            for (const [k, v] of Object.entries(value)) checkValue(v, `${at}.${k}`);
            return;
        default:
            throw new InvalidOptionError(`Invalid value for '${at}': unsupported type ${typeof value}`, { option: at });
    }
}

function checkOptions(group: string, options: OptionMap): void {
    if (options === null || typeof options !== "object" || Array.isArray(options)) {
        throw new InvalidOptionError(`Options for group '${group}' must be a plain object`, { group });
    }
    for (const [key, value] of Object.entries(options)) {
        checkValue(value, `${group}.${key}`);
    }
}

/* -------------------------------------------------------------------------- */
/* Pure resolution                                                            */
/* -------------------------------------------------------------------------- */

function applyBaseline(store: OptionStore, entry: BaselineEntry): void {
    for (const [key, value] of Object.entries(entry.options)) {
        const cur = store.get(entry.group, key);
        if (cur) {
            if (!optionValuesEqual(cur.value, value)) {
                throw new InconsistentBaselineError(entry.group, key, entry.info, value, cur.source, cur.value);
            }
            continue;
        }
        store.set(entry.group, key, value, entry.info);
    }
}

function applyFunctional(store: OptionStore, claims: FunctionalClaim[]): void {
    // Group order follows the first claim seen for each group.
    const byGroup = new Map<string, FunctionalClaim[]>();
    for (const claim of claims) {
        const list = byGroup.get(claim.group);
        if (list) list.push(claim);
        else byGroup.set(claim.group, [claim]);
    }

    for (const [group, list] of byGroup) {
        for (const claim of list) {
            for (const [key, value] of Object.entries(claim.options)) {
                const cur = store.get(group, key);
                if (!cur) {
                    store.set(group, key, value, claim.feature);
                } else if (!optionValuesEqual(cur.value, value)) {
                    throw new ConfigConflictError(group, key, claim.feature, value, cur.source, cur.value);
                }
            }
        }
    }
}

/** Applies every entry of the claim to `attempt`; returns the first collision, if any. */
function tryPerformance(attempt: OptionStore, claim: PerformanceClaim): DroppedClaim | null {
    for (const entry of claim.entries) {
        for (const [key, value] of Object.entries(entry.options)) {
            const cur = attempt.get(entry.group, key);
            if (cur && !optionValuesEqual(cur.value, value)) {
                return {
                    perf: claim.perf,
                    group: entry.group,
                    option: key,
                    proposed: value,
                    existing: cur.value,
                    existing_source: cur.source,
                };
            }
            attempt.set(entry.group, key, value, claim.perf);
        }
    }
    return null;
}

function runFallbacks(claim: PerformanceClaim): void {
    const seen = new Set<() => void>();
    for (const entry of claim.entries) {
        if (entry.fallback && !seen.has(entry.fallback)) {
            seen.add(entry.fallback);
            entry.fallback();
        }
    }
}

export function arbitrate(input: ArbitrationInput, log: Logger = defaultLog): ArbitrationResult {
    let working = new OptionStore();
    for (const b of input.baselines) applyBaseline(working, b);

    applyFunctional(working, input.functional);

    const dropped: DroppedClaim[] = [];
    for (const claim of input.performance) {
        const attempt = working.clone();
        const conflict = tryPerformance(attempt, claim);
        if (conflict) {
            log.warn(`Ignoring performance claim '${claim.perf}' for option '${conflict.option}' due to conflict.`, {
                group: conflict.group,
                existing_source: conflict.existing_source,
            });
            dropped.push(conflict);
            runFallbacks(claim);
            continue;
        }
        working = attempt;
    }

    return {
        resolved: working.toResolved(),
        sources: working.sources(),
        dropped,
    };
}

/* -------------------------------------------------------------------------- */
/* Claim registry                                                             */
/* -------------------------------------------------------------------------- */

export type ConfigTargets = Record<string, Record<string, unknown>>;

export class ConfigArbitrator {
    private readonly baselines: BaselineEntry[] = [];
    private readonly baselineStore = new OptionStore();
    private readonly functional: FunctionalClaim[] = [];
    private readonly performance = new Map<string, PerformanceClaim>();
    private result: ArbitrationResult | null = null;

    constructor(private readonly log: Logger = defaultLog) { }

    /** Setup with pre-defined configs that come from the environment, such as GPU arch. */
    setup(info: string, group: string, options: OptionMap): void {
        this.assertOpen();
        checkName("info", info);
        checkName("group", group);
        checkOptions(group, options);

        const entry: BaselineEntry = { info, group, options: structuredClone(options) };
        applyBaseline(this.baselineStore, entry);
        this.baselines.push(entry);
    }

    /** Claim a functionality. It is fulfilled exactly, or resolve() throws. */
    claimFunc(feature: string, group: string, options: OptionMap): void {
        this.assertOpen();
        checkName("feature", feature);
        checkName("group", group);
        checkOptions(group, options);
        this.functional.push({ feature, group, options: structuredClone(options) });
    }

    /** Claim a performance preference. It may be abandoned, in which case `fallback` runs. */
    claimPerf(perf: string, group: string, options: OptionMap, fallback?: () => void): void {
        this.assertOpen();
        checkName("perf", perf);
        checkName("group", group);
        checkOptions(group, options);

        const entry = { group, options: structuredClone(options), fallback };
        const existing = this.performance.get(perf);
        if (existing) existing.entries.push(entry);
        else this.performance.set(perf, { perf, entries: [entry] });
    }

    /**
     * Arbitrate all claims and assign the winners onto the live config objects,
     * one per group name. Groups without a target are still part of the result.
     */
    resolve(targets: ConfigTargets = {}): ResolvedConfig {
        this.assertOpen();
        const result = arbitrate(
            {
                baselines: this.baselines,
                functional: this.functional,
                performance: Array.from(this.performance.values()),
            },
            this.log
        );
        this.result = result;

        for (const [group, target] of Object.entries(targets)) {
            const values = result.resolved[group];
            if (!values) continue;
            for (const [key, value] of Object.entries(values)) {
                target[key] = structuredClone(value);
            }
        }

        this.log.debug("Arbitration complete", {
            groups: Object.keys(result.resolved),
            dropped: result.dropped.map((d) => d.perf),
        });
        return result.resolved;
    }

    get dropped(): DroppedClaim[] {
        return this.result ? [...this.result.dropped] : [];
    }

    /** Warnings for abandoned performance claims, in structured form. */
    get diagnostics(): StructuredError[] {
        return this.dropped.map((d) =>
            createStructuredError(
                "PERF_CLAIM_DROPPED",
                `Performance claim '${d.perf}' dropped: '${d.group}.${d.option}' is held by '${d.existing_source}'`,
                { perf: d.perf, group: d.group, option: d.option, proposed: d.proposed, existing: d.existing },
                [CommonRecoveryOptions.changeOption(d.group, d.option)]
            )
        );
    }

    sourceOf(group: string, option: string): string | undefined {
        return this.result?.sources[group]?.[option];
    }

    private assertOpen(): void {
        if (this.result) throw new ArbitrationReuseError();
    }
}

export function valueOf(resolved: ResolvedConfig, group: string, option: string): OptionValue | undefined {
    return resolved[group]?.[option];
}
