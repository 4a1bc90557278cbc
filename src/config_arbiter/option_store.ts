// src/config_arbiter/option_store.ts
//
// Layered option registry: group -> key -> (value, source).
// Every mutation records provenance so conflict messages can name who set what.

import { stableStringify } from "../stable_stringify";
import { OptionSources, OptionValue, ResolvedConfig } from "./types";

export interface OptionEntry {
    group: string;
    key: string;
    value: OptionValue;
    source: string;
}

interface Slot {
    value: OptionValue;
    source: string;
}

export function optionValuesEqual(a: OptionValue, b: OptionValue): boolean {
    if (a === b) return true;
    return stableStringify(a) === stableStringify(b);
}

function deepFreeze<T>(value: T): T {
    if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
        for (const v of Object.values(value)) deepFreeze(v);
        Object.freeze(value);
    }
    return value;
}

export class OptionStore {
    private readonly groups = new Map<string, Map<string, Slot>>();

    get(group: string, key: string): Slot | undefined {
        return this.groups.get(group)?.get(key);
    }

    has(group: string, key: string): boolean {
        return this.get(group, key) !== undefined;
    }

    set(group: string, key: string, value: OptionValue, source: string): void {
        let g = this.groups.get(group);
        if (!g) {
            g = new Map();
            this.groups.set(group, g);
        }
        g.set(key, { value: structuredClone(value), source });
    }

    groupNames(): string[] {
        return Array.from(this.groups.keys());
    }

    entries(group: string): OptionEntry[] {
        const g = this.groups.get(group);
        if (!g) return [];
        return Array.from(g.entries()).map(([key, slot]) => ({ group, key, value: slot.value, source: slot.source }));
    }

    /** Independent copy; mutating the clone never touches this store. */
    clone(): OptionStore {
        const copy = new OptionStore();
        for (const [group, g] of this.groups) {
            for (const [key, slot] of g) copy.set(group, key, slot.value, slot.source);
        }
        return copy;
    }

    toResolved(): ResolvedConfig {
        const out: Record<string, Record<string, OptionValue>> = {};
        for (const [group, g] of this.groups) {
            const values: Record<string, OptionValue> = {};
            for (const [key, slot] of g) values[key] = structuredClone(slot.value);
            out[group] = values;
        }
        return deepFreeze(out);
    }

    sources(): OptionSources {
        const out: OptionSources = {};
        for (const [group, g] of this.groups) {
            const s: Record<string, string> = {};
            for (const [key, slot] of g) s[key] = slot.source;
            out[group] = s;
        }
        return out;
    }
}
