// src/stable_stringify.ts
//
// Canonical JSON: object keys sorted (UTF-16 lex order like JS sort()),
// undefined members dropped the way JSON.stringify drops them.

export class UnsupportedJsonTypeError extends Error {
    constructor(public readonly path: string, public readonly kind: string) {
        super(`UNSUPPORTED_JSON_TYPE: ${kind} at ${path || "<root>"}`);
        this.name = "UnsupportedJsonTypeError";
    }
}

function walk(value: unknown, at: string, depth: number): string {
    if (depth > 100) throw new UnsupportedJsonTypeError(at, "depth limit");
    if (value === null) return "null";

    switch (typeof value) {
        case "boolean":
        case "string":
            return JSON.stringify(value);
        case "number":
            if (!Number.isFinite(value)) throw new UnsupportedJsonTypeError(at, String(value));
            return JSON.stringify(value);
        case "object": {
            if (Array.isArray(value)) {
                return "[" + value.map((v, i) => walk(v, `${at}[${i}]`, depth + 1)).join(",") + "]";
            }
            const entries = Object.entries(value)
                .filter(([, v]) => v !== undefined)
                .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
            return (
                "{" +
                entries.map(([k, v]) => JSON.stringify(k) + ":" + walk(v, at ? `${at}.${k}` : k, depth + 1)).join(",") +
                "}"
            );
        }
        default:
            // undefined, function, symbol, bigint
            throw new UnsupportedJsonTypeError(at, typeof value);
    }
}

export function stableStringify(value: unknown): string {
    return walk(value, "", 0);
}
