/**
 * Conversion between field values and the strings they're kept as in URL
 * params and client-side state.
 *
 * @module
 */

/**
 * The type of a field.  `{array: inner}` is a comma-separated list of `inner`.
 *
 * @category Types and Interfaces
 */
export type FieldType = "string" | "integer" | "float" | "boolean" | {readonly array: FieldType};

/**
 * The outcome of {@link parse}()
 *
 * @category Types and Interfaces
 */
export type ParseResult = {ok: true, value: unknown} | {ok: false, error: string};

const intPrefix = /^[+-]?\d+/, floatPrefix = /^[+-]?\d+(\.\d+)?([eE][+-]?\d+)?/;

function ok(value: unknown): ParseResult { return {ok: true, value}; }
function fail(error: string): ParseResult { return {ok: false, error}; }

/**
 * Parse a raw string into a value of the given type.  A null or undefined
 * input parses as null.  Numbers are read from the leading part of the
 * string, so `"42px"` is the integer 42.
 *
 * @category Field Types
 */
export function parse(type: FieldType, raw: string | Nullish): ParseResult {
    if (raw == null) return ok(null);
    if (typeof type === "object") {
        const items = raw.split(",").map(s => s.trim()).filter(s => s !== ""), out: unknown[] = [];
        for (const item of items) {
            const res = parse(type.array, item);
            if (!res.ok) return res;
            out.push(res.value);
        }
        return ok(out);
    }
    switch (type) {
        case "string":
            return ok(raw);
        case "integer": {
            const m = intPrefix.exec(raw);
            return m ? ok(parseInt(m[0], 10)) : fail(`cannot parse ${JSON.stringify(raw)} as integer`);
        }
        case "float": {
            const m = floatPrefix.exec(raw);
            return m ? ok(Number(m[0])) : fail(`cannot parse ${JSON.stringify(raw)} as float`);
        }
        case "boolean":
            if (raw === "true" || raw === "1") return ok(true);
            if (raw === "false" || raw === "0") return ok(false);
            return fail(`cannot parse ${JSON.stringify(raw)} as boolean`);
    }
}

/**
 * Serialize a value of the given type to a string.  Null and undefined dump
 * as the empty string.
 *
 * @category Field Types
 */
export function dump(type: FieldType, value: unknown): string {
    if (value == null) return "";
    if (typeof type === "object") {
        return Array.isArray(value) ? value.map(item => dump(type.array, item)).join(",") : dump(type.array, value);
    }
    return String(value);
}

type Nullish = null | undefined;
