/**
 * @fileoverview Pattern Matcher
 *
 * Compiles filter rules into matchers sharing a single `matches()` call.
 * A rule without wildcards compiles to string equality; a rule with `*`
 * or `?` compiles to an anchored RegExp. Every other character, `/` and
 * `.` included, is literal and matching is case-sensitive.
 *
 * @module @staterelay/engine/filters/PatternMatcher
 */

/**
 * A compiled rule.
 */
export interface PatternMatcher {
    /** The rule as written in configuration */
    readonly pattern: string;

    /**
     * Test a value (entity id or bare domain) against the rule.
     */
    matches(value: string): boolean;
}

const kWILDCARD = /[*?]/;

/**
 * True when the rule contains a glob wildcard.
 */
export function isGlobPattern(pattern: string): boolean {
    return kWILDCARD.test(pattern);
}

function escapeRegexLiteral(text: string): string {
    return text.replace(/[\\^$.*+?()[\]{}|]/g, "\\$&");
}

/**
 * Translate a glob to a RegExp. `*` is any run of characters and `?`
 * exactly one; neither treats a separator specially.
 */
function globToRegExp(pattern: string): RegExp {
    let source = "";
    for (const ch of pattern) {
        if (ch === "*") {
            source += ".*";
        }
        else if (ch === "?") {
            source += ".";
        }
        else {
            source += escapeRegexLiteral(ch);
        }
    }

    return new RegExp(`^${source}$`, "su");
}

/**
 * Compile one rule.
 *
 * @param pattern - Exact value or glob
 * @returns Matcher for the rule
 *
 * @example
 * ```typescript
 * compilePattern("sensor.sun_*").matches("sensor.sun_next_dusk"); // true
 * compilePattern("sensor.sun_*").matches("Sensor.sun_next_dusk"); // false
 * compilePattern("sensor.*").matches("sensor.a/b");               // true
 * compilePattern("light").matches("light");                       // true
 * ```
 */
export function compilePattern(pattern: string): PatternMatcher {
    if (!isGlobPattern(pattern)) {
        return {
            pattern,
            matches: (value) => value === pattern,
        };
    }

    const regexp = globToRegExp(pattern);

    return {
        pattern,
        matches: (value) => regexp.test(value),
    };
}

/**
 * Compile a rule set. Exact rules are looked up in a Set; globs are
 * tested one by one.
 */
export class PatternSet {
    private readonly exact: ReadonlySet<string>;
    private readonly globs: readonly PatternMatcher[];

    constructor(patterns: Iterable<string>) {
        const exact = new Set<string>();
        const globs: PatternMatcher[] = [];

        for (const pattern of patterns) {
            if (isGlobPattern(pattern)) {
                globs.push(compilePattern(pattern));
            }
            else {
                exact.add(pattern);
            }
        }

        this.exact = exact;
        this.globs = globs;
    }

    /** Number of rules in the set */
    get size(): number {
        return this.exact.size + this.globs.length;
    }

    /** Whether the set has no rules */
    get isEmpty(): boolean {
        return this.size === 0;
    }

    /**
     * True when any rule matches. An undefined value (e.g. an entity id
     * without a domain) matches nothing.
     */
    matches(value: string | undefined): boolean {
        if (value === undefined) {
            return false;
        }

        if (this.exact.has(value)) {
            return true;
        }

        return this.globs.some((glob) => glob.matches(value));
    }
}
