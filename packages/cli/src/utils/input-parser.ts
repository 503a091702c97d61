export interface ParsedCommand {
    verb: string | null;        // Lower-cased command word or phrasal verb ("pick up")
    target: string | null;      // Rest of the line, original case kept ("magic potion")
}

export interface AliasTable {
    singleWords: ReadonlySet<string>;
    phrasalVerbs: ReadonlySet<string>;
}

/**
 * Split an input line into the leading command word (or phrasal verb) and the
 * rest. Input that starts with no known word comes back as a bare target, so
 * "north" parses as { verb: null, target: "north" }.
 */
export function parseInput(input: string, aliases: AliasTable): ParsedCommand {
    const clean = input.trim().replace(/\s+/g, ' ');
    if (!clean) {
        return { verb: null, target: null };
    }
    const lower = clean.toLowerCase();

    // Longer phrases first, so "look through" wins over "look"
    const phrasalVerbs = Array.from(aliases.phrasalVerbs).sort((a, b) => b.length - a.length);
    for (const phrasalVerb of phrasalVerbs) {
        if (lower === phrasalVerb || lower.startsWith(phrasalVerb + ' ')) {
            const rest = clean.slice(phrasalVerb.length).trim();
            return { verb: phrasalVerb, target: rest || null };
        }
    }

    const [first] = lower.split(' ');
    if (aliases.singleWords.has(first)) {
        const rest = clean.slice(first.length).trim();
        return { verb: first, target: rest || null };
    }

    return { verb: null, target: clean };
}
