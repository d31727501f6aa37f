// File: src/lib/FixtureScanner.ts

export interface FixtureDefinition {
    name: string;
    /** Fixture stub path relative to the fixture root. */
    file: string;
    /** 1-based line of the `def`. */
    line: number;
    /** Dotted import path of the stub. */
    module: string;
}

const FIXTURE_DECORATOR = /^@(?:pytest\.)?fixture\b/;
const FUNCTION_DEF = /^(?:async\s+)?def\s+([A-Za-z_]\w*)\s*\(/;

/**
 * Finds module-level pytest fixtures by reading the source text; nothing is imported or run.
 *
 * Recognised shape, all at column 0:
 *
 *     @pytest.fixture            (or @fixture, with or without call arguments)
 *     @other_decorator           (optional, any number)
 *     def name(...):             (or async def)
 *
 * Blank lines, comments and indented or `)`-leading continuation lines may sit
 * between the decorator and the `def`. Any other column-0 statement drops the
 * pending decorator.
 */
export function scanFixtureNames(content: string): Array<{ name: string; line: number }> {
    const found: Array<{ name: string; line: number }> = [];
    let pending = false;

    content.replace(/^\uFEFF/, '').split(/\r?\n/).forEach((text, index) => {
        if (FIXTURE_DECORATOR.test(text)) {
            pending = true;
            return;
        }
        if (!pending) return;

        const def = FUNCTION_DEF.exec(text);
        if (def) {
            found.push({ name: def[1], line: index + 1 });
            pending = false;
            return;
        }
        const isContinuation = text.trim() === ''
            || text.startsWith('#')
            || text.startsWith('@')
            || text.startsWith(')')
            || /^\s/.test(text);
        if (!isContinuation) {
            pending = false;
        }
    });
    return found;
}

export function scanFixtures(content: string, file: string, module: string): FixtureDefinition[] {
    return scanFixtureNames(content).map(({ name, line }) => ({ name, file, line, module }));
}
