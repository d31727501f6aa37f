// File: src/lib/ManagedRegion.ts
import { ManagedRegionError } from './errors';
import { FixtureDefinition } from './FixtureScanner';

export const REGION_BEGIN = '# >>> stubwright fixtures >>>';
export const REGION_END = '# <<< stubwright fixtures <<<';
const REGION_NOTE = '# Managed by `stubwright import-fixtures`; edits inside this block are overwritten.';

/**
 * Renders the fixture import block: one `from ... import ...` per stub in the order
 * the fixtures were found, names in definition order.
 */
export function renderRegion(fixtures: FixtureDefinition[]): string {
    const byModule = new Map<string, string[]>();
    for (const fixture of fixtures) {
        const names = byModule.get(fixture.module) ?? [];
        names.push(fixture.name);
        byModule.set(fixture.module, names);
    }
    const imports = [...byModule].map(([module, names]) => `from ${module} import ${names.join(', ')}  # noqa: F401`);
    return [REGION_BEGIN, REGION_NOTE, ...imports, REGION_END].join('\n');
}

/**
 * Swaps the marker-delimited block in `content` for `region`, leaving every other
 * line as it was. Without markers the block goes after the module preamble.
 * @param filePath Used in error messages only.
 */
export function replaceRegion(content: string | null, region: string, filePath: string): string {
    if (content === null || content.trim() === '') {
        return `${region}\n`;
    }
    const lines = content.split('\n');
    const begins = lineIndexes(lines, REGION_BEGIN);
    const ends = lineIndexes(lines, REGION_END);

    if (begins.length === 0 && ends.length === 0) {
        return insertAfterPreamble(lines, region);
    }
    if (begins.length !== 1 || ends.length !== 1) {
        throw new ManagedRegionError(filePath, `expected exactly one '${REGION_BEGIN}' and one '${REGION_END}' line, found ${begins.length} and ${ends.length}`);
    }
    const [begin] = begins;
    const [end] = ends;
    if (end < begin) {
        throw new ManagedRegionError(filePath, 'end marker appears before begin marker');
    }
    return [...lines.slice(0, begin), region, ...lines.slice(end + 1)].join('\n');
}

const DOCSTRING_OPEN = /^[rRuU]?("""|''')/;
const ONE_LINE_STRING = /^[rRuU]?("[^"]*"|'[^']*')\s*$/;
const FUTURE_IMPORT = /^from\s+__future__\s+import\b/;

/**
 * Index of the first line after the module preamble: leading comments, the
 * docstring and `from __future__` imports. Those must stay first in the file.
 */
function preambleEnd(lines: string[]): number {
    let end = 0;
    let seenStatement = false;
    for (let i = 0; i < lines.length; i++) {
        const line = lines[i];
        if (line.trim() === '') continue;
        if (line.startsWith('#')) {
            if (!seenStatement) end = i + 1;
            continue;
        }
        const docstring = seenStatement ? null : DOCSTRING_OPEN.exec(line);
        if (docstring) {
            const delimiter = docstring[1];
            if (!line.slice(docstring[0].length).includes(delimiter)) {
                while (i + 1 < lines.length && !lines[i + 1].includes(delimiter)) i++;
                i++;
            }
            end = i + 1;
            seenStatement = true;
            continue;
        }
        if (!seenStatement && ONE_LINE_STRING.test(line)) {
            end = i + 1;
            seenStatement = true;
            continue;
        }
        if (FUTURE_IMPORT.test(line)) {
            if (line.includes('(') && !line.includes(')')) {
                while (i + 1 < lines.length && !lines[i].includes(')')) i++;
            }
            end = i + 1;
            seenStatement = true;
            continue;
        }
        break;
    }
    return Math.min(end, lines.length);
}

function insertAfterPreamble(lines: string[], region: string): string {
    const end = preambleEnd(lines);
    const rest = lines.slice(end);
    while (rest.length > 0 && rest[0].trim() === '') rest.shift();
    const body = rest.length > 0 ? `${region}\n\n${rest.join('\n')}` : `${region}\n`;
    return end === 0 ? body : `${lines.slice(0, end).join('\n')}\n\n${body}`;
}

function lineIndexes(lines: string[], marker: string): number[] {
    const indexes: number[] = [];
    lines.forEach((line, index) => {
        if (line.trim() === marker) indexes.push(index);
    });
    return indexes;
}
