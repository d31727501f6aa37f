// File: src/lib/StubTemplates.ts

function leafName(moduleName: string): string {
    const parts = moduleName.split('.');
    return parts[parts.length - 1];
}

export function importLine(moduleName: string): string {
    const lastDot = moduleName.lastIndexOf('.');
    if (lastDot === -1) {
        return `import ${moduleName}  # noqa: F401`;
    }
    return `from ${moduleName.slice(0, lastDot)} import ${moduleName.slice(lastDot + 1)}  # noqa: F401`;
}

export function renderTestStub(moduleName: string): string {
    return [
        importLine(moduleName),
        '',
        '',
        `def test_${leafName(moduleName)}() -> None:`,
        '    pass',
        '',
    ].join('\n');
}

export function renderFixtureStub(moduleName: string): string {
    return [
        'import pytest',
        '',
        importLine(moduleName),
        '',
        '',
        '@pytest.fixture',
        `def ${leafName(moduleName)}_fixture() -> None:`,
        '    pass',
        '',
    ].join('\n');
}

export function normalizeWhitespace(text: string): string {
    return text.replace(/\s+/g, ' ').trim();
}

/** A stub is still "empty" while it reads exactly like its template, ignoring whitespace. */
export function matchesTemplate(content: string, template: string): boolean {
    return normalizeWhitespace(content) === normalizeWhitespace(template);
}
