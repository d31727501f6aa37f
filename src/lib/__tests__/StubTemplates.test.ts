import { importLine, matchesTemplate, normalizeWhitespace, renderFixtureStub, renderTestStub } from '../StubTemplates';

describe('StubTemplates', () => {
  it('imports packaged and top-level modules', () => {
    expect(importLine('src.auth.dependencies')).toBe('from src.auth import dependencies  # noqa: F401');
    expect(importLine('orders')).toBe('import orders  # noqa: F401');
  });

  it('renders a test stub with one placeholder test', () => {
    expect(renderTestStub('src.orders')).toBe(
      'from src import orders  # noqa: F401\n\n\ndef test_orders() -> None:\n    pass\n'
    );
  });

  it('renders a fixture stub with one placeholder fixture', () => {
    expect(renderFixtureStub('src.auth.dependencies')).toBe(
      'import pytest\n\nfrom src.auth import dependencies  # noqa: F401\n\n\n@pytest.fixture\ndef dependencies_fixture() -> None:\n    pass\n'
    );
  });

  it('normalizes whitespace runs', () => {
    expect(normalizeWhitespace('  a \n\t b  \r\n')).toBe('a b');
  });

  it('treats whitespace-only differences as the template', () => {
    const template = renderTestStub('src.orders');
    const reformatted = template.replace(/\n/g, '\r\n').replace('pass', 'pass   ') + '\n\n';
    expect(matchesTemplate(reformatted, template)).toBe(true);
  });

  it('treats any other change as an edit', () => {
    const template = renderTestStub('src.orders');
    expect(matchesTemplate(template + '\ndef test_total() -> None:\n    assert 1\n', template)).toBe(false);
    expect(matchesTemplate(template.replace('pass', 'assert True'), template)).toBe(false);
  });
});
