// src/lib/config_defaults.ts

/**
 * Default content for stubwright.yaml, written by `stubwright init`.
 */
export const DEFAULT_CONFIG_YAML = `# stubwright configuration (project root: stubwright.yaml)
# Every key is optional; the values below are the defaults.

paths:
  source_root: "src" # Application code mirrored into the stub trees
  test_root: "tests" # Test stubs: tests/<dir>/test_<name>.py
  fixture_root: "tests/fixtures" # Fixture stubs: tests/fixtures/<dir>/<name>_fixtures.py
  shared_fixtures_file: "tests/conftest.py" # Holds the managed fixture import block

naming:
  test_prefix: "test_"
  fixture_suffix: "_fixtures"

# Gitignore-style patterns, matched relative to each walked root
ignore:
  - "__init__.py"
  - "__pycache__/"
  - "conftest.py"

# --- External collaborators ---
commands:
  run: "uvicorn src.main:app --reload" # Dev server
  clean: # Formatters, run in order
    - "isort src tests"
    - "black src tests"
  run_tests: "pytest"
`;
