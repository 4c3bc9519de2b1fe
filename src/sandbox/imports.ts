import { readFileSync } from 'fs';

interface PythonModuleData {
  stdlib: string[];
  installAliases: Record<string, string>;
}

function isModuleData(value: unknown): value is PythonModuleData {
  return (
    typeof value === 'object' &&
    value !== null &&
    'stdlib' in value &&
    Array.isArray(value.stdlib) &&
    value.stdlib.every((name: unknown) => typeof name === 'string') &&
    'installAliases' in value &&
    typeof value.installAliases === 'object' &&
    value.installAliases !== null &&
    Object.values(value.installAliases).every((pip: unknown) => typeof pip === 'string')
  );
}

function loadModuleData(): PythonModuleData {
  const raw: unknown = JSON.parse(
    readFileSync(new URL('../../data/python-modules.json', import.meta.url), 'utf-8')
  );
  if (!isModuleData(raw)) {
    throw new Error('data/python-modules.json is malformed');
  }
  return raw;
}

const MODULE_DATA = loadModuleData();
const STDLIB_MODULES: ReadonlySet<string> = new Set(MODULE_DATA.stdlib);
const INSTALL_ALIASES: ReadonlyMap<string, string> = new Map(Object.entries(MODULE_DATA.installAliases));

// `import a.b as c, d` / `from a.b import c` (relative `from .x` never matches)
const IMPORT_LINE = /^\s*import\s+(.+)$/;
const FROM_LINE = /^\s*from\s+([A-Za-z_][\w.]*)\s+import\b/;
const MODULE_NAME = /^[A-Za-z_]\w*(?:\.\w+)*$/;

export function isStdlibModule(name: string): boolean {
  return STDLIB_MODULES.has(name);
}

/**
 * Root module names imported anywhere in a Python script, in first-seen order.
 */
export function extractImportedModules(code: string): string[] {
  const roots = new Set<string>();
  const statements = code.split(/\r?\n/).flatMap(line => line.split('#')[0].split(';'));
  for (const line of statements) {
    const fromMatch = FROM_LINE.exec(line);
    if (fromMatch) {
      roots.add(fromMatch[1].split('.')[0]);
      continue;
    }
    const importMatch = IMPORT_LINE.exec(line);
    if (!importMatch) {
      continue;
    }
    for (const part of importMatch[1].split(',')) {
      const name = part.trim().split(/\s+as\s+/)[0].trim();
      if (MODULE_NAME.test(name)) {
        roots.add(name.split('.')[0]);
      }
    }
  }
  return [...roots];
}

/**
 * Third-party distributions a script needs: imported roots minus the standard
 * library and minus modules the workspace itself provides, mapped to their
 * pip names (sklearn -> scikit-learn).
 */
export function resolveInstallPackages(code: string, localModules: Iterable<string> = []): string[] {
  const local = new Set(localModules);
  const packages = new Set<string>();
  for (const name of extractImportedModules(code)) {
    if (isStdlibModule(name) || local.has(name)) {
      continue;
    }
    packages.add(INSTALL_ALIASES.get(name) ?? name);
  }
  return [...packages];
}

/**
 * Module names importable from the workspace: `foo.py` files and `foo/` packages.
 */
export function localModuleNames(fileNames: Iterable<string>): string[] {
  const names: string[] = [];
  for (const file of fileNames) {
    const match = /^([A-Za-z_]\w*)(?:\.py)?$/.exec(file);
    if (match) {
      names.push(match[1]);
    }
  }
  return names;
}
