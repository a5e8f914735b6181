export interface ToolNameMapping {
  /** Name used on the provider tool-call surface. */
  providerByCatalog: Map<string, string>;
  /** Catalog name for each provider-facing name. */
  catalogByProvider: Map<string, string>;
}

const MAX_NAME = 64;

/**
 * Maps catalog names (which may contain `.` after namespacing) onto names the
 * hosted providers accept: `[A-Za-z0-9_-]`, at most 64 characters, unique.
 */
export function mapToolNames(names: readonly string[]): ToolNameMapping {
  const providerByCatalog = new Map<string, string>();
  const catalogByProvider = new Map<string, string>();

  const nextUnique = (base: string): string => {
    if (!catalogByProvider.has(base)) return base;
    for (let i = 2; ; i++) {
      const suffix = `_${i}`;
      const candidate = base.slice(0, MAX_NAME - suffix.length) + suffix;
      if (!catalogByProvider.has(candidate)) return candidate;
    }
  };

  for (const name of names) {
    const providerName = nextUnique(sanitizeToolName(name));
    providerByCatalog.set(name, providerName);
    catalogByProvider.set(providerName, name);
  }
  return { providerByCatalog, catalogByProvider };
}

export function toCatalogName(mapping: ToolNameMapping, providerName: string): string {
  return mapping.catalogByProvider.get(providerName) ?? providerName;
}

function sanitizeToolName(name: string): string {
  const replaced = name.trim().replace(/[^A-Za-z0-9_-]+/g, '_').replace(/^_+|_+$/g, '');
  return replaced.slice(0, MAX_NAME) || 'tool';
}
