/** `${NAME}` or `${NAME:-fallback}`. */
const ENV_REFERENCE = /\$\{([A-Za-z_][A-Za-z0-9_]*)(?::-([^}]*))?\}/g;

export interface UnresolvedEnvReference {
  /** Dotted location in the config, e.g. `slack.token`. */
  path: string;
  variable: string;
}

export interface EnvExpansion {
  value: unknown;
  unresolved: UnresolvedEnvReference[];
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Expands environment references in every string of a parsed config.
 * An unset variable without a fallback is left as written and reported.
 */
export function expandEnvReferences(
  config: unknown,
  env: Record<string, string | undefined> = process.env,
): EnvExpansion {
  const unresolved: UnresolvedEnvReference[] = [];

  const visit = (node: unknown, at: string[]): unknown => {
    if (typeof node === "string") {
      return node.replace(ENV_REFERENCE, (match, variable: string, fallback?: string) => {
        const value = env[variable];
        if (value !== undefined && value !== "") {
          return value;
        }
        if (fallback !== undefined) {
          return fallback;
        }
        unresolved.push({ path: at.join("."), variable });
        return match;
      });
    }
    if (Array.isArray(node)) {
      return node.map((item, index) => visit(item, [...at, String(index)]));
    }
    if (isPlainObject(node)) {
      const result: Record<string, unknown> = {};
      for (const [key, value] of Object.entries(node)) {
        result[key] = visit(value, [...at, key]);
      }
      return result;
    }
    return node;
  };

  return { value: visit(config, []), unresolved };
}
