/**
 * Variable substitution for declared property trees.
 *
 * Best effort: `${var.name}` is replaced when `name` has a value, everything
 * else (resource references, functions, unknown variables) is left as text
 * so the normalizer keeps it as `unresolved`.
 */

import { isPlainObject, lookupRawPath } from "../policy/catalog.js";

const WHOLE_VARIABLE = /^\$\{\s*var\.([A-Za-z0-9_.-]+)\s*\}$/;
const INLINE_VARIABLE = /\$\{\s*var\.([A-Za-z0-9_.-]+)\s*\}/g;

export function resolveVariables(
  tree: Record<string, unknown>,
  variables: Readonly<Record<string, unknown>>,
): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(tree)) {
    out[key] = resolveValue(value, variables);
  }
  return out;
}

/** Resolve a resource name; a reference to a non-scalar variable stays as written. */
export function resolveName(name: string, variables: Readonly<Record<string, unknown>>): string {
  const resolved = resolveString(name, variables);
  return typeof resolved === "string" || typeof resolved === "number" ? String(resolved) : name;
}

function resolveValue(value: unknown, variables: Readonly<Record<string, unknown>>): unknown {
  if (typeof value === "string") return resolveString(value, variables);
  if (Array.isArray(value)) return value.map(item => resolveValue(item, variables));
  if (isPlainObject(value)) return resolveVariables(value, variables);
  return value;
}

function resolveString(text: string, variables: Readonly<Record<string, unknown>>): unknown {
  // A whole-value reference keeps the variable's own type (list, number, ...).
  const whole = WHOLE_VARIABLE.exec(text);
  if (whole?.[1] !== undefined) {
    const found = lookupVariable(variables, whole[1]);
    return found === undefined ? text : found;
  }

  return text.replace(INLINE_VARIABLE, (match, name: string) => {
    const found = lookupVariable(variables, name);
    return typeof found === "string" || typeof found === "number" || typeof found === "boolean"
      ? String(found)
      : match;
  });
}

function lookupVariable(variables: Readonly<Record<string, unknown>>, name: string): unknown {
  if (Object.prototype.hasOwnProperty.call(variables, name)) return variables[name];
  return name.includes(".") ? lookupRawPath({ ...variables }, name) : undefined;
}
