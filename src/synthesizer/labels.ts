/**
 * Field label modifiers: host field name to JSON key.
 *
 * @packageDocumentation
 */

import type { FieldLabelModifier, LabelCasing } from './types.js';

/**
 * Splits an identifier into words at `_`, `-`, whitespace and case changes.
 *
 * @example
 * ```typescript
 * splitWords('userIDNumber'); // ['user', 'ID', 'Number']
 * ```
 */
export function splitWords(name: string): string[] {
  return name
    .replace(/([a-z0-9])([A-Z])/g, '$1 $2')
    .replace(/([A-Z]+)([A-Z][a-z])/g, '$1 $2')
    .split(/[\s_-]+/)
    .filter((word) => word.length > 0);
}

function capitalize(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1);
}

/**
 * Applies a casing to a label.
 */
export function applyCasing(label: string, casing: LabelCasing): string {
  switch (casing) {
    case 'identity':
      return label;
    case 'camel': {
      const [first, ...rest] = splitWords(label);
      if (first === undefined) {
        return label;
      }
      return first.toLowerCase() + rest.map(capitalize).join('');
    }
    case 'snake':
      return splitWords(label)
        .map((word) => word.toLowerCase())
        .join('_');
    case 'kebab':
      return splitWords(label)
        .map((word) => word.toLowerCase())
        .join('-');
  }
}

/**
 * Turns a host field name into its JSON key.
 *
 * The prefix is only stripped when something remains after it.
 *
 * @example
 * ```typescript
 * applyLabelModifier('userFirstName', { stripPrefix: 'user', casing: 'camel' }); // "firstName"
 * applyLabelModifier('user', { stripPrefix: 'user' });                           // "user"
 * ```
 */
export function applyLabelModifier(name: string, modifier: FieldLabelModifier | undefined): string {
  if (modifier === undefined) {
    return name;
  }

  let label = name;
  const prefix = modifier.stripPrefix;
  if (prefix !== undefined && prefix !== '' && label.startsWith(prefix) && label.length > prefix.length) {
    label = label.slice(prefix.length);
  }

  return applyCasing(label, modifier.casing ?? 'identity');
}
