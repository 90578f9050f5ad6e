import { PackageReference } from '../types';

// Longest operators first so `===` is not read as `==` followed by `=`.
const OPERATOR_PATTERN = /===|==|~=|!=|>=|<=|>|</;
const PINNING_OPERATORS = new Set(['==', '===']);

/**
 * Splits a pip specifier such as `keras==3.11.2` or `django>=4.0` into a name
 * and, for exact pins only, a version.
 */
export function parsePackageSpec(specifier: string): PackageReference {
  const text = specifier.trim();
  const withoutMarkers = text.split(';')[0].trim();
  const match = OPERATOR_PATTERN.exec(withoutMarkers);

  const rawName = match ? withoutMarkers.slice(0, match.index) : withoutMarkers;
  const name = rawName.replace(/\[[^\]]*\]/, '').trim();
  if (!name) {
    throw new Error(`Invalid package specifier: '${specifier}'`);
  }

  const ref: PackageReference = { name, specifier: text };
  if (match && PINNING_OPERATORS.has(match[0])) {
    const version = withoutMarkers
      .slice(match.index + match[0].length)
      .split(',')[0]
      .trim();
    if (version) ref.version = version;
  }
  return ref;
}
