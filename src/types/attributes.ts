/**
 * Attribute input types
 */

/**
 * Flat, ordered key/value sequence: `[key, value, key, value, ...]`.
 * A `null` or `undefined` key ends the list early.
 */
export type AttributeList = ReadonlyArray<string | null | undefined>;

/**
 * Unordered string-keyed attributes
 */
export type AttributeMap = Readonly<Record<string, string>> | ReadonlyMap<string, string>;

export type AttributeInput = AttributeList | AttributeMap;

export function isAttributeList(input: AttributeInput): input is AttributeList {
  return Array.isArray(input);
}

export function isAttributeMapInstance(
  input: AttributeMap
): input is ReadonlyMap<string, string> {
  return input instanceof Map;
}
