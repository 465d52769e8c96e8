/**
 * Operation and waiter name conversions.
 *
 * @module model/names
 */

/**
 * Convert a PascalCase operation name to its camelCase method name.
 *
 * Runs of capitals are treated as one word, so acronyms stay readable.
 *
 * @example
 * ```typescript
 * methodNameFor('DescribeWidgets');      // 'describeWidgets'
 * methodNameFor('DescribeDBInstances');  // 'describeDbInstances'
 * methodNameFor('ListV2Objects');        // 'listV2Objects'
 * ```
 */
export function methodNameFor(operationName: string): string {
  const words = splitWords(operationName);
  return words
    .map((word, index) => {
      const lower = word.toLowerCase();
      return index === 0 ? lower : lower.charAt(0).toUpperCase() + lower.slice(1);
    })
    .join('');
}

/**
 * Split a name into words at case boundaries, underscores and dashes.
 */
export function splitWords(name: string): string[] {
  return name
    .replace(/([A-Z]+)([A-Z][a-z])/g, '$1 $2')
    .replace(/([a-z0-9])([A-Z])/g, '$1 $2')
    .split(/[\s_-]+/)
    .filter((word) => word.length > 0);
}

/**
 * Lookup key for a waiter name: lowercase with separators removed, so
 * `widgetReady`, `WidgetReady` and `widget_ready` all match.
 */
export function normalizeWaiterName(name: string): string {
  return name.replace(/[^A-Za-z0-9]/g, '').toLowerCase();
}
