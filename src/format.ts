/**
 * Textual form of a value inside a collection's `toString()`.
 * Strings are quoted so that `"1"` and `1` stay distinguishable.
 */
export function formatValue(value: unknown): string {
    if (typeof value === 'string') return JSON.stringify(value);
    if (typeof value === 'bigint') return `${value}n`;
    if (Array.isArray(value)) return `[${value.map(formatValue).join(', ')}]`;
    if (typeof value === 'object' && value !== null && !('toString' in value)) return '[object]';
    return String(value);
}
