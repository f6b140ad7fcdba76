/**
 * Recursively freezes plain objects and arrays in place and returns the
 * same reference. Types are expected to declare their own readonly fields.
 */
export function deepFreeze<T>(value: T): T {
    freezeNode(value, new WeakSet<object>());
    return value;
}

function freezeNode(value: unknown, seen: WeakSet<object>): void {
    if (value === null || typeof value !== 'object' || seen.has(value)) {
        return;
    }
    seen.add(value);
    for (const child of Object.values(value)) {
        freezeNode(child, seen);
    }
    Object.freeze(value);
}
