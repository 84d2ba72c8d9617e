export type Lookup<T> = () => T | undefined;

/** First lookup that yields a value wins; later lookups are never evaluated. */
export function firstAvailable<T>(...lookups: Lookup<T>[]): T | undefined {
    for (const lookup of lookups) {
        const value = lookup();
        if (value !== undefined) return value;
    }
    return undefined;
}

export function positiveFinite(value: number | undefined | null): number | undefined {
    return value !== undefined && value !== null && Number.isFinite(value) && value > 0 ? value : undefined;
}
