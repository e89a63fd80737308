/**
 * Brand helper for "parse, don't validate".
 *
 * A branded value proves a boundary check already ran (definition validated,
 * path asserted absolute, config parsed). Brands are erased at runtime.
 *
 * NOTE: string-keyed marker instead of a `unique symbol` so exported zod
 * schemas that transform into branded types stay nameable (TS4023).
 */
export type Brand<T, B extends string> = T & { readonly __brand: B };
