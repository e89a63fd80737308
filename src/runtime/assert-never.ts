/**
 * Exhaustiveness guard for discriminated unions. The `never` parameter makes
 * a forgotten union member a compile error at the `switch` that calls it.
 */
export function assertNever(x: never, what = 'union member'): never {
  throw new Error(`Unhandled ${what}: ${JSON.stringify(x)}`);
}
