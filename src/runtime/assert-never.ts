/**
 * Exhaustiveness guard for discriminated unions.
 * Reaching this at runtime means a union member was added without a matching branch.
 */
export function assertNever(x: never): never {
  throw new Error(`Unhandled variant: ${JSON.stringify(x)}`);
}
