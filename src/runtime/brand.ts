/**
 * Nominal typing for values that passed a boundary check.
 *
 * The marker is string-keyed so that zod schemas transforming into branded
 * types can be exported without TS4023 ("cannot be named").
 */
export type Brand<T, B extends string> = T & { readonly __brand: B };
