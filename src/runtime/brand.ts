/**
 * Nominal marker for values that passed a parser (`ScanConcurrency`, validated config).
 * Only the type carries it; nothing exists at run time.
 *
 * A string key rather than a `unique symbol`, so exported zod transforms into branded types
 * stay nameable in declaration output.
 */
export type Brand<T, B extends string> = T & { readonly __brand: B };
