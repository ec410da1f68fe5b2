/**
 * Brand helper for "parse, don't validate".
 *
 * A branded string proves it came through a parser or constructor at a
 * boundary (config loader, HTTP decoder, resource-name builder).
 *
 * A string-keyed marker keeps zod-inferred branded types nameable in
 * exported declarations. Erased at runtime.
 */
export type Brand<T, B extends string> = T & { readonly __brand: B };
