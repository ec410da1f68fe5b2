/**
 * Exhaustiveness helper for discriminated unions.
 * Put it in the `default` branch of a `switch` so a new union member fails the build.
 */
export function assertNever(x: never): never {
  throw new Error(`Unhandled union member: ${JSON.stringify(x)}`);
}
