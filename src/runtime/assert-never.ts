/**
 * Closes a `switch` over a discriminated union: adding a member without a case no longer
 * compiles. Reaching it at run time means a value came in from outside the type.
 */
export function assertNever(value: never): never {
  throw new Error(`Unhandled variant: ${JSON.stringify(value)}`);
}
