/**
 * Runtime mode of the current process.
 * Injected (DI) so services never sniff env vars to find out whether they run under tests.
 */
export type RuntimeMode =
  | { kind: 'production' }
  | { kind: 'test' }
  | { kind: 'cli' };
