/**
 * Port: interactive questions asked of the user.
 *
 * `ask` resolves to `null` when the user cancels.
 */
export interface InteractiveInputPort {
  ask(prompt: string): Promise<string | null>;
  confirm(prompt: string): Promise<boolean>;
}
