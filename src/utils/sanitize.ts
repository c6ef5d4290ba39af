/**
 * Characters stripped from alert types and messages. Alert text ends up in
 * osascript/notify-send arguments and in the gateway CLI invocation.
 */
const UNSAFE_CHARACTERS = /[;|&`$(){}[\]<>\\"']/g;

export function sanitize(input: string): string {
  return input.replace(UNSAFE_CHARACTERS, '');
}
