/**
 * Naming helpers for flags, choices and displayed tokens.
 */

/**
 * Turn a field name into its flag spelling: `learning_rate` and
 * `learningRate` both become `learning-rate`.
 */
export function hyphenate(name: string): string {
  return name
    .replace(/([a-z0-9])([A-Z])/g, "$1-$2")
    .replace(/_/g, "-")
    .toLowerCase();
}

/** Render a closed token set the way usage lines show it: `{a,b,c}`. */
export function formatChoices(choices: readonly string[]): string {
  return `{${choices.join(",")}}`;
}

/** Quote a token for display when it would be ambiguous on a command line. */
export function displayToken(token: string): string {
  return token === "" || /\s/.test(token) ? JSON.stringify(token) : token;
}
