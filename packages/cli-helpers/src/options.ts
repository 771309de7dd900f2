/**
 * Command-line option checks and exit reporting
 */

export function errorMsg(errors: readonly string[]): string {
  return `The following errors occurred while parsing your command:\n${errors.join('\n')}`;
}

/**
 * Messages for required options that were not supplied
 */
export function checkMissing(options: Record<string, unknown>, required: readonly string[]): string[] {
  return required
    .filter((name) => options[name] === undefined)
    .map((name) => `Missing required option: ${name}`);
}

/**
 * Print a message and exit; errors go to stderr
 */
export function exitWith(status: number, message: string): never {
  if (status === 0) {
    console.log(message);
  } else {
    console.error(message);
  }
  process.exit(status);
}
