export const USAGE = 'Usage: till [options] <time...>';

/**
 * Full --help text.
 */
export function helpText(): string {
  return `till - a quick countdown timer

${USAGE}

Tells you how long you have until TIME. If TIME has already passed today,
counts down to TIME tomorrow.

TIME is H, H:MM or H:MM:SS on the 24-hour clock, or any of those followed
by am or pm.

Examples:
  till 9          time left until 9:00am
  till 9:30pm     time left until 9:30pm
  till 9:00 -u    count down to 9:00am, then exit

Options:
  -u, --update     Update the countdown until the time has passed, then exit
  -w, --words      Write the time left in words
  -v, --verbose    Print debug information to stderr
  -h, --help       Show this help
  -V, --version    Show the version
`;
}
