// characters a POSIX shell would split or expand
const POSIX_UNSAFE = /[\s"'`$&|;<>()*?[\]{}\\!#~]/;

function isQuoted(value: string): boolean {
  return (
    value.length >= 2 &&
    ((value.startsWith('"') && value.endsWith('"')) ||
      (value.startsWith("'") && value.endsWith("'")))
  );
}

/**
 * Quote one argument of the shell command line that launches the resolver.
 *
 * win32 always gets double quotes; on POSIX a value is single-quoted only when it
 * contains characters the shell would interpret.
 */
export function quoteArgument(value: string, platform: NodeJS.Platform = process.platform): string {
  if (value === "" || isQuoted(value)) return value;

  if (platform === "win32") {
    return `"${value}"`;
  }

  if (!POSIX_UNSAFE.test(value)) return value;
  return `'${value.replace(/'/g, "'\\''")}'`;
}
