const NEEDS_QUOTING = /[ "$]/;

const ESCAPES: Record<string, string> = {
  '"': '\\"',
  '\\': '\\\\',
  '\n': '\\n',
  '\r': '\\r',
  '\t': '\\t',
  $: '\\$',
};

/**
 * Formats an argument for display in a shell-like command line, wrapping it in
 * double quotes when it contains a space, `"` or `$`.
 *
 * Not a complete shell escaper: only used for diagnostics, never to build a
 * command that is actually executed.
 */
export function argQuote(arg: string): string {
  if (!NEEDS_QUOTING.test(arg)) return arg;
  return `"${arg.replace(/["\\\n\r\t$]/g, ch => ESCAPES[ch] ?? ch)}"`;
}
