import { argQuote } from '../../../src/process/arg-quote.js';

// Reverses the escapes argQuote applies inside the surrounding quotes.
function unquote(quoted: string): string {
  const escapes: Record<string, string> = { '"': '"', '\\': '\\', n: '\n', r: '\r', t: '\t', $: '$' };
  return quoted.slice(1, -1).replace(/\\(["\\nrt$])/g, (_, ch: string) => escapes[ch] ?? ch);
}

describe('argQuote', () => {
  it.each([
    'run',
    '--socket-path',
    'db/node.socket',
    'C:\\path\\to\\file',
    'tab\tseparated',
    'line\nbreak',
    '',
  ])('leaves %j unchanged', arg => {
    expect(argQuote(arg)).toBe(arg);
  });

  it('wraps arguments with spaces in double quotes', () => {
    expect(argQuote('hello world')).toBe('"hello world"');
  });

  it('escapes embedded double quotes', () => {
    expect(argQuote('say "hi"')).toBe(String.raw`"say \"hi\""`);
  });

  it('escapes dollar signs', () => {
    expect(argQuote('$HOME')).toBe(String.raw`"\$HOME"`);
  });

  it('escapes backslashes and control characters once quoting is needed', () => {
    expect(argQuote('a b\\c\n\r\t')).toBe(String.raw`"a b\\c\n\r\t"`);
  });

  it.each([
    'hello world',
    'say "hi"',
    '$HOME/.cardano',
    'mixed "quotes" and $vars\twith\\slashes\r\n',
  ])('round-trips %j through unquote', arg => {
    const quoted = argQuote(arg);
    expect(quoted.startsWith('"')).toBe(true);
    expect(quoted.endsWith('"')).toBe(true);
    expect(unquote(quoted)).toBe(arg);
  });

  it('is not idempotent for arguments containing double quotes', () => {
    const once = argQuote('a"b');
    expect(once).toBe(String.raw`"a\"b"`);
    expect(argQuote(once)).toBe(String.raw`"\"a\\\"b\""`);
    expect(argQuote(once)).not.toBe(once);
  });
});
