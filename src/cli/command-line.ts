/**
 * Splits a shell line into arguments. Single or double quotes group words;
 * there are no escape sequences.
 */
export function splitCommandLine(line: string): string[] {
  const args: string[] = [];
  let current = '';
  let quote: string | null = null;
  let inArgument = false;

  for (const char of line) {
    if (quote !== null) {
      if (char === quote) {
        quote = null;
      } else {
        current += char;
      }
      continue;
    }

    if (char === '"' || char === "'") {
      quote = char;
      inArgument = true;
    } else if (/\s/.test(char)) {
      if (inArgument) {
        args.push(current);
        current = '';
        inArgument = false;
      }
    } else {
      current += char;
      inArgument = true;
    }
  }

  if (inArgument) {
    args.push(current);
  }
  return args;
}
