/**
 * Quote one argument for display in a POSIX shell.
 * Flags (`-i`, `-map`) stay bare; everything else is double-quoted.
 */
export function quoteArg(arg: string): string {
  if (arg.startsWith('-')) return arg
  const escaped = arg.replace(/[\\"$`]/g, (c) => `\\${c}`)
  return `"${escaped}"`
}

/** Render a binary and its arguments as a single copy-pasteable command line. */
export function formatCommand(binary: string, args: readonly string[]): string {
  return [binary, ...args].map((token, i) => (i === 0 ? token : quoteArg(token))).join(' ')
}
