export interface CommandVars {
  threshold: number | null;
  omitPatterns: readonly string[];
  changedFiles: readonly string[];
}

/**
 * Substitute `{threshold}`, `{omit}` and `{changed_files}` in a command template.
 * Placeholders without a value (and unknown ones) are left as written.
 */
export function renderCommand(template: string, vars: CommandVars): string {
  const tokens: Record<string, string | undefined> = {
    threshold: vars.threshold === null ? undefined : String(vars.threshold),
    omit: vars.omitPatterns.join(','),
    changed_files: vars.changedFiles.map(shellQuote).join(' ')
  };
  return template.replaceAll(/\{([a-z_]+)\}/g, (m, key: string) => (Object.hasOwn(tokens, key) ? tokens[key] : undefined) ?? m);
}

export function shellQuote(value: string): string {
  if (/^[A-Za-z0-9_/.,:=@%+-]+$/.test(value)) return value;
  return `'${value.replaceAll("'", `'\\''`)}'`;
}
