/** Value of `--name=value` or `--name value`, else null. */
export function parseFlag(argv: string[], name: string): string | null {
  const prefix = `--${name}=`;
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg.startsWith(prefix)) {
      return arg.slice(prefix.length);
    }
    if (arg === `--${name}`) {
      const next = argv[i + 1];
      return next !== undefined && !next.startsWith("--") ? next : null;
    }
  }
  return null;
}

export function hasFlag(argv: string[], name: string): boolean {
  return argv.includes(`--${name}`);
}

export interface PreprocessArgs {
  dir: string;
  output: string;
  recursive: boolean;
}

export function parsePreprocessArgs(
  argv: string[],
  defaults: { dir: string; output: string }
): PreprocessArgs {
  return {
    dir: parseFlag(argv, "dir") ?? defaults.dir,
    output: parseFlag(argv, "output") ?? defaults.output,
    recursive: !hasFlag(argv, "no-recursive"),
  };
}
