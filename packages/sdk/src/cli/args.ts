export interface ParsedArgs {
  command: string;
  positionals: string[];
  flags: Record<string, boolean>;
  options: Record<string, string>;
}

const VALUE_FLAGS = new Set(['pr', 'config', 'files', 'approvers', 'teams']);

export function parseArgs(args: string[]): ParsedArgs {
  const flags: Record<string, boolean> = {};
  const options: Record<string, string> = {};
  const positionals: string[] = [];
  let command = '';

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg.startsWith('--')) {
      const eq = arg.indexOf('=');
      const flag = eq === -1 ? arg.slice(2) : arg.slice(2, eq);
      if (VALUE_FLAGS.has(flag) && eq !== -1) {
        options[flag] = arg.slice(eq + 1);
      } else if (VALUE_FLAGS.has(flag) && i + 1 < args.length) {
        options[flag] = args[++i];
      } else {
        flags[flag] = true;
      }
    } else if (arg.startsWith('-') && arg.length > 1) {
      for (const f of arg.slice(1)) {
        switch (f) {
          case 'h': flags['help'] = true; break;
          case 'v': flags['verbose'] = true; break;
        }
      }
    } else if (!command) {
      command = arg;
    } else {
      positionals.push(arg);
    }
  }

  return { command, positionals, flags, options };
}

/**
 * Split a comma or whitespace separated option value.
 */
export function splitList(value: string | undefined): string[] {
  if (!value) return [];
  return value.split(/[\s,]+/).filter((item) => item.length > 0);
}
