/**
 * Minimal argv parsing: positionals plus --flag / --flag value / --flag=value.
 */

export interface ParsedArgs {
    positionals: string[];
    flags: Record<string, string | true>;
}

/**
 * Flags that never take a value.
 */
const BOOLEAN_FLAGS = new Set(['dry-run', 'help']);

export function parseArgs(argv: readonly string[]): ParsedArgs {
    const positionals: string[] = [];
    const flags: Record<string, string | true> = {};

    for (let i = 0; i < argv.length; i++) {
        const arg = argv[i];
        if (!arg.startsWith('--')) {
            positionals.push(arg);
            continue;
        }

        const body = arg.slice(2);
        const eq = body.indexOf('=');
        if (eq >= 0) {
            flags[body.slice(0, eq)] = body.slice(eq + 1);
            continue;
        }

        const next = argv[i + 1];
        if (!BOOLEAN_FLAGS.has(body) && next !== undefined && !next.startsWith('--')) {
            flags[body] = next;
            i++;
        } else {
            flags[body] = true;
        }
    }

    return { positionals, flags };
}

/**
 * String value of a flag, or undefined when absent or given without a value.
 */
export function stringFlag(args: ParsedArgs, name: string): string | undefined {
    const value = args.flags[name];
    return typeof value === 'string' ? value : undefined;
}
