/**
 * Command-line argument parsing
 */

export interface ParsedArgs {
    command: string;
    subcommand?: string;
    args: string[];
    flags: Record<string, string | boolean>;
}

/**
 * Parse command-line arguments into structured format
 *
 * `--key value` sets a string flag, `--key` or `-k` a boolean one;
 * everything else is positional. Flags named in `booleanFlags` never
 * take a value.
 */
export function parseArgs(args: string[], booleanFlags: string[] = ['help', 'verbose']): ParsedArgs {
    const flags: Record<string, string | boolean> = {};
    const positional: string[] = [];

    for (let i = 0; i < args.length; i++) {
        const arg = args[i];
        if (arg.startsWith('--')) {
            const key = arg.slice(2);
            const next = args[i + 1];
            if (next && !next.startsWith('-') && !booleanFlags.includes(key)) {
                flags[key] = next;
                i++;
            } else {
                flags[key] = true;
            }
        } else if (arg.startsWith('-')) {
            flags[arg.slice(1)] = true;
        } else {
            positional.push(arg);
        }
    }

    return {
        command: positional[0] || 'help',
        subcommand: positional[1],
        args: positional.slice(1),
        flags,
    };
}

/**
 * Read a string-valued flag
 */
export function stringFlag(args: ParsedArgs, name: string): string | undefined {
    const value = args.flags[name];
    return typeof value === 'string' ? value : undefined;
}
