// ── Help text ────────────────────────────────────────────────────────────────

const HELP_TEXT = `
Usage: toolbridge [command] [options]

Commands:
  chat                Start the terminal chat (default)
  serve               Run the tool host on stdin/stdout
  telegram            Start the Telegram bot front end

Options:
  --config <path>     Read configuration from this file (default: ./toolbridge.json)
  --help, -h          Show this help message

Examples:
  toolbridge
  toolbridge serve
  toolbridge chat --config ./toolbridge.json
  TELEGRAM_BOT_TOKEN=... toolbridge telegram
`.trim();

export type CliCommand = 'chat' | 'serve' | 'telegram';

const KNOWN_COMMANDS: ReadonlySet<string> = new Set<CliCommand>(['chat', 'serve', 'telegram']);

export interface CliInvocation {
    command: CliCommand;
    configPath?: string;
}

function isCliCommand(value: string): value is CliCommand {
    return KNOWN_COMMANDS.has(value);
}

// ── Command handlers ─────────────────────────────────────────────────────────

/**
 * Handle `--help` or `-h` flags.
 * Returns `true` when the flag was found.
 */
export function handleHelpCli(argv: string[]): boolean {
    if (!argv.includes('--help') && !argv.includes('-h')) return false;

    console.log(HELP_TEXT);
    process.exitCode = 0;
    return true;
}

/**
 * Guard against unknown or mistyped top-level commands.
 * Returns `true` and sets a non-zero exit code when an unknown command is detected.
 */
export function handleUnknownCommand(argv: string[]): boolean {
    const [command] = argv;
    if (command === undefined || command.startsWith('--') || isCliCommand(command)) {
        return false;
    }

    console.error(`[toolbridge] Unknown command: '${command}'`);
    console.error(`Run 'toolbridge --help' to see available commands.`);
    process.exitCode = 1;
    return true;
}

/** Resolve the command and options. Call after the help and unknown-command guards. */
export function parseCliArgs(argv: string[]): CliInvocation {
    const [first] = argv;
    const command: CliCommand = first !== undefined && isCliCommand(first) ? first : 'chat';

    const configIndex = argv.indexOf('--config');
    const configPath = configIndex >= 0 ? argv[configIndex + 1] : undefined;
    return configPath !== undefined && !configPath.startsWith('--') ? { command, configPath } : { command };
}
