import 'dotenv/config';
import { handleHelpCli, handleUnknownCommand, parseCliArgs, type CliInvocation } from './core/cli.js';
import { Orchestrator } from './core/orchestrator.js';
import { readConfig, type AppConfig } from './config/app-config.js';
import { ChatCommands } from './interfaces/chat-commands.js';
import { startChatRepl } from './interfaces/chat-repl.js';
import { Dispatcher } from './interfaces/dispatcher.js';
import { TelegramHandler } from './interfaces/telegram_handler.js';
import { LineTransport } from './protocol/line-transport.js';
import { ProcessTransport } from './protocol/process-transport.js';
import { CalendarStore } from './services/calendar-store.js';
import { ConversationStore } from './services/conversation-store.js';
import { loadCorporateData } from './services/corporate-data.js';
import { createModelClient } from './services/model-client.js';
import { ToolHost } from './services/tool-host.js';
import { ToolHostClient } from './services/tool-host-client.js';
import { ToolRegistry } from './services/tool-registry.js';
import { createCorporatePrompts, createCorporateResources } from './skills/catalog.js';
import { createCorporateTools } from './skills/corporate.js';
import { configureLogger, logThought, scrubSensitiveText } from './utils/logger.js';

// ── Early one-shot CLI commands ──────────────────────────────────────────────

const argv = process.argv.slice(2);

if (handleHelpCli(argv)) {
    process.exit(process.exitCode ?? 0);
}

if (handleUnknownCommand(argv)) {
    process.exit(process.exitCode ?? 1);
}

// ── Tool host (stdout is the protocol channel: diagnostics go to stderr) ─────

async function runServe(): Promise<void> {
    const data = loadCorporateData();
    const registry = new ToolRegistry();
    registry.registerMany(createCorporateTools());

    const host = new ToolHost({
        registry,
        calendar: new CalendarStore(data.availableSlots),
        data,
        resources: createCorporateResources(),
        prompts: createCorporatePrompts(),
    });

    console.error(`[ToolHost] Serving ${registry.size} tools on stdio.`);
    await host.serve(new LineTransport({ input: process.stdin, output: process.stdout }));
    console.error('[ToolHost] Input closed, shutting down.');
}

// ── Front ends ───────────────────────────────────────────────────────────────

interface Session {
    client: ToolHostClient;
    commands: ChatCommands;
}

function hostTransport(config: AppConfig, invocation: CliInvocation): ProcessTransport {
    if (config.host.command) {
        return new ProcessTransport({ ...config.host });
    }
    // No external host configured: run this same program as one.
    const scriptPath = process.argv[1] ?? '';
    const configArgs = invocation.configPath ? ['--config', invocation.configPath] : [];
    return new ProcessTransport({
        command: process.execPath,
        args: [...process.execArgv, scriptPath, 'serve', ...configArgs],
        env: config.host.env,
    });
}

async function openSession(config: AppConfig, invocation: CliInvocation): Promise<Session> {
    const client = new ToolHostClient(hostTransport(config, invocation));
    const init = await client.connect();
    console.log(`[toolbridge] Connected to ${init.serverInfo.name} ${init.serverInfo.version}.`);

    const conversations = new ConversationStore(config.orchestration.maxHistoryEntries);
    const orchestrator = new Orchestrator({
        model: createModelClient(config.model.provider, config.model),
        tools: client,
        conversations,
        toolCallMode: config.orchestration.toolCallMode,
        maxToolRounds: config.orchestration.maxToolRounds,
        historyWindow: config.orchestration.historyWindow,
        inlineFinalization: config.orchestration.inlineFinalization,
    });

    return { client, commands: new ChatCommands({ orchestrator, tools: client, conversations }) };
}

async function runChat(config: AppConfig, invocation: CliInvocation): Promise<void> {
    const session = await openSession(config, invocation);
    try {
        await startChatRepl({ commands: session.commands });
    } finally {
        await session.client.close();
    }
}

async function runTelegram(config: AppConfig, invocation: CliInvocation): Promise<void> {
    if (!config.telegram.botToken) {
        throw new Error('TELEGRAM_BOT_TOKEN is not set. Add it to .env or to the telegram section of the config file.');
    }

    const session = await openSession(config, invocation);
    const dispatcher = new Dispatcher(new TelegramHandler(config.telegram.botToken), session.commands, {
        allowFrom: config.telegram.allowFrom,
    });
    console.log('[toolbridge] Telegram bot is polling. Press Ctrl+C to stop.');
    await logThought('[toolbridge] Telegram front end started.');

    await new Promise<void>((resolve) => {
        process.once('SIGINT', () => resolve());
        process.once('SIGTERM', () => resolve());
    });

    try {
        await dispatcher.shutdown();
    } finally {
        await session.client.close();
    }
}

// ── Main ─────────────────────────────────────────────────────────────────────

async function main(): Promise<void> {
    const invocation = parseCliArgs(argv);
    const config = await readConfig(invocation.configPath);
    configureLogger({ dir: config.logging.dir, enabled: config.logging.enabled });
    await logThought(`[toolbridge] Starting in ${invocation.command} mode.`);

    switch (invocation.command) {
        case 'serve':
            await runServe();
            break;
        case 'chat':
            await runChat(config, invocation);
            break;
        case 'telegram':
            await runTelegram(config, invocation);
            break;
    }
}

main().catch((err: unknown) => {
    const message = scrubSensitiveText(err instanceof Error ? err.message : String(err));
    console.error(`[toolbridge] Fatal: ${message}`);
    process.exitCode = 1;
});
