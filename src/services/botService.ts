import type { Server } from 'http';
import type { Telegraf } from 'telegraf';
import type { AppConfig } from '../config/config';
import { setupCatalogCommands } from '../commands/catalog';
import { setupCodeCommands } from '../commands/code';
import { BOT_COMMANDS, setupMenuCommands } from '../commands/menu';
import { setupNewsCommands } from '../commands/news';
import { setupSearchCommands, setupTextHandler } from '../commands/search';
import { stringifyError } from '../lib/errors';
import { logger as rootLogger } from '../lib/logger';
import { createBot } from '../lib/telegram';
import { closeServer, createServer, listen } from '../server';
import type { CatalogService } from './catalogService';
import type { FeedService } from './feedService';
import type { GitHubSearchService } from './githubSearchService';
import type { SearchSessionStore } from './searchSessionStore';
import type { SnippetService } from './snippetService';

const logger = rootLogger.child('bot');

export interface BotServices {
    feeds: FeedService;
    snippets: SnippetService;
    catalog: CatalogService;
    github: GitHubSearchService;
    sessions: SearchSessionStore;
}

export interface BotServiceOptions {
    /** Called when long polling dies after startup. */
    onFatal?: (error: unknown) => void;
    bot?: Telegraf;
}

export class BotService {
    private readonly bot: Telegraf;
    private server: Server | null = null;
    private polling: Promise<void> | null = null;
    private webhookSet = false;

    constructor(
        private readonly config: AppConfig,
        private readonly services: BotServices,
        private readonly options: BotServiceOptions = {},
    ) {
        this.bot = options.bot ?? createBot(config.telegram.botToken);
        this.registerHandlers();
    }

    get webhookUrl(): string | undefined {
        const { publicUrl, webhookPath } = this.config.telegram;
        return publicUrl ? `${publicUrl}${webhookPath}` : undefined;
    }

    private registerHandlers() {
        const { feeds, snippets, catalog, github, sessions } = this.services;
        setupMenuCommands(this.bot, sessions);
        setupNewsCommands(this.bot, feeds);
        setupCodeCommands(this.bot, snippets);
        setupCatalogCommands(this.bot, catalog);
        setupSearchCommands(this.bot, { catalog, github, sessions });
        // Must stay last: it answers every text no command handler took
        setupTextHandler(this.bot, { catalog, github, sessions });
    }

    /**
     * Validates the token, starts the HTTP server and then either registers
     * the webhook (PUBLIC_URL set) or starts long polling. Throws when the
     * token is rejected or the port cannot be bound.
     */
    async start(): Promise<void> {
        const me = await this.bot.telegram.getMe();
        this.bot.botInfo = me;
        logger.info(`Bot validated: @${me.username} (id=${me.id})`);

        const webhookUrl = this.webhookUrl;
        const app = createServer({
            webhook: webhookUrl
                ? this.bot.webhookCallback(this.config.telegram.webhookPath, {
                      secretToken: this.config.telegram.webhookSecret,
                  })
                : undefined,
        });
        this.server = await listen(app, this.config.server.port);
        logger.info(`Server is running on port ${this.config.server.port}`);

        await this.bot.telegram.setMyCommands(
            BOT_COMMANDS.map(({ command, description }) => ({ command, description })),
        );

        if (webhookUrl) {
            await this.bot.telegram.setWebhook(webhookUrl, {
                secret_token: this.config.telegram.webhookSecret,
            });
            this.webhookSet = true;
            logger.info(`Webhook set: ${webhookUrl}`);
            return;
        }

        logger.warn('PUBLIC_URL is not set; using long polling');
        this.polling = this.bot
            .launch(() => logger.info('Long polling started'))
            .catch((error: unknown) => {
                logger.error(`Long polling stopped: ${stringifyError(error)}`);
                this.options.onFatal?.(error);
            });
    }

    async stop(reason = 'shutdown'): Promise<void> {
        logger.info(`Stopping bot (${reason})...`);
        if (this.webhookSet) {
            try {
                await this.bot.telegram.deleteWebhook();
                this.webhookSet = false;
                logger.info('Webhook deleted');
            } catch (error) {
                logger.warn(`Webhook delete failed: ${stringifyError(error)}`);
            }
        }

        if (this.polling) {
            try {
                this.bot.stop(reason);
                await this.polling;
            } catch (error) {
                logger.warn(`Stopping long polling failed: ${stringifyError(error)}`);
            }
            this.polling = null;
        }

        if (this.server) {
            try {
                await closeServer(this.server);
                logger.info('Server closed');
            } catch (error) {
                logger.warn(`Server close failed: ${stringifyError(error)}`);
            }
            this.server = null;
        }
    }
}
