import { Markup, type Context, type Telegraf } from 'telegraf';
import type { InlineKeyboardButton } from 'telegraf/types';
import { codeBlock, escapeHtml, INLINE_CODE_LIMIT, toFileStem } from '../lib/format';
import {
    archiveFileName,
    buildCodeArchive,
    CODE_LANGUAGES,
    codeFileName,
    isCodeLanguage,
} from '../services/archiveService';
import { isProjectCategory, type CatalogService } from '../services/catalogService';
import type { CodeLanguage, Project, ProjectCategory, PythonLib } from '../types/content';
import { deliverContent, editOrReply, sendDocument, sendReply, type BotReply, type ContentReply } from './replies';

const CATEGORY_LABELS: Record<ProjectCategory, string> = {
    robotics: '🤖 Robotics projects',
    iot: '🌐 IoT projects',
};

export function catalogMenuReply(): BotReply {
    return {
        text: '📁 Pick a category:',
        keyboard: Markup.inlineKeyboard(
            [
                Markup.button.callback('🤖 Robotics', 'cat:robotics'),
                Markup.button.callback('🌐 IoT', 'cat:iot'),
                Markup.button.callback('🐍 Python libraries', 'cat:libs'),
                Markup.button.callback('🔙 Main menu', 'back_main'),
            ],
            { columns: 1 },
        ).reply_markup,
    };
}

export function projectListReply(category: ProjectCategory, projects: Project[]): BotReply {
    const buttons = projects.map((project) =>
        Markup.button.callback(project.title || '—', `proj:${category}:${project.id}`),
    );
    buttons.push(Markup.button.callback('🔙 Back', 'catalog'));
    const text = projects.length > 0 ? `${CATEGORY_LABELS[category]}:` : `${CATEGORY_LABELS[category]}: nothing here yet.`;
    return { text, keyboard: Markup.inlineKeyboard(buttons, { columns: 1 }).reply_markup };
}

export function libListReply(libs: PythonLib[]): BotReply {
    const buttons = libs.map((lib) => Markup.button.callback(lib.name, `lib:${lib.name}`));
    buttons.push(Markup.button.callback('🔙 Back', 'catalog'));
    return {
        text: libs.length > 0 ? '🐍 Python libraries:' : '🐍 Python libraries: nothing here yet.',
        keyboard: Markup.inlineKeyboard(buttons, { columns: 2 }).reply_markup,
    };
}

export function projectKeyboard(category: ProjectCategory, project: Project, currentLanguage?: CodeLanguage) {
    const rows: InlineKeyboardButton[][] = [
        CODE_LANGUAGES.map((language) =>
            Markup.button.callback(language.toUpperCase(), `code:${category}:${project.id}:${language}`),
        ),
    ];
    const downloads: InlineKeyboardButton[] = [];
    if (currentLanguage && project.code[currentLanguage]) {
        downloads.push(
            Markup.button.callback(
                `⬇️ Download ${currentLanguage.toUpperCase()}`,
                `dls:${category}:${project.id}:${currentLanguage}`,
            ),
        );
    }
    downloads.push(Markup.button.callback('🗜️ Download all (ZIP)', `zip:${category}:${project.id}`));
    rows.push(downloads);
    rows.push([Markup.button.callback('🔙 Back', `cat:${category}`)]);
    return Markup.inlineKeyboard(rows).reply_markup;
}

export function projectDetailReply(category: ProjectCategory, project: Project): BotReply {
    const boards = project.boards.join(', ');
    const parts = project.parts.join(', ');
    const text =
        `📌 <b>${escapeHtml(project.title)}</b>\n\n` +
        `${escapeHtml(project.description)}\n\n` +
        `⚡️ Boards: ${escapeHtml(boards) || '—'}\n` +
        `🧩 Parts: ${escapeHtml(parts) || '—'}`;
    return { text, keyboard: projectKeyboard(category, project) };
}

/** Undefined when the project has no code for the language. */
export function projectCodeReply(
    category: ProjectCategory,
    project: Project,
    language: CodeLanguage,
): ContentReply | undefined {
    const code = project.code[language];
    if (!code) {
        return undefined;
    }
    const keyboard = projectKeyboard(category, project, language);
    const text = `📌 <b>${escapeHtml(project.title)}</b> - ${language.toUpperCase()}\n\n${codeBlock(code)}`;
    if (text.length <= INLINE_CODE_LIMIT) {
        return { kind: 'inline', reply: { text, keyboard } };
    }
    return {
        kind: 'document',
        document: {
            content: Buffer.from(code, 'utf8'),
            filename: `${toFileStem(project.title)}_${language}.txt`,
            caption: `📌 ${project.title} - ${language.toUpperCase()}`,
            keyboard,
        },
    };
}

export function libDetailReply(lib: PythonLib): BotReply {
    const lines = [`🐍 <b>${escapeHtml(lib.name)}</b>`];
    if (lib.category) {
        lines.push(`Category: ${escapeHtml(lib.category)}`);
    }
    lines.push('', escapeHtml(lib.description));
    if (lib.example) {
        const example = codeBlock(lib.example);
        // Too long for one message: the example stays behind the download button
        if (lines.join('\n').length + example.length + 2 <= INLINE_CODE_LIMIT) {
            lines.push('', example);
        } else {
            lines.push('', 'The example is too long to show here. Use ⬇️ Example to download it.');
        }
    }
    const buttons: InlineKeyboardButton[] = [];
    if (lib.example) {
        buttons.push(Markup.button.callback('⬇️ Example', `dllib:example:${lib.name}`));
    }
    buttons.push(Markup.button.callback('⬇️ Library JSON', `dllib:json:${lib.name}`));
    buttons.push(Markup.button.callback('🔙 Back', 'cat:libs'));
    return {
        text: lines.join('\n'),
        keyboard: Markup.inlineKeyboard(buttons, { columns: 2 }).reply_markup,
    };
}

function projectFrom(
    catalog: CatalogService,
    category: string,
    id: string,
): { category: ProjectCategory; project: Project } | undefined {
    if (!isProjectCategory(category)) {
        return undefined;
    }
    const project = catalog.findProject(category, id);
    return project ? { category, project } : undefined;
}

async function showCatalogMenu(ctx: Context, edit: boolean) {
    if (edit) {
        await editOrReply(ctx, catalogMenuReply());
        return;
    }
    await sendReply(ctx, catalogMenuReply());
}

export function setupCatalogCommands(bot: Telegraf, catalog: CatalogService) {
    bot.command('projects', async (ctx) => {
        await showCatalogMenu(ctx, false);
    });

    bot.action('catalog', async (ctx) => {
        await showCatalogMenu(ctx, true);
        await ctx.answerCbQuery();
    });

    bot.action(/^cat:(robotics|iot|libs)$/, async (ctx) => {
        const category = ctx.match[1];
        if (isProjectCategory(category)) {
            await editOrReply(ctx, projectListReply(category, catalog.projects(category)));
        } else {
            await editOrReply(ctx, libListReply(catalog.libs()));
        }
        await ctx.answerCbQuery();
    });

    bot.action(/^proj:([a-z]+):(.+)$/, async (ctx) => {
        const found = projectFrom(catalog, ctx.match[1], ctx.match[2]);
        if (!found) {
            await ctx.answerCbQuery('❌ Project not found', { show_alert: true });
            return;
        }
        await editOrReply(ctx, projectDetailReply(found.category, found.project));
        await ctx.answerCbQuery();
    });

    bot.action(/^code:([a-z]+):(.+):([a-z]+)$/, async (ctx) => {
        const found = projectFrom(catalog, ctx.match[1], ctx.match[2]);
        if (!found) {
            await ctx.answerCbQuery('❌ Project not found', { show_alert: true });
            return;
        }
        const language = ctx.match[3];
        const content = isCodeLanguage(language) ? projectCodeReply(found.category, found.project, language) : undefined;
        if (!content) {
            await ctx.answerCbQuery('No code for this language yet', { show_alert: true });
            return;
        }
        await deliverContent(ctx, content, true);
        await ctx.answerCbQuery();
    });

    bot.action(/^dls:([a-z]+):(.+):([a-z]+)$/, async (ctx) => {
        const found = projectFrom(catalog, ctx.match[1], ctx.match[2]);
        if (!found) {
            await ctx.answerCbQuery('❌ Project not found', { show_alert: true });
            return;
        }
        const language = ctx.match[3];
        const code = isCodeLanguage(language) ? found.project.code[language] : undefined;
        if (!code) {
            await ctx.answerCbQuery('No code for this language yet', { show_alert: true });
            return;
        }
        await sendDocument(ctx, {
            content: Buffer.from(code, 'utf8'),
            filename: codeFileName(found.project.title, language),
            caption: `⬇️ ${found.project.title} — ${language.toUpperCase()}`,
        });
        await ctx.answerCbQuery();
    });

    bot.action(/^zip:([a-z]+):(.+)$/, async (ctx) => {
        const found = projectFrom(catalog, ctx.match[1], ctx.match[2]);
        if (!found) {
            await ctx.answerCbQuery('❌ Project not found', { show_alert: true });
            return;
        }
        const archive = await buildCodeArchive(found.project);
        if (!archive) {
            await ctx.answerCbQuery('This project has no code yet.', { show_alert: true });
            return;
        }
        await sendDocument(ctx, {
            content: archive,
            filename: archiveFileName(found.project.title),
            caption: '🗜️ All code (ZIP)',
        });
        await ctx.answerCbQuery();
    });

    bot.action(/^lib:(.+)$/, async (ctx) => {
        const lib = catalog.findLib(ctx.match[1]);
        if (!lib) {
            await ctx.answerCbQuery('❌ Library not found', { show_alert: true });
            return;
        }
        await editOrReply(ctx, libDetailReply(lib));
        await ctx.answerCbQuery();
    });

    bot.action(/^dllib:(example|json):(.+)$/, async (ctx) => {
        const lib = catalog.findLib(ctx.match[2]);
        if (!lib) {
            await ctx.answerCbQuery('❌ Library not found', { show_alert: true });
            return;
        }
        if (ctx.match[1] === 'example') {
            if (!lib.example) {
                await ctx.answerCbQuery('No example for this library', { show_alert: true });
                return;
            }
            await sendDocument(ctx, {
                content: Buffer.from(lib.example, 'utf8'),
                filename: `${toFileStem(lib.name, 'library')}_example.py`,
                caption: `⬇️ ${lib.name} example`,
            });
        } else {
            await sendDocument(ctx, {
                content: Buffer.from(JSON.stringify(lib, null, 2), 'utf8'),
                filename: `${toFileStem(lib.name, 'library')}.json`,
                caption: `⬇️ ${lib.name}`,
            });
        }
        await ctx.answerCbQuery();
    });
}
