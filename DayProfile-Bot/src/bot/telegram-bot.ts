import { Bot, GrammyError, InlineKeyboard, type Context } from 'grammy';
import type { Logger } from '@day-profile/shared/Utils/logger';
import type { SupervisedTask } from '../lifecycle.js';
import type { ReportSink } from '../scheduler/report-scheduler.js';
import { DispatchError } from '../utils/errors.js';
import type { CallbackRouter } from './callback-router.js';
import { COMMANDS, type CommandHandlers } from './commands.js';
import type { BotView, NavigationRow } from './view.js';

export interface TelegramTransportOptions {
  bot: Bot;
  commands: CommandHandlers;
  router: CallbackRouter;
  logger: Logger;
}

interface MessageOptions {
  parse_mode: 'Markdown';
  reply_markup?: InlineKeyboard;
}

export function toInlineKeyboard(rows: readonly NavigationRow[]): InlineKeyboard {
  const keyboard = new InlineKeyboard();
  rows.forEach((row, index) => {
    if (index > 0) keyboard.row();
    for (const button of row) {
      keyboard.text(button.text, button.data);
    }
  });
  return keyboard;
}

function messageOptions(view: BotView): MessageOptions {
  if (view.buttons.length === 0) {
    return { parse_mode: 'Markdown' };
  }
  return { parse_mode: 'Markdown', reply_markup: toInlineKeyboard(view.buttons) };
}

/** Commands read only the first word after the command; the rest is ignored. */
export function firstArgument(match: string): string | undefined {
  return match.trim().split(/\s+/)[0] || undefined;
}

/** Re-rendering an unchanged view is not a failure. */
function isNotModified(error: unknown): boolean {
  return error instanceof GrammyError && error.description.includes('message is not modified');
}

/**
 * grammy long-polling adapter. Commands reply with a new message, button
 * presses edit the message that carried them. Transport failures are
 * logged as DispatchError; the user gets nothing.
 */
export class TelegramTransport implements SupervisedTask, ReportSink {
  readonly name = 'telegram';
  private readonly bot: Bot;
  private readonly commands: CommandHandlers;
  private readonly router: CallbackRouter;
  private readonly logger: Logger;
  private polling: Promise<void> | null = null;

  constructor(options: TelegramTransportOptions) {
    this.bot = options.bot;
    this.commands = options.commands;
    this.router = options.router;
    this.logger = options.logger;
    this.register();
  }

  async start(): Promise<void> {
    if (this.polling) return;

    await this.bot.api.setMyCommands(
      COMMANDS.map(({ command, description }) => ({ command, description }))
    );

    await new Promise<void>((resolve, reject) => {
      let started = false;
      this.polling = this.bot
        .start({
          onStart: (info) => {
            started = true;
            this.logger.info(`Polling as @${info.username}`);
            resolve();
          },
        })
        .catch((error: unknown) => {
          if (!started) {
            this.polling = null;
            reject(error);
            return;
          }
          this.logger.error('Telegram polling stopped', { error });
        });
    });
  }

  async stop(): Promise<void> {
    if (!this.polling) return;
    await this.bot.stop();
    await this.polling;
    this.polling = null;
  }

  async sendReport(chatId: number, text: string): Promise<void> {
    try {
      await this.bot.api.sendMessage(chatId, text, { parse_mode: 'Markdown' });
    } catch (error) {
      throw new DispatchError('send', error);
    }
  }

  private register(): void {
    for (const { command } of COMMANDS) {
      this.bot.command(command, async (ctx) => {
        const view = this.commands.handle(command, firstArgument(ctx.match));
        await this.dispatch('reply', () => ctx.reply(view.text, messageOptions(view)));
      });
    }

    this.bot.on('callback_query:data', (ctx) => this.onCallback(ctx, ctx.callbackQuery.data));

    this.bot.catch((err) => {
      this.logger.error('Unhandled update error', { updateId: err.ctx.update.update_id, error: err.error });
    });
  }

  private async onCallback(ctx: Context, data: string): Promise<void> {
    const outcome = this.router.route(data);
    await this.dispatch('answer', () => ctx.answerCallbackQuery());
    if (outcome.kind === 'ignored') return;

    const { view } = outcome;
    await this.dispatch('edit', () => ctx.editMessageText(view.text, messageOptions(view)));
  }

  private async dispatch(operation: DispatchError['operation'], send: () => Promise<unknown>): Promise<void> {
    try {
      await send();
    } catch (error) {
      if (operation === 'edit' && isNotModified(error)) {
        this.logger.debug('Message already up to date');
        return;
      }
      this.logger.error('Telegram dispatch failed', { error: new DispatchError(operation, error) });
    }
  }
}
