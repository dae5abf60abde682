import TelegramBot from 'node-telegram-bot-api';
import type { ChannelPort, Checkpoint, InboundMessage, PushHandler } from '../../ports/ChannelPort.js';
import { createLogger } from '../../utils/logger.js';
import { ChannelError } from '../../utils/errors.js';

export interface TelegramChannelOptions {
  botToken: string;
  /** When set, Telegram pushes updates to this URL and the channel is never polled. */
  webhookUrl?: string;
}

function isUpdate(value: unknown): value is TelegramBot.Update {
  return typeof value === 'object' && value !== null && 'update_id' in value && typeof value.update_id === 'number';
}

/** Chat channel. Each update id doubles as the message's external id, so the checkpoint is also the getUpdates offset. */
export class TelegramChannelAdapter implements ChannelPort {
  readonly channel = 'chat' as const;
  readonly pollable: boolean;
  private readonly logger = createLogger({ adapter: 'TelegramChannelAdapter' });
  private readonly bot: TelegramBot;
  private pushHandlers: PushHandler[] = [];

  constructor(
    private readonly options: TelegramChannelOptions,
    bot?: TelegramBot
  ) {
    this.pollable = !options.webhookUrl;
    // The supervisor drives getUpdates itself, so the library's own polling stays off
    this.bot = bot ?? new TelegramBot(options.botToken, { polling: false });
  }

  async initialize(): Promise<void> {
    const logger = this.logger.child({ method: 'initialize' });
    try {
      const me = await this.bot.getMe();
      logger.info({ botId: me.id, botUsername: me.username, pollable: this.pollable }, 'Telegram bot verified');

      if (this.options.webhookUrl) {
        await this.bot.setWebHook(this.options.webhookUrl);
        logger.info({ webhookUrl: this.options.webhookUrl }, 'Webhook set');
      } else {
        // getUpdates is refused while a webhook is registered
        await this.bot.deleteWebHook();
      }
    } catch (error) {
      logger.error({ error }, 'Failed to initialize Telegram adapter');
      throw new ChannelError('chat', 'Failed to initialize Telegram adapter', { cause: error });
    }
  }

  async fetchNew(checkpoint: Checkpoint): Promise<InboundMessage[]> {
    const logger = this.logger.child({ method: 'fetchNew' });
    const last = checkpoint.lastExternalId === null ? Number.NaN : Number(checkpoint.lastExternalId);
    const offset = Number.isInteger(last) ? last + 1 : undefined;

    try {
      const updates = await this.bot.getUpdates({ offset, timeout: 0, allowed_updates: ['message'] });
      const messages = updates.flatMap((update) => {
        const message = this.parseUpdate(update);
        return message ? [message] : [];
      });
      logger.info({ updates: updates.length, messages: messages.length, offset }, 'Fetched chat updates');
      return messages;
    } catch (error) {
      logger.error({ error }, 'Failed to fetch chat updates');
      throw new ChannelError('chat', 'Failed to fetch chat updates', { cause: error });
    }
  }

  async sendReply(threadRef: string, text: string): Promise<void> {
    const logger = this.logger.child({ method: 'sendReply', chatId: threadRef });
    const chatId = Number.parseInt(threadRef, 10);
    if (Number.isNaN(chatId)) {
      throw new ChannelError('chat', `Invalid chat ID: ${threadRef}`, { status: 400 });
    }

    try {
      const sent = await this.bot.sendMessage(chatId, text);
      logger.info({ messageId: sent.message_id }, 'Reply sent');
    } catch (error) {
      logger.error({ error }, 'Failed to send reply');
      throw new ChannelError('chat', 'Failed to send reply', { cause: error });
    }
  }

  onPush(handler: PushHandler): void {
    this.pushHandlers.push(handler);
  }

  /** Entry point for the webhook route. Resolves once every push handler has run. */
  async handleWebhook(update: unknown): Promise<void> {
    const logger = this.logger.child({ method: 'handleWebhook' });
    if (!isUpdate(update)) {
      throw new ChannelError('chat', 'Webhook body is not a Telegram update', { status: 400 });
    }

    const message = this.parseUpdate(update);
    if (!message) {
      logger.debug({ updateId: update.update_id }, 'Update carries no text message');
      return;
    }

    logger.info({ externalId: message.externalId, sender: message.sender }, 'Processing pushed message');
    await Promise.all(this.pushHandlers.map((handler) => handler(message)));
  }

  parseUpdate(update: TelegramBot.Update): InboundMessage | null {
    const msg = update.message;
    const text = msg?.text ?? msg?.caption;
    if (!msg || !text?.trim()) {
      return null;
    }

    return {
      channel: this.channel,
      externalId: update.update_id.toString(),
      sender: msg.from?.username ?? msg.from?.first_name ?? msg.chat.id.toString(),
      body: text.trim(),
      receivedAt: new Date(msg.date * 1000), // Telegram uses Unix seconds
      threadRef: msg.chat.id.toString(),
    };
  }
}
