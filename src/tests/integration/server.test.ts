import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import request from 'supertest';
import type express from 'express';
import TelegramBot from 'node-telegram-bot-api';
import { openDatabase } from '../../persistence/database.js';
import { parseConfig } from '../../config/index.js';
import { createAssistant, type Assistant } from '../../assistant.js';
import { createApp } from '../../server.js';
import { TelegramChannelAdapter } from '../../adapters/telegram/TelegramChannelAdapter.js';
import type { TextGenerationPort } from '../../ports/TextGenerationPort.js';
import type { PromptName } from '../../utils/prompts.js';
import { FakeChannel, inbound } from '../support/FakeChannel.js';

const PROMPTS: Record<PromptName, string> = {
  'classify_intent.md': 'Classify: {{COMMAND}}',
  'auto_reply.md': 'Reply to {{SENDER}} on {{CHANNEL}}: {{BODY}}',
  'social_post.md': 'Post about {{TOPIC}}',
  'text_content.md': 'Write a {{CONTENT_TYPE}} about {{TOPIC}} in {{LANGUAGE}}',
};

// Classification runs at temperature 0, replies at 300 tokens, answers otherwise
const claude: TextGenerationPort = {
  name: 'claude',
  generate: async (_prompt, constraints) => {
    if (constraints?.temperature === 0) {
      return '{"intent": "general_query", "parameters": {"query": "What is the capital of France?"}}';
    }
    if (constraints?.maxTokens === 300) {
      return 'Thanks, got it.';
    }
    return 'Paris.';
  },
};

function telegramUpdate(updateId: number, text: string): TelegramBot.Update {
  return {
    update_id: updateId,
    message: {
      message_id: updateId,
      date: 1_700_000_000,
      chat: { id: 42, type: 'private' },
      from: { id: 9, is_bot: false, first_name: 'Ada' },
      text,
    },
  };
}

describe('HTTP API', () => {
  let assistant: Assistant;
  let app: express.Express;
  let email: FakeChannel;
  let bot: TelegramBot;

  beforeEach(() => {
    email = new FakeChannel('email');
    bot = new TelegramBot('test-token', { polling: false });
    const telegram = new TelegramChannelAdapter(
      { botToken: 'test-token', webhookUrl: 'https://assistant.example.com/webhook/telegram' },
      bot
    );

    assistant = createAssistant(parseConfig({}), openDatabase(':memory:'), PROMPTS, {
      textBackends: [claude],
      imageBackends: [],
      channels: [email, telegram],
      telegram,
    });
    app = createApp(assistant);
  });

  describe('POST /api/command', () => {
    it('runs the command and returns its outcome', async () => {
      const response = await request(app).post('/api/command').send({ command: 'What is the capital of France?' });

      expect(response.status).toBe(200);
      expect(response.body).toEqual({
        success: true,
        message: 'Paris.',
        intent: 'general_query',
        status: 'completed',
        commandId: 1,
      });
      expect(assistant.commands.get(1)?.status).toBe('completed');
    });

    it('answers fixed phrases without the model', async () => {
      const response = await request(app).post('/api/command').send({ command: 'help' });

      expect(response.status).toBe(200);
      expect(response.body.intent).toBe('help');
      expect(response.body.message).toMatch(/^Here is what I can do:/);
    });

    it('rejects a blank command without creating a record', async () => {
      const response = await request(app).post('/api/command').send({ command: '   ' });

      expect(response.status).toBe(400);
      expect(response.body).toEqual({ success: false, error: 'command must not be empty' });
      expect(assistant.ledger.commandHistory(1, 20).pagination.total).toBe(0);
    });

    it('rejects malformed JSON', async () => {
      const response = await request(app)
        .post('/api/command')
        .set('Content-Type', 'application/json')
        .send('{"command":');

      expect(response.status).toBe(400);
      expect(response.body.success).toBe(false);
    });
  });

  it('reports today\'s activity on GET /api/status', async () => {
    await request(app).post('/api/command').send({ command: 'status' });

    const response = await request(app).get('/api/status');

    expect(response.status).toBe(200);
    expect(response.body).toMatchObject({ commands_today: 1, replies_today: 0, failed_replies_today: 0, posts_today: 0 });
    expect(response.body.recent_commands).toHaveLength(1);
    expect(response.body.recent_commands[0]).toMatchObject({ command_text: 'status', intent: 'system_status', status: 'completed' });
  });

  it('pages command history on GET /api/commands', async () => {
    await request(app).post('/api/command').send({ command: 'help' });
    await request(app).post('/api/command').send({ command: 'status' });

    const response = await request(app).get('/api/commands').query({ page: 2, per_page: 1 });

    expect(response.status).toBe(200);
    expect(response.body.pagination).toEqual({ page: 2, pages: 2, per_page: 1, total: 2 });
    expect(response.body.commands).toHaveLength(1);
    expect(response.body.commands[0].command_text).toBe('help');

    const tooMany = await request(app).get('/api/commands').query({ per_page: 500 });
    expect(tooMany.status).toBe(400);
  });

  it('lists providers and polled channels on GET /api/providers', async () => {
    const response = await request(app).get('/api/providers');

    expect(response.status).toBe(200);
    expect(response.body).toEqual({
      providers: {
        general_query: ['claude'],
        text_generation: ['claude'],
        reply_generation: ['claude', 'canned-reply'],
        system_status: ['activity-ledger'],
        auto_reply_status: ['activity-ledger'],
        help: ['built-in'],
        voice_test: ['built-in'],
      },
      channels: [{ channel: 'email', interval_ms: 300_000 }],
    });
  });

  it('runs a poll cycle on POST /api/auto-reply/run', async () => {
    email.inbox = [inbound('email', 'm1', 1_700_000_000_000, 'Are you open on Sunday?')];

    const response = await request(app).post('/api/auto-reply/run');

    expect(response.status).toBe(200);
    expect(response.body.success).toBe(true);
    expect(response.body.outcomes).toHaveLength(1);
    expect(response.body.outcomes[0]).toMatchObject({ channel: 'email', status: 'success', fetched: 1, sent: 1 });
    expect(email.sent).toEqual([{ threadRef: 'thread-m1', text: 'Thanks, got it.' }]);
  });

  it('answers GET /health', async () => {
    const response = await request(app).get('/health');

    expect(response.status).toBe(200);
    expect(response.body.status).toBe('ok');
  });

  describe('POST /webhook/telegram', () => {
    it('replies to a pushed chat message', async () => {
      const sendMessage = vi
        .spyOn(bot, 'sendMessage')
        .mockResolvedValue({ message_id: 500, date: 1_700_000_001, chat: { id: 42, type: 'private' } });

      const response = await request(app).post('/webhook/telegram').send(telegramUpdate(100, 'hello there'));

      expect(response.status).toBe(200);
      expect(response.body).toEqual({ ok: true });
      expect(sendMessage).toHaveBeenCalledWith(42, 'Thanks, got it.');
      expect(assistant.ledger.recentReplies(1)[0]).toMatchObject({
        channel: 'chat',
        externalId: '100',
        sender: 'Ada',
        sendStatus: 'sent',
      });
    });

    it('ignores a redelivered update that was already answered', async () => {
      const sendMessage = vi
        .spyOn(bot, 'sendMessage')
        .mockResolvedValue({ message_id: 500, date: 1_700_000_001, chat: { id: 42, type: 'private' } });

      await request(app).post('/webhook/telegram').send(telegramUpdate(100, 'hello there'));
      const again = await request(app).post('/webhook/telegram').send(telegramUpdate(100, 'hello there'));

      expect(again.status).toBe(200);
      expect(sendMessage).toHaveBeenCalledTimes(1);
    });

    it('returns 500 when the reply could not be sent, so the update is redelivered', async () => {
      vi.spyOn(bot, 'sendMessage').mockRejectedValue(new Error('socket hang up'));

      const response = await request(app).post('/webhook/telegram').send(telegramUpdate(101, 'hello there'));

      expect(response.status).toBe(500);
      expect(response.body).toEqual({ ok: false, error: 'Internal server error' });
    });

    it('rejects a body that is not an update', async () => {
      const response = await request(app).post('/webhook/telegram').send({ hello: 'world' });

      expect(response.status).toBe(400);
      expect(response.body).toEqual({ ok: false, error: 'Webhook body is not a Telegram update' });
    });
  });
});

describe('generated images', () => {
  let imagesDir: string;
  let app: express.Express;

  beforeEach(() => {
    imagesDir = mkdtempSync(join(tmpdir(), 'assistant-served-'));
    const painter: TextGenerationPort = {
      name: 'claude',
      generate: async () => '{"intent": "create_image", "parameters": {"prompt": "a lighthouse"}}',
    };
    const together = {
      name: 'together',
      generate: async () => {
        const filePath = join(imagesDir, 'together-1-abcdef12.png');
        writeFileSync(filePath, Uint8Array.from([137, 80, 78, 71]));
        return filePath;
      },
    };
    const assistant = createAssistant(
      parseConfig({ generatedImagesDir: imagesDir }),
      openDatabase(':memory:'),
      PROMPTS,
      { textBackends: [painter], imageBackends: [together], channels: [] }
    );
    app = createApp(assistant);
  });

  afterEach(() => {
    rmSync(imagesDir, { recursive: true, force: true });
  });

  it('returns a download URL for a created image and serves the file there', async () => {
    const created = await request(app).post('/api/command').send({ command: 'draw a lighthouse' });

    expect(created.status).toBe(200);
    expect(created.body.data).toEqual({
      imageReference: join(imagesDir, 'together-1-abcdef12.png'),
      prompt: 'a lighthouse',
      imageUrl: '/api/images/together-1-abcdef12.png',
    });

    const image = await request(app).get('/api/images/together-1-abcdef12.png');

    expect(image.status).toBe(200);
    expect(image.headers['content-type']).toBe('image/png');
    expect([...image.body]).toEqual([137, 80, 78, 71]);
  });

  it('answers 404 for an image that does not exist', async () => {
    const response = await request(app).get('/api/images/missing.png');

    expect(response.status).toBe(404);
    expect(response.body).toEqual({ success: false, error: 'Image not found' });
  });

  it('refuses names that leave the images directory', async () => {
    const parent = await request(app).get('/api/images/..%2Fsecrets.txt');
    const hidden = await request(app).get('/api/images/.env');

    expect(parent.status).toBe(400);
    expect(parent.body).toEqual({ success: false, error: 'Invalid image name' });
    expect(hidden.status).toBe(400);
  });

  it('lists the content types text generation accepts', async () => {
    const response = await request(app).get('/api/content-types');

    expect(response.status).toBe(200);
    expect(response.body.content_types.map((entry: { type: string }) => entry.type)).toEqual([
      'blog_article',
      'creative_story',
      'review',
      'tutorial',
      'product_description',
      'news_article',
      'email_reply',
      'social_post',
    ]);
    expect(response.body.content_types[7]).toEqual({
      type: 'social_post',
      name: 'Social Post',
      description: 'A short, engaging post for social media',
    });
  });
});
