import { describe, it, expect, vi } from 'vitest';
import { IntentClassifier, matchPattern } from '../../core/intent/IntentClassifier.js';
import type { TextGenerationPort } from '../../ports/TextGenerationPort.js';
import { ProviderError } from '../../utils/errors.js';

function backend(generate: TextGenerationPort['generate']): TextGenerationPort {
  return { name: 'fake', generate: vi.fn(generate) };
}

const TEMPLATE = 'Classify: {{COMMAND}}';

describe('IntentClassifier', () => {
  describe('pattern fast path', () => {
    it.each([
      ['status', 'system_status'],
      ['System status?', 'system_status'],
      ['How are you', 'system_status'],
      ['are you working', 'system_status'],
      ['Voice test', 'voice_test'],
      ['test voice', 'voice_test'],
      ['Can you hear me?', 'voice_test'],
      ['help', 'help'],
      ['What can you do?', 'help'],
      ['auto-reply status', 'auto_reply_status'],
      ['any replies', 'auto_reply_status'],
    ])('matches %j as %s', (text, intent) => {
      expect(matchPattern(text)).toBe(intent);
    });

    it('returns null for free-form requests', () => {
      expect(matchPattern('write a poem about the sea')).toBeNull();
      expect(matchPattern('what is the status of my order with the bakery')).toBeNull();
    });

    it('does not call the model for a pattern hit', async () => {
      const generator = backend(async () => '{}');
      const classifier = new IntentClassifier(generator, TEMPLATE, { timeoutMs: 1000 });

      const result = await classifier.classify('  status  ');

      expect(result).toEqual({ intent: 'system_status', parameters: {}, source: 'pattern' });
      expect(generator.generate).not.toHaveBeenCalled();
    });
  });

  describe('model path', () => {
    it('fills the prompt template and accepts a valid guess', async () => {
      const generator = backend(async () =>
        'Sure! {"intent": "create_image", "parameters": {"prompt": "a red fox in snow"}}'
      );
      const classifier = new IntentClassifier(generator, TEMPLATE, { timeoutMs: 1000 });

      const result = await classifier.classify('draw me a red fox in snow');

      expect(result).toEqual({
        intent: 'create_image',
        parameters: { prompt: 'a red fox in snow' },
        source: 'model',
      });
      expect(generator.generate).toHaveBeenCalledWith('Classify: draw me a red fox in snow', {
        maxTokens: 200,
        temperature: 0,
      });
    });

    it('applies parameter defaults the model left out', async () => {
      const generator = backend(async () => '{"intent": "social_post", "parameters": {"includeImage": true}}');
      const classifier = new IntentClassifier(generator, TEMPLATE, { timeoutMs: 1000 });

      const result = await classifier.classify('post about our summer sale with a picture');

      expect(result.parameters).toEqual({
        topic: 'post about our summer sale with a picture',
        includeImage: 'true',
      });
    });

    it('defaults text generation parameters', async () => {
      const generator = backend(async () => '{"intent": "text_generation"}');
      const classifier = new IntentClassifier(generator, TEMPLATE, { timeoutMs: 1000 });

      const result = await classifier.classify('write something about gardening');

      expect(result.parameters).toEqual({
        contentType: 'social_post',
        topic: 'write something about gardening',
        language: 'english',
      });
    });
  });

  describe('fallback', () => {
    const fallback = (text: string) => ({ intent: 'general_query', parameters: { query: text }, source: 'fallback' });

    it('falls back on malformed output', async () => {
      const classifier = new IntentClassifier(backend(async () => 'no json here'), TEMPLATE, { timeoutMs: 1000 });
      expect(await classifier.classify('tell me a joke')).toEqual(fallback('tell me a joke'));
    });

    it('falls back on an intent outside the command set', async () => {
      const classifier = new IntentClassifier(
        backend(async () => '{"intent": "reply_generation"}'),
        TEMPLATE,
        { timeoutMs: 1000 }
      );
      expect(await classifier.classify('reply to everyone')).toEqual(fallback('reply to everyone'));
    });

    it('falls back when the provider rejects', async () => {
      const classifier = new IntentClassifier(
        backend(async () => {
          throw new ProviderError('server', 'fake', 'HTTP 500');
        }),
        TEMPLATE,
        { timeoutMs: 1000 }
      );
      expect(await classifier.classify('what time is it in Lisbon')).toEqual(fallback('what time is it in Lisbon'));
    });

    it('falls back when the provider is slower than the timeout', async () => {
      vi.useFakeTimers();
      try {
        const classifier = new IntentClassifier(
          backend(() => new Promise<string>(() => undefined)),
          TEMPLATE,
          { timeoutMs: 50 }
        );
        const pending = classifier.classify('summarise the news');
        await vi.advanceTimersByTimeAsync(50);
        expect(await pending).toEqual(fallback('summarise the news'));
      } finally {
        vi.useRealTimers();
      }
    });
  });

  it('maps inbound messages to reply generation without a model call', () => {
    const generator = backend(async () => '{}');
    const classifier = new IntentClassifier(generator, TEMPLATE, { timeoutMs: 1000 });

    const result = classifier.forInboundMessage({
      channel: 'email',
      externalId: 'msg-1',
      sender: 'ada@example.com',
      body: 'Are you open on Sunday?',
      receivedAt: new Date(0),
      threadRef: 'msg-1',
    });

    expect(result).toEqual({
      intent: 'reply_generation',
      parameters: { body: 'Are you open on Sunday?', sender: 'ada@example.com', channel: 'email' },
      source: 'pattern',
    });
    expect(generator.generate).not.toHaveBeenCalled();
  });
});
