import type { Database } from 'better-sqlite3';
import type { Config } from './config/index.js';
import type { CredentialResolver } from './config/credentials.js';
import type { PromptName } from './utils/prompts.js';
import type { Channel, ChannelPort } from './ports/ChannelPort.js';
import type { TextGenerationPort } from './ports/TextGenerationPort.js';
import type { ImageGenerationPort } from './ports/ImageGenerationPort.js';
import type { SocialPostPort } from './ports/SocialPostPort.js';
import { ClaudeAdapter } from './adapters/llm/ClaudeAdapter.js';
import {
  DEEPSEEK_DEFAULTS,
  OPENROUTER_DEFAULTS,
  OpenAICompatibleTextAdapter,
} from './adapters/llm/OpenAICompatibleTextAdapter.js';
import { HuggingFaceImageAdapter } from './adapters/image/HuggingFaceImageAdapter.js';
import { TogetherImageAdapter } from './adapters/image/TogetherImageAdapter.js';
import { FacebookPageAdapter } from './adapters/facebook/FacebookPageAdapter.js';
import { FacebookCommentsChannelAdapter } from './adapters/facebook/FacebookCommentsChannelAdapter.js';
import { GmailChannelAdapter } from './adapters/email/GmailChannelAdapter.js';
import { TelegramChannelAdapter } from './adapters/telegram/TelegramChannelAdapter.js';
import { CommandRepository } from './persistence/repositories/CommandRepository.js';
import { ReplyLogRepository } from './persistence/repositories/ReplyLogRepository.js';
import { SocialPostRepository } from './persistence/repositories/SocialPostRepository.js';
import { DedupRepository } from './persistence/repositories/DedupRepository.js';
import { CheckpointRepository } from './persistence/repositories/CheckpointRepository.js';
import { ActivityLedger } from './core/ledger/ActivityLedger.js';
import { IntentClassifier } from './core/intent/IntentClassifier.js';
import { CapabilityRegistry } from './core/capabilities/CapabilityRegistry.js';
import { TextChain } from './core/capabilities/TextChain.js';
import {
  GeneralQueryCapability,
  ReplyCapability,
  TextContentCapability,
} from './core/capabilities/providers/TextCapability.js';
import { ImageCapability } from './core/capabilities/providers/ImageCapability.js';
import { SocialPostCapability } from './core/capabilities/providers/SocialPostCapability.js';
import { AutoReplyStatusCapability, SystemStatusCapability } from './core/capabilities/providers/LedgerCapabilities.js';
import {
  CannedReplyCapability,
  HelpCapability,
  VoiceTestCapability,
} from './core/capabilities/providers/AssistantCapabilities.js';
import { CommandExecutor } from './core/commands/CommandExecutor.js';
import { ReplyPipeline } from './core/inbox/ReplyPipeline.js';
import { InboxPoller } from './core/inbox/InboxPoller.js';
import { PollSupervisor } from './core/inbox/PollSupervisor.js';
import { createLogger } from './utils/logger.js';

const logger = createLogger({ component: 'assistant' });

export interface AssistantAdapters {
  /** In fallback order */
  textBackends: TextGenerationPort[];
  imageBackends: ImageGenerationPort[];
  publisher?: SocialPostPort;
  channels: ChannelPort[];
  telegram?: TelegramChannelAdapter;
}

export interface Assistant {
  config: Config;
  commands: CommandRepository;
  ledger: ActivityLedger;
  registry: CapabilityRegistry;
  executor: CommandExecutor;
  pipelines: Map<Channel, ReplyPipeline>;
  supervisor: PollSupervisor;
  telegram?: TelegramChannelAdapter;
}

/** Build one adapter per backend whose credentials resolve; the rest stay unregistered. */
export function buildAdapters(config: Config, credential: CredentialResolver): AssistantAdapters {
  const textBackends: TextGenerationPort[] = [];
  const anthropicKey = credential('ANTHROPIC_API_KEY');
  if (anthropicKey) {
    textBackends.push(new ClaudeAdapter({ apiKey: anthropicKey, model: config.llmTextModel }));
  }
  const openRouterKey = credential('OPENROUTER_API_KEY');
  if (openRouterKey) {
    textBackends.push(
      new OpenAICompatibleTextAdapter({
        ...OPENROUTER_DEFAULTS,
        apiKey: openRouterKey,
        model: config.openRouterModel ?? OPENROUTER_DEFAULTS.model,
      })
    );
  }
  const deepSeekKey = credential('DEEPSEEK_API_KEY');
  if (deepSeekKey) {
    textBackends.push(
      new OpenAICompatibleTextAdapter({
        ...DEEPSEEK_DEFAULTS,
        apiKey: deepSeekKey,
        model: config.deepSeekModel ?? DEEPSEEK_DEFAULTS.model,
      })
    );
  }

  const imageBackends: ImageGenerationPort[] = [];
  const huggingFaceKey = credential('HUGGINGFACE_API_KEY');
  if (huggingFaceKey) {
    imageBackends.push(
      new HuggingFaceImageAdapter({
        apiKey: huggingFaceKey,
        model: config.huggingFaceImageModel,
        outputDir: config.generatedImagesDir,
      })
    );
  }
  const togetherKey = credential('TOGETHER_API_KEY');
  if (togetherKey) {
    imageBackends.push(
      new TogetherImageAdapter({ apiKey: togetherKey, model: config.togetherImageModel, outputDir: config.generatedImagesDir })
    );
  }

  const channels: ChannelPort[] = [];
  let publisher: SocialPostPort | undefined;
  const pageId = credential('FACEBOOK_PAGE_ID');
  const pageToken = credential('FACEBOOK_ACCESS_TOKEN');
  if (pageId && pageToken) {
    publisher = new FacebookPageAdapter({ pageId, accessToken: pageToken });
    channels.push(new FacebookCommentsChannelAdapter({ pageId, accessToken: pageToken }));
  }

  const gmailClientId = credential('GMAIL_CLIENT_ID');
  const gmailClientSecret = credential('GMAIL_CLIENT_SECRET');
  const gmailRefreshToken = credential('GMAIL_REFRESH_TOKEN');
  if (gmailClientId && gmailClientSecret && gmailRefreshToken) {
    channels.push(
      new GmailChannelAdapter({
        clientId: gmailClientId,
        clientSecret: gmailClientSecret,
        refreshToken: gmailRefreshToken,
        userId: config.gmailUserId,
      })
    );
  }

  let telegram: TelegramChannelAdapter | undefined;
  const botToken = credential('TELEGRAM_BOT_TOKEN');
  if (botToken) {
    telegram = new TelegramChannelAdapter({ botToken, webhookUrl: config.telegramWebhookUrl });
    channels.push(telegram);
  }

  logger.info(
    {
      text: textBackends.map((backend) => backend.name),
      image: imageBackends.map((backend) => backend.name),
      publisher: publisher?.platform ?? null,
      channels: channels.map((channel) => channel.channel),
    },
    'Adapters configured'
  );
  return { textBackends, imageBackends, publisher, channels, telegram };
}

/**
 * Wire repositories, the capability registry, the command executor and one
 * reply pipeline per channel. Nothing is started here.
 */
export function createAssistant(
  config: Config,
  db: Database,
  prompts: Record<PromptName, string>,
  adapters: AssistantAdapters
): Assistant {
  const commands = new CommandRepository(db);
  const replyLogs = new ReplyLogRepository(db);
  const posts = new SocialPostRepository(db);
  const dedup = new DedupRepository(db, config.reservationLeaseMs);
  const checkpoints = new CheckpointRepository(db);
  const ledger = new ActivityLedger(commands, replyLogs, posts, config.timezone);

  const textChain = new TextChain(adapters.textBackends, config.providerTimeoutMs);
  const registry = new CapabilityRegistry({ timeoutMs: config.providerTimeoutMs });

  for (const backend of adapters.textBackends) {
    registry
      .register('general_query', new GeneralQueryCapability(backend))
      .register('text_generation', new TextContentCapability(backend, prompts['text_content.md']))
      .register('reply_generation', new ReplyCapability(backend, prompts['auto_reply.md']));
  }
  registry.register('reply_generation', new CannedReplyCapability());

  for (const backend of adapters.imageBackends) {
    registry.register('create_image', new ImageCapability(backend));
  }

  if (adapters.publisher && textChain.size > 0) {
    // One deadline covers writing, illustrating and publishing
    registry.register(
      'social_post',
      new SocialPostCapability(
        textChain,
        registry,
        adapters.publisher,
        posts,
        prompts['social_post.md'],
        config.providerTimeoutMs * 3
      )
    );
  }

  registry
    .register('system_status', new SystemStatusCapability(ledger))
    .register('auto_reply_status', new AutoReplyStatusCapability(ledger))
    .register('help', new HelpCapability())
    .register('voice_test', new VoiceTestCapability());

  const classifier = new IntentClassifier(textChain, prompts['classify_intent.md'], {
    timeoutMs: config.classifyTimeoutMs,
  });
  const executor = new CommandExecutor(classifier, registry, commands, { orphanTimeoutMs: config.orphanTimeoutMs });

  const supervisor = new PollSupervisor({ baseMs: config.pollBaseIntervalMs, maxMs: config.pollMaxIntervalMs });
  const pipelines = new Map<Channel, ReplyPipeline>();
  for (const port of adapters.channels) {
    const pipeline = new ReplyPipeline(
      port,
      { classifier, registry, dedup, replyLogs },
      { maxAttempts: config.replyMaxAttempts, sendTimeoutMs: config.providerTimeoutMs }
    );
    pipelines.set(port.channel, pipeline);

    if (port.onPush) {
      port.onPush(pipeline.pushHandler());
    }
    if (port.pollable) {
      supervisor.add(
        new InboxPoller(port, pipeline, checkpoints, {
          cycleDeadlineMs: config.cycleDeadlineMs,
          fetchTimeoutMs: config.providerTimeoutMs,
        })
      );
    }
  }

  return { config, commands, ledger, registry, executor, pipelines, supervisor, telegram: adapters.telegram };
}
