/**
 * Answer Generator
 *
 * Turns a question, its packed forum context and any attached images into
 * an answer through one chat completion.
 */

import type OpenAI from 'openai';
import type { LLMConfig } from '../config/schema.js';
import { toError, withTimeout, silentLogger, type Logger } from '../utils/index.js';
import { buildSystemMessage, SYSTEM_PROMPT } from './prompts.js';
import { GenerationError, type PackedContext } from './types.js';

type ChatMessage = OpenAI.Chat.Completions.ChatCompletionMessageParam;
type ContentPart = OpenAI.Chat.Completions.ChatCompletionContentPart;

// ============================================================================
// CLIENT INTERFACE
// ============================================================================

/**
 * The slice of `client.chat.completions` the generator needs.
 * The real OpenAI client satisfies it; tests pass a vi.fn() fake.
 */
export interface ChatCompletionsAPI {
  create(
    body: OpenAI.Chat.Completions.ChatCompletionCreateParamsNonStreaming,
    options?: { timeout?: number; signal?: AbortSignal }
  ): Promise<{ choices: Array<{ message: { content: string | null } }> }>;
}

export type GeneratorSettings = Pick<
  LLMConfig,
  'text_model' | 'vision_model' | 'temperature' | 'max_completion_tokens' | 'timeout_ms'
>;

export interface AnswerGeneratorOptions {
  systemPrompt?: string;
  logger?: Logger;
}

// ============================================================================
// IMAGES
// ============================================================================

const DATA_URL_PREFIX = /^data:image\/[\w.+-]+;base64,/i;

/**
 * Strip a `data:image/...;base64,` prefix, leaving the bare base64 payload.
 */
export function stripDataUrlPrefix(image: string): string {
  return image.trim().replace(DATA_URL_PREFIX, '');
}

/**
 * Normalize attached images: strip prefixes and drop empty entries.
 */
export function normalizeImages(images: readonly string[] | undefined): string[] {
  return (images ?? []).map(stripDataUrlPrefix).filter((image) => image.length > 0);
}

// ============================================================================
// GENERATOR
// ============================================================================

export class AnswerGenerator {
  private readonly completions: ChatCompletionsAPI;
  private readonly settings: GeneratorSettings;
  private readonly systemPrompt: string;
  private readonly logger: Logger;

  constructor(completions: ChatCompletionsAPI, settings: GeneratorSettings, options: AnswerGeneratorOptions = {}) {
    this.completions = completions;
    this.settings = settings;
    this.systemPrompt = options.systemPrompt ?? SYSTEM_PROMPT;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Vision model when any image is attached, text model otherwise.
   */
  selectModel(images?: readonly string[]): string {
    return normalizeImages(images).length > 0 ? this.settings.vision_model : this.settings.text_model;
  }

  /**
   * System message with the packed context, then a user message with the
   * question and one image part per attached image.
   */
  buildMessages(question: string, packed: PackedContext, images?: readonly string[]): ChatMessage[] {
    const userContent: ContentPart[] = [{ type: 'text', text: question }];
    for (const image of normalizeImages(images)) {
      userContent.push({
        type: 'image_url',
        image_url: { url: `data:image/jpeg;base64,${image}`, detail: 'auto' },
      });
    }

    return [
      { role: 'system', content: buildSystemMessage(packed.contextText, this.systemPrompt) },
      { role: 'user', content: userContent },
    ];
  }

  /**
   * Generate an answer.
   *
   * @throws GenerationError on transport or model failure, timeout, or an
   *   empty completion
   */
  async generate(question: string, packed: PackedContext, images?: readonly string[]): Promise<string> {
    const model = this.selectModel(images);
    const timeoutMs = this.settings.timeout_ms;
    const controller = new AbortController();

    let content: string | null | undefined;
    try {
      const response = await withTimeout(
        this.completions.create(
          {
            model,
            messages: this.buildMessages(question, packed, images),
            temperature: this.settings.temperature,
            max_tokens: this.settings.max_completion_tokens,
          },
          { timeout: timeoutMs, signal: controller.signal }
        ),
        timeoutMs,
        () => {
          controller.abort();
          return new GenerationError(`Chat completion timed out after ${timeoutMs}ms`);
        }
      );
      content = response.choices[0]?.message.content;
    } catch (error) {
      if (error instanceof GenerationError) throw error;
      const cause = toError(error);
      throw new GenerationError(`Chat completion failed (${model}): ${cause.message}`, cause);
    }

    const answer = content?.trim() ?? '';
    if (answer.length === 0) {
      throw new GenerationError(`Chat completion from ${model} returned no content`);
    }

    this.logger.debug?.(`Generated ${answer.length} characters with ${model}`);
    return answer;
  }
}
