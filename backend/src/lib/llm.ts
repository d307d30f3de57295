import { Logger } from "./logger";

export interface GenerateOptions {
  temperature?: number;
  maxTokens?: number;
  topP?: number;
  system?: string;
}

export interface LanguageModel {
  generate(prompt: string, options?: GenerateOptions): Promise<string>;
}

type ChatMessageParam = { role: "system"; content: string } | { role: "user"; content: string };

interface ChatRequest {
  model: string;
  messages: ChatMessageParam[];
  temperature: number;
  max_tokens: number;
  top_p: number;
  stream: false;
}

/** Structural subset of the OpenAI client used for chat completions. */
export interface ChatCompletionsClient {
  chat: {
    completions: {
      create(body: ChatRequest): Promise<{ choices: Array<{ message: { content: string | null } }> }>;
    };
  };
}

export interface OpenAILanguageModelConfig {
  model: string;
  temperature: number;
  maxTokens: number;
  topP: number;
}

export class OpenAILanguageModel implements LanguageModel {
  constructor(
    private readonly client: ChatCompletionsClient,
    private readonly config: OpenAILanguageModelConfig,
    private readonly logger: Logger
  ) {}

  async generate(prompt: string, options: GenerateOptions = {}): Promise<string> {
    const messages: ChatMessageParam[] = [];
    if (options.system) {
      messages.push({ role: "system", content: options.system });
    }
    messages.push({ role: "user", content: prompt });

    const started = Date.now();
    const response = await this.client.chat.completions.create({
      model: this.config.model,
      messages,
      temperature: options.temperature ?? this.config.temperature,
      max_tokens: options.maxTokens ?? this.config.maxTokens,
      top_p: options.topP ?? this.config.topP,
      stream: false
    });
    const text = response.choices[0]?.message.content?.trim() ?? "";
    this.logger.debug("llm_completed", { model: this.config.model, duration_ms: Date.now() - started, chars: text.length });
    if (!text) {
      throw new Error("Language model returned an empty response");
    }
    return text;
  }
}

/** Model used when no API key is configured; every call fails so callers take their defaults. */
export class UnavailableLanguageModel implements LanguageModel {
  async generate(): Promise<string> {
    throw new Error("Language model is not configured");
  }
}

const FENCED_BLOCK = /```(?:json)?\s*([\s\S]*?)\s*```/;

/** Fenced block first, then the whole text; null when neither parses. */
export function parseModelJson(text: string): unknown {
  const fenced = FENCED_BLOCK.exec(text)?.[1];
  const candidates = fenced !== undefined ? [fenced, text] : [text];
  for (const candidate of candidates) {
    try {
      return JSON.parse(candidate.trim());
    } catch {
      continue;
    }
  }
  return null;
}
