import { createRequire } from 'node:module';
import { join } from 'node:path';
import { type LanguageModel, generateText } from 'ai';
import type { LlmConfig } from '../parser/config-schema.ts';
import { ActionError, ActionErrorKind } from './errors.ts';

export type { LanguageModel } from 'ai';

export interface LlmRequest {
  prompt: string;
  system?: string;
  model?: string;
  temperature?: number;
  maxTokens?: number;
  signal?: AbortSignal;
}

export interface LlmResponse {
  text: string;
  model: string;
}

/**
 * Boundary between the llm/* actions and a model provider
 */
export interface LlmClient {
  complete(request: LlmRequest): Promise<LlmResponse>;
}

/**
 * A provider instance in the AI SDK is a function from model id to model, sometimes with
 * a `languageModel` method as well.
 */
export interface ProviderInstance {
  (modelId: string): LanguageModel;
  languageModel?: (modelId: string) => LanguageModel;
}

export type ProviderFactory = (options: Record<string, unknown>) => ProviderInstance;

function isProviderFactory(value: unknown): value is ProviderFactory {
  return typeof value === 'function';
}

const userRequire = createRequire(join(process.cwd(), 'package.json'));

/**
 * Loads AI SDK provider packages named in config (e.g. `@ai-sdk/openai`) on first use
 */
export class DynamicProviderRegistry {
  private static loaded = new Map<string, ProviderFactory>();

  static async getFactory(packageName: string, factoryName?: string): Promise<ProviderFactory> {
    const cacheKey = `${packageName}#${factoryName ?? ''}`;
    const cached = DynamicProviderRegistry.loaded.get(cacheKey);
    if (cached) return cached;

    let module: Record<string, unknown>;
    try {
      module = await import(packageName);
    } catch {
      try {
        module = await import(userRequire.resolve(packageName));
      } catch (error) {
        throw new Error(
          `Failed to load provider package '${packageName}': ${error instanceof Error ? error.message : String(error)}. Install it with 'npm install ${packageName}'.`
        );
      }
    }

    const factory = DynamicProviderRegistry.findFactory(module, packageName, factoryName);
    DynamicProviderRegistry.loaded.set(cacheKey, factory);
    return factory;
  }

  private static findFactory(
    module: Record<string, unknown>,
    packageName: string,
    factoryName?: string
  ): ProviderFactory {
    if (factoryName) {
      const named = module[factoryName];
      if (isProviderFactory(named)) return named;
      throw new Error(`Package '${packageName}' has no factory named '${factoryName}'`);
    }

    // `@ai-sdk/openai` exports `createOpenAI`, `@ai-sdk/anthropic` exports `createAnthropic`
    const base = packageName.split('/').pop()?.replace(/[-_]/g, '').toLowerCase() ?? '';
    for (const [key, value] of Object.entries(module)) {
      if (key.toLowerCase() === `create${base}` && isProviderFactory(value)) return value;
    }
    for (const [key, value] of Object.entries(module)) {
      if (key.startsWith('create') && isProviderFactory(value)) return value;
    }
    if (isProviderFactory(module.default)) return module.default;

    throw new Error(
      `Could not find a provider factory in package '${packageName}'. Available keys: ${Object.keys(module).join(', ')}`
    );
  }

  static reset(): void {
    DynamicProviderRegistry.loaded.clear();
  }
}

/**
 * LlmClient backed by the AI SDK's `generateText`
 */
export class AiSdkLlmClient implements LlmClient {
  private provider: ProviderInstance | null = null;

  constructor(private readonly config: LlmConfig) {}

  private async getModel(modelId: string): Promise<LanguageModel> {
    if (!this.provider) {
      if (!this.config.provider) {
        throw new ActionError(
          'No LLM provider configured. Set llm.provider in .runbook/config.yaml',
          ActionErrorKind.LLM
        );
      }
      const factory = await DynamicProviderRegistry.getFactory(
        this.config.provider,
        this.config.factory
      );
      const options: Record<string, unknown> = {};
      if (this.config.base_url) options.baseURL = this.config.base_url;
      if (this.config.api_key_env) {
        const apiKey = process.env[this.config.api_key_env];
        if (apiKey) options.apiKey = apiKey;
      }
      this.provider = factory(options);
    }
    return this.provider.languageModel
      ? this.provider.languageModel(modelId)
      : this.provider(modelId);
  }

  async complete(request: LlmRequest): Promise<LlmResponse> {
    const modelId = request.model ?? this.config.default_model;
    if (!modelId) {
      throw new ActionError('No model given and llm.default_model is not set', ActionErrorKind.LLM);
    }
    const model = await this.getModel(modelId);
    try {
      const result = await generateText({
        model,
        prompt: request.prompt,
        ...(request.system !== undefined ? { system: request.system } : {}),
        ...(request.temperature !== undefined ? { temperature: request.temperature } : {}),
        ...(request.maxTokens !== undefined ? { maxTokens: request.maxTokens } : {}),
        ...(request.signal ? { abortSignal: request.signal } : {}),
      });
      return { text: result.text, model: result.response.modelId || modelId };
    } catch (error) {
      throw new ActionError(
        `LLM request failed: ${error instanceof Error ? error.message : String(error)}`,
        ActionErrorKind.LLM
      );
    }
  }
}
