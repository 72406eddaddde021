import { ConfigError, type Config, type LlmConfig } from '@taskplanner/shared';
import { FakeAdapter, OllamaAdapter, type ProviderAdapter } from '@taskplanner/adapters';

/**
 * Factory function type for creating provider adapters.
 */
export type AdapterFactory = (config: LlmConfig) => ProviderAdapter;

/**
 * Maps `llm.provider` values onto adapter factories.
 *
 * @example
 * ```typescript
 * const registry = new ProviderRegistry(config);
 * registry.registerFactory('ollama', (cfg) => new OllamaAdapter(cfg));
 * const adapter = registry.getAdapter();
 * ```
 */
export class ProviderRegistry {
  private factories = new Map<string, AdapterFactory>();
  private adapter: ProviderAdapter | undefined;

  constructor(private config: Config) {}

  registerFactory(type: string, factory: AdapterFactory): void {
    this.factories.set(type, factory);
  }

  /**
   * Adapter for the configured provider, created on first use.
   * @throws {ConfigError} when no factory is registered for `llm.provider`
   */
  getAdapter(): ProviderAdapter {
    if (this.adapter) {
      return this.adapter;
    }

    const type = this.config.llm.provider;
    const factory = this.factories.get(type);
    if (!factory) {
      throw new ConfigError(`No adapter registered for LLM provider "${type}"`);
    }

    this.adapter = factory(this.config.llm);
    return this.adapter;
  }
}

/** Registry with the built-in `ollama` and `fake` providers. */
export function createDefaultRegistry(config: Config): ProviderRegistry {
  const registry = new ProviderRegistry(config);
  registry.registerFactory(
    'ollama',
    (cfg) =>
      new OllamaAdapter({
        baseUrl: cfg.baseUrl,
        model: cfg.model,
        temperature: cfg.temperature,
        topP: cfg.topP,
        probeTimeoutMs: cfg.probeTimeoutMs,
      }),
  );
  // Offline stand-in: reports itself unavailable, so plans are rule-based.
  registry.registerFactory('fake', () => new FakeAdapter({ available: false }));
  return registry;
}
