import { BridgeError } from "../errors.js";
import { ChatGptAdapter } from "./chatgpt.js";
import { DeepSeekAdapter } from "./deepseek.js";
import { DuckDuckGoAdapter } from "./duckduckgo.js";
import { QwenAdapter } from "./qwen.js";
import { PROVIDER_IDS, type ProviderAdapter, type ProviderId, type ProviderOptions } from "./types.js";

export type { AdapterSpec, ProviderAdapter, ProviderId, ProviderOptions } from "./types.js";

const PROVIDER_FACTORIES: Record<ProviderId, (options: ProviderOptions) => ProviderAdapter> = {
  chatgpt: () => new ChatGptAdapter(),
  deepseek: () => new DeepSeekAdapter(),
  qwen: () => new QwenAdapter(),
  duckduckgo: (options) => new DuckDuckGoAdapter(options),
};

export function isProviderId(value: string): value is ProviderId {
  return PROVIDER_IDS.some((id) => id === value);
}

export function createProviderAdapter(id: string, options: ProviderOptions): ProviderAdapter {
  const normalized = id.trim().toLowerCase();
  if (!isProviderId(normalized)) {
    throw new BridgeError("unsupported_provider", `Unsupported provider: ${id}`, {
      supported: [...PROVIDER_IDS],
    });
  }
  return PROVIDER_FACTORIES[normalized](options);
}
