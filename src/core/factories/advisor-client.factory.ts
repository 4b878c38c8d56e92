import { AdvisorClient, AdvisorClientFactory, AdvisorClientOptions } from '../interfaces';
import { AdvisorIdentity, PROVIDER_KINDS, ProviderKind } from '../../types';
import { ClaudeAdvisorAdapter } from '../../infrastructure/adapters/ClaudeAdvisorAdapter';
import { GeminiAdvisorAdapter } from '../../infrastructure/adapters/GeminiAdvisorAdapter';
import { OpenAIAdvisorAdapter } from '../../infrastructure/adapters/OpenAIAdvisorAdapter';

export const createAdvisorClient: AdvisorClientFactory = (
  identity: AdvisorIdentity,
  credential: string,
  options: AdvisorClientOptions = {}
): AdvisorClient => {
  const provider: ProviderKind = identity.provider;

  switch (provider) {
    case 'claude':
      return new ClaudeAdvisorAdapter(identity, credential, options);
    case 'openai':
    case 'grok':
      return new OpenAIAdvisorAdapter(identity, credential, options);
    case 'gemini':
      return new GeminiAdvisorAdapter(identity, credential, options);
    default: {
      const unsupported: never = provider;
      throw new Error(`Unknown advisor provider: ${String(unsupported)}`);
    }
  }
};

export function getSupportedProviders(): readonly ProviderKind[] {
  return PROVIDER_KINDS;
}
