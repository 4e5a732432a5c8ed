import type { CredentialProvider, ModelClient, ModelProfile } from '../model-interface'
import { ClaudeClient } from './claude-client'
import { OpenAICompatibleClient } from './openai-compatible-client'

/** Pick the client implementation for a profile's declared backend. */
export function createModelClient(profile: ModelProfile, credentials: CredentialProvider): ModelClient {
  switch (profile.backend) {
    case 'anthropic':
      return new ClaudeClient(profile, credentials)
    case 'openai-compatible':
      return new OpenAICompatibleClient(profile, credentials)
  }
}
