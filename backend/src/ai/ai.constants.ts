export const AI_PROVIDER_TOKEN = Symbol('AI_PROVIDER');
