import { envString } from '../utils/env';

// AI SDK Models
export const EMBEDDING_MODEL = envString('EMBEDDING_MODEL', 'text-embedding-3-small');
export const LLM_MODEL = envString('LLM_MODEL', 'gpt-4o-mini');

// AI SDK Configuration (OpenAI or any OpenAI-compatible endpoint)
export const AI_BASE_URL = envString('AI_BASE_URL', 'https://api.openai.com/v1');
export const AI_API_KEY = envString('AI_API_KEY', '');
