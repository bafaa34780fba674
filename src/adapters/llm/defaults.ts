export const DEFAULT_MAX_TOKENS = 2048;
export const DEFAULT_VERTEX_MODEL = 'claude-3-5-haiku@20241022';
export const DEFAULT_OPENAI_MODEL = 'gpt-4o-mini';
