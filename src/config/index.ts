import dotenv from 'dotenv';
import { configSchema, Config } from './validation';

// Load environment variables based on NODE_ENV
const envFile = process.env.NODE_ENV === 'production'
  ? '.env.production'
  : '.env.dev';
dotenv.config({ path: envFile });

function intOrUndefined(value: string | undefined): number | undefined {
  return value ? parseInt(value, 10) : undefined;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  return configSchema.parse({
    logging: {
      level: env.LOG_LEVEL || 'info',
      filePath: env.LOG_FILE || undefined,
      maxSizeMB: intOrUndefined(env.LOG_MAX_SIZE_MB),
      maxFiles: intOrUndefined(env.LOG_MAX_FILES),
    },
    nodeEnv: env.NODE_ENV || 'development',
    llm: {
      provider: env.LLM_PROVIDER || undefined,
      model: env.LLM_MODEL || undefined,
      maxTokens: intOrUndefined(env.LLM_MAX_TOKENS),
    },
    vertex: {
      projectId: env.VERTEX_PROJECT_ID || undefined,
      region: env.VERTEX_REGION || undefined,
    },
    openai: {
      apiKey: env.OPENAI_API_KEY || undefined,
      baseUrl: env.OPENAI_BASE_URL || undefined,
    },
  });
}

export const config: Config = loadConfig();
