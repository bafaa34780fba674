import { z } from 'zod';

export const configSchema = z.object({
  logging: z.object({
    level: z.enum(['debug', 'info', 'warn', 'error']),
    filePath: z.string().optional(),
    maxSizeMB: z.number().min(1).max(1024).default(10),
    maxFiles: z.number().min(1).max(100).default(5),
  }),
  nodeEnv: z.string(),
  llm: z.object({
    provider: z.enum(['vertex', 'openai']).default('vertex'),
    // Falls back to the provider's default model
    model: z.string().min(1).optional(),
    maxTokens: z.number().int().min(1).max(65536).default(2048),
  }),
  vertex: z.object({
    projectId: z.string().optional(),
    region: z.string().min(1).default('us-east5'),
  }),
  openai: z.object({
    apiKey: z.string().optional(),
    baseUrl: z.string().default('https://api.openai.com/v1'),
  }),
});

export type Config = z.infer<typeof configSchema>;
export type Provider = Config['llm']['provider'];
