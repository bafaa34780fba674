import fs from 'fs';
import { createGenerator, GeneratorSettings } from '../adapters/llm/createGenerator';
import { DEFAULT_OPENAI_MODEL, DEFAULT_VERTEX_MODEL } from '../adapters/llm/defaults';
import { buildSlokaPrompt } from '../adapters/llm/prompts';
import { YamlSlokaRepository } from '../adapters/yaml/YamlSlokaRepository';
import { EnrichSlokasUseCase } from '../application/EnrichSlokasUseCase';
import { Config } from '../config/validation';
import { SlokaRepository } from '../core/repositories/SlokaRepository';
import { Logger } from '../core/services/Logger';
import { TextGenerator } from '../core/services/TextGenerator';
import { CliArgs, parseArgs, USAGE } from './args';

export type CliDependencies = {
  config: Config;
  logger: Logger;
  repository?: SlokaRepository;
  createGenerator?: (settings: GeneratorSettings, logger: Logger) => TextGenerator;
};

export function resolveSettings(args: CliArgs, config: Config): GeneratorSettings {
  const provider = args.provider ?? config.llm.provider;
  const fallbackModel = provider === 'openai' ? DEFAULT_OPENAI_MODEL : DEFAULT_VERTEX_MODEL;
  return {
    provider,
    model: args.model ?? config.llm.model ?? fallbackModel,
    maxTokens: args.maxTokens ?? config.llm.maxTokens,
    projectId: args.projectId ?? config.vertex.projectId,
    region: args.region ?? config.vertex.region,
    openaiApiKey: config.openai.apiKey,
    openaiBaseUrl: config.openai.baseUrl,
  };
}

// Returns the process exit code
export async function runEnrichCli(argv: string[], deps: CliDependencies): Promise<number> {
  const { config, logger } = deps;

  let args: CliArgs;
  try {
    const parsed = parseArgs(argv);
    if (parsed.help) {
      console.log(USAGE);
      return 0;
    }
    args = parsed.args;
  } catch (error) {
    logger.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    console.error(USAGE);
    return 1;
  }

  const settings = resolveSettings(args, config);
  if (settings.provider === 'vertex' && !settings.projectId) {
    logger.error('Error: Missing required option: --project-id');
    console.error(USAGE);
    return 1;
  }

  if (!fs.existsSync(args.input)) {
    logger.error(`Error: Input file not found: ${args.input}`);
    return 1;
  }

  let generator: TextGenerator;
  try {
    logger.info(`Initializing ${settings.provider} client (model: ${settings.model}, region: ${settings.region})...`);
    generator = (deps.createGenerator ?? createGenerator)(settings, logger);
  } catch (error) {
    logger.error('Failed to initialize LLM client:', error);
    if (settings.provider === 'vertex') {
      logger.error('Make sure you have authenticated (gcloud auth application-default login) and enabled Claude models in Vertex AI Model Garden');
    }
    return 1;
  }

  const useCase = new EnrichSlokasUseCase(
    deps.repository ?? new YamlSlokaRepository(),
    generator,
    buildSlokaPrompt,
    logger
  );

  try {
    await useCase.execute(args.input, args.output);
    logger.info(`Successfully enriched and saved to: ${args.output}`);
    return 0;
  } catch (error) {
    logger.error('Enrichment run failed:', error);
    return 1;
  }
}
