import { Provider } from '../config/validation';

export type CliArgs = {
  input: string;
  output: string;
  projectId?: string;
  region?: string;
  provider?: Provider;
  model?: string;
  maxTokens?: number;
};

export type ParsedArgs = { help: true } | { help: false; args: CliArgs };

export const USAGE = [
  'Usage: kosha-enrich <input.yaml> -o <output.yaml> --project-id <gcp-project> [options]',
  '',
  'Enrich Sanskrit kosha YAML with semantic metadata (headwords, synonyms, gender).',
  '',
  'Options:',
  '  -o, --output <path>     Output enriched YAML file path (required)',
  '  --project-id <id>       Google Cloud project ID (required for the vertex provider)',
  '  --region <region>       Vertex AI region (default: us-east5)',
  '  --provider <name>       vertex | openai (default: vertex)',
  '  --model <id>            Model id (default: claude-3-5-haiku@20241022 on vertex)',
  '  --max-tokens <n>        Generated token ceiling per sloka (default: 2048)',
  '  -h, --help              Show this help',
].join('\n');

const VALUE_FLAGS: Record<string, keyof Omit<CliArgs, 'input'>> = {
  '-o': 'output',
  '--output': 'output',
  '--project-id': 'projectId',
  '--region': 'region',
  '--provider': 'provider',
  '--model': 'model',
  '--max-tokens': 'maxTokens',
};

// argv is process.argv without the node binary and script path
export function parseArgs(argv: string[]): ParsedArgs {
  const values: Partial<Record<keyof Omit<CliArgs, 'input'>, string>> = {};
  const positional: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '-h' || arg === '--help') return { help: true };

    if (arg.startsWith('-')) {
      const eq = arg.indexOf('=');
      const flag = eq === -1 ? arg : arg.slice(0, eq);
      const field = VALUE_FLAGS[flag];
      if (!field) throw new Error(`Unknown option: ${flag}`);

      let value: string | undefined;
      if (eq !== -1) {
        value = arg.slice(eq + 1);
      } else {
        value = argv[i + 1];
        i++;
      }
      if (value === undefined || value === '') throw new Error(`Option ${flag} requires a value`);
      values[field] = value;
      continue;
    }
    positional.push(arg);
  }

  if (positional.length === 0) throw new Error('Missing input YAML file');
  if (positional.length > 1) throw new Error(`Unexpected argument: ${positional[1]}`);
  if (!values.output) throw new Error('Missing required option: --output');

  const args: CliArgs = { input: positional[0], output: values.output };
  if (values.projectId) args.projectId = values.projectId;
  if (values.region) args.region = values.region;
  if (values.model) args.model = values.model;

  if (values.provider) {
    if (values.provider !== 'vertex' && values.provider !== 'openai') {
      throw new Error(`Unknown provider: ${values.provider} (expected vertex or openai)`);
    }
    args.provider = values.provider;
  }

  if (values.maxTokens) {
    const n = Number(values.maxTokens);
    if (!Number.isInteger(n) || n < 1) {
      throw new Error(`--max-tokens must be a positive integer, got ${values.maxTokens}`);
    }
    args.maxTokens = n;
  }

  return { help: false, args };
}
