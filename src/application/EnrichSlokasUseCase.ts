import { ParsedResult, emptyResult, withVerifyFlag } from '../core/entities/DictionaryEntry';
import { EnrichmentReport, SlokaOutcome, summarize } from '../core/entities/SlokaOutcome';
import { SlokaRepository } from '../core/repositories/SlokaRepository';
import { Logger } from '../core/services/Logger';
import { parseSlokaResponse } from '../core/services/SlokaResponseParser';
import { TextGenerator } from '../core/services/TextGenerator';

type PromptBuilder = (sloka: string) => string;

export class EnrichSlokasUseCase {
  constructor(
    private repository: SlokaRepository,
    private generator: TextGenerator,
    private buildPrompt: PromptBuilder,
    private logger: Logger
  ) {}

  async execute(inputPath: string, outputPath: string): Promise<EnrichmentReport> {
    this.logger.time('enrich-slokas');
    this.logger.info(`Reading YAML from: ${inputPath}`);
    const slokas = await this.repository.load(inputPath);
    this.logger.info(`Found ${slokas.length} slokas to enrich`);

    const outcomes = await this.enrichAll(slokas);
    const report = summarize(outcomes);
    this.logger.info(`Completed parsing of ${slokas.length} slokas`);

    const enriched = new Map<string, ParsedResult>();
    for (const outcome of outcomes) enriched.set(outcome.sloka, outcome.result);

    this.logger.info(`Writing enriched YAML to: ${outputPath}`);
    await this.repository.save(outputPath, enriched);

    const totalTime = this.logger.timeEnd('enrich-slokas');
    this.logger.info(
      `Enrichment finished in ${totalTime}ms. Parsed: ${report.parsed}, Empty: ${report.empty}, Failed: ${report.failed}, Entries: ${report.entries}`
    );
    for (const failure of report.failures) {
      this.logger.warn(`Needs a re-run (${failure.reason}): ${failure.sloka}`);
    }
    return report;
  }

  // One model call per sloka, strictly in order
  async enrichAll(slokas: string[]): Promise<SlokaOutcome[]> {
    const outcomes: SlokaOutcome[] = [];
    for (let i = 0; i < slokas.length; i++) {
      this.logger.info(`Parsing sloka ${i + 1}/${slokas.length}...`);
      // eslint-disable-next-line no-await-in-loop
      outcomes.push(await this.enrichOne(slokas[i]));
    }
    return outcomes;
  }

  async enrichOne(sloka: string): Promise<SlokaOutcome> {
    let response: string;
    try {
      response = await this.generator.generate(this.buildPrompt(sloka));
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      this.logger.error(`Error parsing sloka with ${this.generator.model}: ${detail}`);
      return { status: 'failed', sloka, result: emptyResult(), reason: 'generation-error', detail };
    }

    const outcome = parseSlokaResponse(response, this.logger);
    if (!outcome.ok) {
      return { status: 'failed', sloka, result: emptyResult(), reason: outcome.reason, detail: outcome.detail };
    }

    const result: ParsedResult = { entries: outcome.result.entries.map(withVerifyFlag) };
    if (result.entries.length === 0) {
      this.logger.warn('Model returned no entries for this sloka');
      return { status: 'empty', sloka, result };
    }
    return { status: 'parsed', sloka, result };
  }
}
