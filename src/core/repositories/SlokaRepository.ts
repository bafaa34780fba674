import { ParsedResult } from '../entities/DictionaryEntry';

export interface SlokaRepository {
  // Verse texts in file order; the values stored against them are ignored
  load(filePath: string): Promise<string[]>;
  save(filePath: string, enriched: Map<string, ParsedResult>): Promise<void>;
}
