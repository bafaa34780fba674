import fs from 'fs/promises';
import path from 'path';
import { isMap, isScalar, parseDocument, stringify } from 'yaml';
import { ParsedResult } from '../../core/entities/DictionaryEntry';
import { SlokaRepository } from '../../core/repositories/SlokaRepository';

export class YamlSlokaRepository implements SlokaRepository {
  async load(filePath: string): Promise<string[]> {
    const content = await fs.readFile(filePath, 'utf-8');
    // Repeated slokas are tolerated; each keeps its first position
    const doc = parseDocument(content, { uniqueKeys: false });
    if (doc.errors.length > 0) {
      throw new Error(`Invalid YAML in ${filePath}: ${doc.errors[0].message}`);
    }

    const root = doc.contents;
    if (root === null) return [];
    if (!isMap(root)) {
      throw new Error(`Expected ${filePath} to contain a mapping of slokas`);
    }

    const slokas = new Set<string>();
    for (const pair of root.items) {
      const key = pair.key;
      if (!isScalar(key)) {
        throw new Error(`Unsupported non-scalar sloka key in ${filePath}`);
      }
      // Keys typed as numbers or booleans keep the text they were written with
      slokas.add(typeof key.value === 'string' ? key.value : key.source ?? String(key.value));
    }
    return [...slokas];
  }

  async save(filePath: string, enriched: Map<string, ParsedResult>): Promise<void> {
    const dir = path.dirname(filePath);
    await fs.mkdir(dir, { recursive: true });

    // A Map keeps insertion order even for keys that look like array indices
    const text = stringify(enriched, { indent: 2, lineWidth: 0 });
    await fs.writeFile(filePath, text, 'utf-8');
  }
}
