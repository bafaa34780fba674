import { buildSlokaPrompt } from '../prompts';

describe('buildSlokaPrompt', () => {
  const sloka = 'नागा बहुफणाः सर्पाः';

  test('embeds the sloka on its own line', () => {
    const prompt = buildSlokaPrompt(sloka);
    expect(prompt.split('\n')).toContain(`Sloka: ${sloka}`);
  });

  test('is deterministic', () => {
    expect(buildSlokaPrompt(sloka)).toBe(buildSlokaPrompt(sloka));
  });

  test('states the gender heuristics and allowed codes', () => {
    const prompt = buildSlokaPrompt(sloka);
    expect(prompt).toContain('- Words ending in ः are typically masculine (m)');
    expect(prompt).toContain('- Words ending in आ/ई are typically feminine (f)');
    expect(prompt).toContain('- Use ONLY these gender codes: m, f, n');
    expect(prompt).toContain('- Look for sandhi and vibhakti to identify word boundaries');
  });

  test('includes a worked example whose answer is valid JSON', () => {
    const prompt = buildSlokaPrompt(sloka);
    const marker = 'Example for: नागा बहुफणाः सर्पास्तेषां भोगवती पुरी॥\n';
    const start = prompt.indexOf(marker);
    expect(start).toBeGreaterThan(-1);

    const rest = prompt.slice(start + marker.length);
    const example = JSON.parse(rest.slice(0, rest.indexOf('\n\n')));
    expect(example.entries).toHaveLength(2);
    expect(example.entries[1].qual).toBe('तेषां');
  });

  test('ends by asking for the JSON answer', () => {
    expect(buildSlokaPrompt(sloka).endsWith('Now parse the given sloka and return JSON:')).toBe(true);
  });
});
