import { DictionaryEntry, withVerifyFlag } from '../DictionaryEntry';
import { summarize, SlokaOutcome } from '../SlokaOutcome';

describe('withVerifyFlag', () => {
  it('places verify: false directly after head', () => {
    const entry: DictionaryEntry = {
      gender: 'm',
      head: 'सर्प',
      syns: [{ prati: 'नाग', gender: 'm' }],
    };

    const flagged = withVerifyFlag(entry);

    expect(Object.keys(flagged)).toEqual(['head', 'verify', 'gender', 'syns']);
    expect(flagged.verify).toBe(false);
    expect(flagged.syns).toEqual([{ prati: 'नाग', gender: 'm' }]);
  });

  it('keeps the relative order of the remaining fields', () => {
    const entry: DictionaryEntry = {
      head: 'भोगवती',
      qual: 'तेषां',
      gender: 'f',
      syns: [{ prati: 'पुरी', gender: 'f' }],
      note: 'city of the nagas',
    };

    expect(Object.keys(withVerifyFlag(entry))).toEqual(['head', 'verify', 'qual', 'gender', 'syns', 'note']);
  });

  it('overrides a verify value the model supplied', () => {
    const entry: DictionaryEntry = { verify: true, head: 'नाग', gender: 'm' };

    const flagged = withVerifyFlag(entry);

    expect(Object.keys(flagged)).toEqual(['head', 'verify', 'gender']);
    expect(flagged.verify).toBe(false);
  });

  it('leaves entries without a head untouched', () => {
    const entry: DictionaryEntry = { gender: 'n', syns: [] };

    const result = withVerifyFlag(entry);

    expect(result).toBe(entry);
    expect(Object.keys(result)).toEqual(['gender', 'syns']);
  });

  it('does not mutate the input entry', () => {
    const entry: DictionaryEntry = { head: 'सर्प', gender: 'm' };

    withVerifyFlag(entry);

    expect(Object.keys(entry)).toEqual(['head', 'gender']);
  });
});

describe('summarize', () => {
  it('counts parsed, empty and failed slokas separately', () => {
    const outcomes: SlokaOutcome[] = [
      {
        status: 'parsed',
        sloka: 'a',
        result: { entries: [{ head: 'x', verify: false }, { head: 'y', verify: false }] },
      },
      { status: 'empty', sloka: 'b', result: { entries: [] } },
      { status: 'failed', sloka: 'c', result: { entries: [] }, reason: 'invalid-json', detail: 'Unexpected token' },
    ];

    expect(summarize(outcomes)).toEqual({
      total: 3,
      parsed: 1,
      empty: 1,
      failed: 1,
      entries: 2,
      failures: [{ sloka: 'c', reason: 'invalid-json', detail: 'Unexpected token' }],
    });
  });
});
