import { Logger } from '../Logger';
import { parseSlokaResponse, resultOf, stripCodeFence } from '../SlokaResponseParser';

const payload = {
  entries: [
    {
      head: 'सर्प',
      gender: 'm',
      syns: [
        { prati: 'नाग', gender: 'm' },
        { prati: 'बहुफण', gender: 'm' },
      ],
    },
  ],
};

describe('stripCodeFence', () => {
  it('returns unfenced text trimmed', () => {
    expect(stripCodeFence('  {"entries": []}\n')).toBe('{"entries": []}');
  });

  it('removes a generic fence', () => {
    expect(stripCodeFence('```\n{"entries": []}\n```')).toBe('{"entries": []}');
  });

  it('removes a json-tagged fence', () => {
    expect(stripCodeFence('```json\n{\n  "entries": []\n}\n```')).toBe('{\n  "entries": []\n}');
  });

  it('removes a json fence written on one line', () => {
    expect(stripCodeFence('```json {"entries": []}```')).toBe('{"entries": []}');
  });
});

describe('parseSlokaResponse', () => {
  let mockLogger: jest.Mocked<Logger>;

  beforeEach(() => {
    mockLogger = {
      debug: jest.fn(),
      info: jest.fn(),
      warn: jest.fn(),
      error: jest.fn(),
      time: jest.fn(),
      timeEnd: jest.fn().mockReturnValue(0),
      timeLog: jest.fn(),
    };
  });

  it('parses a bare JSON response', () => {
    const outcome = parseSlokaResponse(JSON.stringify(payload), mockLogger);

    expect(outcome).toEqual({ ok: true, result: payload });
  });

  it('extracts the same structure from a fenced response', () => {
    const bare = parseSlokaResponse(JSON.stringify(payload), mockLogger);
    const fenced = parseSlokaResponse('```\n' + JSON.stringify(payload, null, 2) + '\n```', mockLogger);
    const tagged = parseSlokaResponse('```json\n' + JSON.stringify(payload, null, 2) + '\n```', mockLogger);

    expect(fenced).toEqual(bare);
    expect(tagged).toEqual(bare);
  });

  it('keeps entry fields in the order the model wrote them', () => {
    const text = '{"entries": [{"qual": "तेषां", "head": "भोगवती", "extra": 1, "gender": "f", "syns": []}]}';

    const outcome = parseSlokaResponse(text, mockLogger);

    expect(outcome.ok).toBe(true);
    if (!outcome.ok) return;
    expect(Object.keys(outcome.result.entries[0])).toEqual(['qual', 'head', 'extra', 'gender', 'syns']);
    expect(outcome.result.entries[0].extra).toBe(1);
  });

  it('accepts entries without a head', () => {
    const outcome = parseSlokaResponse('{"entries": [{"gender": "n"}]}', mockLogger);

    expect(outcome).toEqual({ ok: true, result: { entries: [{ gender: 'n' }] } });
  });

  it('accepts a verify field of any type from the model', () => {
    const outcome = parseSlokaResponse('{"entries": [{"head": "सर्प", "verify": "no", "gender": "m", "syns": []}]}', mockLogger);

    expect(outcome.ok).toBe(true);
    if (!outcome.ok) return;
    expect(Object.keys(outcome.result.entries[0])).toEqual(['head', 'verify', 'gender', 'syns']);
    expect(outcome.result.entries[0].verify).toBe('no');
  });

  it('accepts an empty entries list as a successful parse', () => {
    expect(parseSlokaResponse('{"entries": []}', mockLogger)).toEqual({ ok: true, result: { entries: [] } });
  });

  it('reports malformed JSON without throwing', () => {
    const text = 'This is not JSON at all';

    const outcome = parseSlokaResponse(text, mockLogger);

    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.reason).toBe('invalid-json');
    expect(outcome.preview).toBe(text);
    expect(resultOf(outcome)).toEqual({ entries: [] });
    expect(mockLogger.error).toHaveBeenCalledWith(`Response was: ${text}...`);
  });

  it('limits the logged preview to 200 characters', () => {
    const text = '{' + 'x'.repeat(300);

    const outcome = parseSlokaResponse(text, mockLogger);

    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.preview).toHaveLength(200);
  });

  it('rejects a gender code outside m, f, n', () => {
    const text = '{"entries": [{"head": "सर्प", "gender": "m/f", "syns": []}]}';

    const outcome = parseSlokaResponse(text, mockLogger);

    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.reason).toBe('schema-mismatch');
    expect(outcome.detail).toContain('entries.0.gender');
    expect(resultOf(outcome)).toEqual({ entries: [] });
  });

  it('rejects JSON without an entries list', () => {
    const outcome = parseSlokaResponse('{"items": []}', mockLogger);

    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.reason).toBe('schema-mismatch');
    expect(outcome.detail).toContain('entries: Required');
  });

  it('rejects synonyms missing their stem', () => {
    const outcome = parseSlokaResponse('{"entries": [{"head": "नाग", "syns": [{"gender": "m"}]}]}', mockLogger);

    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.detail).toContain('entries.0.syns.0.prati');
  });
});
