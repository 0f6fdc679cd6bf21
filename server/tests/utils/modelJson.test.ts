import { z } from 'zod';
import { extractJsonBlock, parseModelJson } from '../../src/utils/modelJson';
import { chapterExtractionSchema } from '../../src/validators/modelResponses';
import { TransportError } from '../../src/utils/errors';

const scoreSchema = z.object({ score: z.number() });

describe('parseModelJson', () => {
  it('pulls the object out of a fenced block with surrounding chatter', () => {
    const raw = 'Here you go:\n```json\n{"score": 7}\n```\nAnything else?';

    expect(extractJsonBlock(raw)).toBe('{"score": 7}');
    expect(parseModelJson(raw, scoreSchema, 'Score')).toEqual({ score: 7 });
  });

  it('repairs trailing commas and single quotes', () => {
    expect(parseModelJson("{'score': 4,}", scoreSchema, 'Score')).toEqual({ score: 4 });
  });

  it('reports a structural mismatch as a malformed response', () => {
    expect(() => parseModelJson('{"score": "high"}', scoreSchema, 'Score')).toThrow(
      'Score response did not match the expected structure: score: Expected number, received string'
    );
  });

  it('reports blank output as empty', () => {
    expect(() => parseModelJson('  ', scoreSchema, 'Score')).toThrow(TransportError);
    expect(() => parseModelJson('  ', scoreSchema, 'Score')).toThrow('Score response was empty');
  });

  it('normalises a loose extraction into the tagged shape', () => {
    const parsed = parseModelJson(
      JSON.stringify({
        characters: [{ name: ' Sam ', role: 'villain', state: '' }],
        threads: [{ title: 'The missing ledger', status: 'moved forward' }],
      }),
      chapterExtractionSchema,
      'Extraction'
    );

    expect(parsed).toEqual({
      characters: [{ name: 'Sam', role: null, state: null }],
      threads: [{ title: 'The missing ledger', description: '', status: 'advanced' }],
      facts: [],
    });
  });
});
