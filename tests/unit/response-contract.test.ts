import {
  extractAction,
  extractProse,
  FALLBACK_REPLY,
  isActionType,
  parseModelOutput,
  withFallback,
} from '../../src/agent/response-contract';

const fence = '```';

describe('Response contract', () => {
  describe('text without a block', () => {
    it('yields no action and the trimmed text as prose', () => {
      const parsed = parseModelOutput('  Hello there! What would you like today?\n');

      expect(parsed.extraction).toEqual({ kind: 'none' });
      expect(parsed.prose).toBe('Hello there! What would you like today?');
      expect(parsed.reply).toBe(parsed.prose);
      expect(parsed.usedFallback).toBe(false);
    });

    it('ignores fences with other language tags', () => {
      const raw = `Here:\n${fence}sql\nselect 1;\n${fence}`;

      expect(extractAction(raw)).toEqual({ kind: 'none' });
      expect(extractProse(raw)).toBe(raw);
    });

    it('does not treat a longer tag that starts with action as a block', () => {
      expect(extractAction(`${fence}actionable\n{"type":"x"}\n${fence}`)).toEqual({ kind: 'none' });
    });
  });

  describe('extraction', () => {
    it('decodes an action block and strips it from the prose', () => {
      const raw = [
        'Sorry to hear that. I have logged it.',
        `${fence}action`,
        '{"type":"create_complaint","data":{"description":"cold food"}}',
        fence,
        'We will follow up.',
      ].join('\n');

      const parsed = parseModelOutput(raw);

      expect(parsed.extraction).toEqual({
        kind: 'action',
        tag: 'action',
        action: { type: 'create_complaint', data: { description: 'cold food' } },
      });
      expect(parsed.reply).toBe('Sorry to hear that. I have logged it.\n\nWe will follow up.');
    });

    it('accepts json-tagged blocks', () => {
      const result = extractAction(`${fence}json\n{"type":"save_feedback","data":{"order_id":4,"feedback":"great"}}\n${fence}`);

      expect(result).toEqual({
        kind: 'action',
        tag: 'json',
        action: { type: 'save_feedback', data: { order_id: 4, feedback: 'great' } },
      });
    });

    it('acts on the first block only but strips all of them', () => {
      const raw = [
        'Two things.',
        `${fence}action\n{"type":"create_complaint","data":{"description":"late"}}\n${fence}`,
        `${fence}json\n{"type":"update_customer_info","data":{"name":"Ali"}}\n${fence}`,
        'Done.',
      ].join('\n');

      const parsed = parseModelOutput(raw);

      expect(parsed.extraction.kind).toBe('action');
      if (parsed.extraction.kind === 'action') {
        expect(parsed.extraction.action.type).toBe('create_complaint');
      }
      expect(parsed.prose).toBe('Two things.\n\n\nDone.');
    });

    it('defaults missing data to an empty object', () => {
      expect(extractAction(`${fence}action\n{"type":"create_complaint"}\n${fence}`)).toEqual({
        kind: 'action',
        tag: 'action',
        action: { type: 'create_complaint', data: {} },
      });
    });

    it('keeps unknown types for the dispatcher to reject', () => {
      const result = extractAction(`${fence}action\n{"type":"refund_everything","data":{}}\n${fence}`);

      expect(result.kind).toBe('action');
      expect(isActionType('refund_everything')).toBe(false);
      expect(isActionType('create_order')).toBe(true);
    });
  });

  describe('malformed blocks', () => {
    it('reports undecodable JSON distinctly and still produces prose', () => {
      const raw = `Got it, placing your order!\n${fence}json\n{"type": "create_order", "data": {oops}\n${fence}`;

      const parsed = parseModelOutput(raw);

      expect(parsed.extraction.kind).toBe('malformed');
      if (parsed.extraction.kind === 'malformed') {
        expect(parsed.extraction.tag).toBe('json');
        expect(parsed.extraction.body).toBe('{"type": "create_order", "data": {oops}');
      }
      expect(parsed.reply).toBe('Got it, placing your order!');
      expect(parsed.usedFallback).toBe(false);
    });

    it.each([
      ['a JSON array', '[1, 2]', 'block is not a JSON object'],
      ['a missing type', '{"data":{}}', 'missing "type"'],
      ['an empty type', '{"type":""}', 'missing "type"'],
      ['non-object data', '{"type":"create_order","data":[1]}', '"data" is not an object'],
    ])('rejects %s', (_label, body, reason) => {
      expect(extractAction(`${fence}action\n${body}\n${fence}`)).toEqual({
        kind: 'malformed',
        tag: 'action',
        body,
        reason,
      });
    });
  });

  describe('fallback', () => {
    it('replaces prose that is empty after stripping the block', () => {
      const parsed = parseModelOutput(`${fence}action\n{"type":"create_complaint","data":{"description":"x"}}\n${fence}`);

      expect(parsed.prose).toBe('');
      expect(parsed.reply).toBe(FALLBACK_REPLY);
      expect(parsed.usedFallback).toBe(true);
      expect(parsed.extraction.kind).toBe('action');
    });

    it('replaces prose shorter than five characters', () => {
      expect(withFallback('Ok.')).toEqual({ reply: FALLBACK_REPLY, usedFallback: true });
    });

    it('keeps prose of exactly five characters', () => {
      expect(withFallback('Done!')).toEqual({ reply: 'Done!', usedFallback: false });
    });
  });
});
