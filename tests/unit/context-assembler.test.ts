import {
  assembleContext,
  buildPrompt,
  CATALOG_HEADING,
  CONTEXT_PLACEHOLDER,
  HistoryTurn,
} from '../../src/agent/context-assembler';

const RULE = '='.repeat(50);

describe('Context assembler', () => {
  describe('assembleContext', () => {
    it('yields the placeholder line when nothing is known', () => {
      expect(assembleContext({ session: {} })).toBe(CONTEXT_PLACEHOLDER);
    });

    it('places the catalog first between rules', () => {
      const context = assembleContext({ session: {}, catalogText: 'MENU TEXT' });

      expect(context).toBe([RULE, CATALOG_HEADING, RULE, 'MENU TEXT', RULE, '', CONTEXT_PLACEHOLDER].join('\n'));
    });

    it('lists known attributes in a fixed order regardless of key order', () => {
      const context = assembleContext({
        session: {
          pendingLocation: true,
          lastOrder: { id: 3, items: [{ name: 'Fries' }], total: 270 },
          pendingAddress: true,
          currentOrder: { items: [{ name: 'Zinger Burger', quantity: 2 }], total: 1180 },
          customerName: 'Ali',
        },
      });

      expect(context.split('\n')).toEqual([
        'Customer Name: Ali',
        'Current Order in Progress: {"items":[{"name":"Zinger Burger","quantity":2}],"total":1180}',
        'Last Order: {"id":3,"items":[{"name":"Fries"}],"total":270}',
        'Waiting for: Customer address for delivery order',
        'Waiting for: Customer location coordinates',
      ]);
    });

    it('follows the catalog block with the attributes', () => {
      const context = assembleContext({ session: { customerName: 'Sara' }, catalogText: 'MENU TEXT' });

      expect(context.endsWith(`${RULE}\n\nCustomer Name: Sara`)).toBe(true);
      expect(context).not.toContain(CONTEXT_PLACEHOLDER);
    });

    it('labels the last order when feedback is due', () => {
      const context = assembleContext({
        session: { lastOrder: { id: 7, items: [], total: 699 } },
        feedbackDue: true,
      });

      expect(context).toBe('Last Order (feedback due, ask how it was): {"id":7,"items":[],"total":699}');
    });

    it('reads the feedback flag from the session when not passed', () => {
      const context = assembleContext({
        session: { lastOrder: { id: 7, items: [], total: 699 }, shouldRequestFeedback: true },
      });

      expect(context.startsWith('Last Order (feedback due, ask how it was):')).toBe(true);
    });

    it('skips cleared and false attributes', () => {
      const context = assembleContext({
        session: { currentOrder: null, lastOrder: null, pendingAddress: false, pendingLocation: false },
      });

      expect(context).toBe(CONTEXT_PLACEHOLDER);
    });

    it('does not render transcript, location or extensions', () => {
      const context = assembleContext({
        session: {
          transcript: [{ role: 'user', text: 'hi', timestamp: '2025-03-10T12:00:00.000Z' }],
          location: { latitude: 31.5, longitude: 74.3 },
          extensions: { promo: 'SPRING' },
        },
      });

      expect(context).toBe(CONTEXT_PLACEHOLDER);
    });
  });

  describe('buildPrompt', () => {
    it('lays out context, history and the new message', () => {
      const prompt = buildPrompt({
        systemPrompt: 'SYS',
        session: {},
        history: [
          { role: 'user', text: 'hi' },
          { role: 'assistant', text: 'Hello!' },
        ],
        userMessage: 'menu?',
      });

      const body = [
        '**CONTEXT INFORMATION**:',
        CONTEXT_PLACEHOLDER,
        '',
        '**CONVERSATION HISTORY**:',
        'Customer: hi',
        'Assistant: Hello!',
        '',
        'Customer: menu?',
        'Assistant:',
      ].join('\n');
      expect(prompt.body).toBe(body);
      expect(prompt.fullPrompt).toBe(`SYS\n\n${body}`);
      expect(prompt.system).toBe('SYS');
      expect(prompt.context).toBe(CONTEXT_PLACEHOLDER);
    });

    it('keeps only the most recent history turns', () => {
      const history: HistoryTurn[] = Array.from({ length: 12 }, (_, i): HistoryTurn => ({
        role: i % 2 === 0 ? 'user' : 'assistant',
        text: `turn ${i + 1}`,
      }));

      const prompt = buildPrompt({ systemPrompt: 'SYS', session: {}, history, userMessage: 'next' });

      expect(prompt.body).not.toContain('turn 2\n');
      expect(prompt.body).toContain('Customer: turn 3\nAssistant: turn 4');
      expect(prompt.body).toContain('Assistant: turn 12\n\nCustomer: next');
    });

    it('renders an empty history section when there is none', () => {
      const prompt = buildPrompt({ systemPrompt: 'SYS', session: {}, history: [], userMessage: 'hello', historyTurns: 0 });

      expect(prompt.body.endsWith('**CONVERSATION HISTORY**:\n\nCustomer: hello\nAssistant:')).toBe(true);
    });
  });
});
