import path from 'path';
import { PromptManager } from '../../src/agent/prompt-manager';

const FIXTURE_INFO = path.join(__dirname, '..', 'fixtures', 'restaurant-info.json');

describe('PromptManager', () => {
  it('renders each restaurant fact as one line, keeping nested values as JSON', () => {
    const prompts = new PromptManager({ systemPromptPath: '/nonexistent/system.md', restaurantInfoPath: FIXTURE_INFO });

    const [system, info] = prompts.renderSystemPrompt().split('\n\n**RESTAURANT INFO**:\n');

    expect(system.startsWith('You are a waiter at a restaurant taking orders via WhatsApp.')).toBe(true);
    expect(info.split('\n')).toEqual([
      'name: Test Kitchen',
      'deliveryRadiusKm: 5',
      'paymentMethods: Cash, Card',
      'hours: {"weekdays":"12 PM - 11 PM","weekends":"12 PM - 2 AM"}',
      'branches: [{"area":"North","phone":"0000"}]',
    ]);
  });

  it('returns the bare system prompt when no restaurant info exists', () => {
    const prompts = new PromptManager({ systemPromptPath: '/nonexistent/system.md', restaurantInfoPath: '/nonexistent/info.json' });

    expect(prompts.renderSystemPrompt()).not.toContain('**RESTAURANT INFO**');
    expect(prompts.getRestaurantInfo()).toEqual({});
  });

  it('looks up a single fact by key', () => {
    const prompts = new PromptManager({ systemPromptPath: '/nonexistent/system.md', restaurantInfoPath: FIXTURE_INFO });

    expect(prompts.getRestaurantInfo('hours')).toEqual({ weekdays: '12 PM - 11 PM', weekends: '12 PM - 2 AM' });
  });
});
