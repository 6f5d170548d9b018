import { MenuItem } from './types';

export const MENU_UNAVAILABLE = 'Menu not available';

/**
 * Render the catalog as the plain-text block the model answers menu
 * questions from. Categories keep their first-seen order.
 */
export function formatMenuForPrompt(items: MenuItem[]): string {
  if (items.length === 0) return MENU_UNAVAILABLE;

  const categories = new Map<string, MenuItem[]>();
  for (const item of items) {
    const bucket = categories.get(item.category);
    if (bucket) bucket.push(item);
    else categories.set(item.category, [item]);
  }

  const lines: string[] = [];
  for (const [category, categoryItems] of categories) {
    lines.push('', `**${category.toUpperCase()}**`, '-'.repeat(40));
    for (const item of categoryItems) {
      lines.push(`• ${item.itemName}: Rs. ${Math.trunc(item.priceWithTax)}`);
      if (item.description) lines.push(`  Description: ${item.description}`);
      if (item.options) lines.push(`  Options: ${item.options}`);
      // Synonyms help the model match how customers actually write item names
      if (item.synonyms) lines.push(`  Also known as: ${item.synonyms}`);
      lines.push('');
    }
  }
  return lines.join('\n');
}
