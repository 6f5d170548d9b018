import { SessionRecord } from '../session/types';

export const CONTEXT_PLACEHOLDER = 'No additional context';
export const CATALOG_HEADING = 'RESTAURANT MENU (USE THIS TO ANSWER QUESTIONS)';
export const DEFAULT_HISTORY_TURNS = 10;

const RULE = '='.repeat(50);

export interface HistoryTurn {
  role: 'user' | 'assistant';
  text: string;
}

export interface ContextInput {
  session: SessionRecord;
  /** Pre-formatted catalog; placed first, verbatim */
  catalogText?: string;
  feedbackDue?: boolean;
}

export interface PromptInput extends ContextInput {
  systemPrompt: string;
  /** Persisted turns, oldest first; only the last `historyTurns` are used */
  history: HistoryTurn[];
  userMessage: string;
  historyTurns?: number;
}

export interface AssembledPrompt {
  system: string;
  context: string;
  /** Everything after the system prompt: context, history and the new message */
  body: string;
  /** Exact text the backend receives, stored with the assistant turn */
  fullPrompt: string;
}

/**
 * Known-attribute lines, always in this order:
 * customer name, current order, last order, pending address, pending location.
 */
function attributeLines(session: SessionRecord, feedbackDue: boolean): string[] {
  const lines: string[] = [];
  if (session.customerName) {
    lines.push(`Customer Name: ${session.customerName}`);
  }
  if (session.currentOrder) {
    lines.push(`Current Order in Progress: ${JSON.stringify(session.currentOrder)}`);
  }
  if (session.lastOrder) {
    const label = feedbackDue ? 'Last Order (feedback due, ask how it was)' : 'Last Order';
    lines.push(`${label}: ${JSON.stringify(session.lastOrder)}`);
  }
  if (session.pendingAddress) {
    lines.push('Waiting for: Customer address for delivery order');
  }
  if (session.pendingLocation) {
    lines.push('Waiting for: Customer location coordinates');
  }
  return lines;
}

/**
 * Catalog block first, then the known attributes. With no attributes the
 * placeholder line stands in, so the block is never empty.
 */
export function assembleContext(input: ContextInput): string {
  const parts: string[] = [];

  if (input.catalogText) {
    parts.push(RULE, CATALOG_HEADING, RULE, input.catalogText, RULE, '');
  }

  const attributes = attributeLines(input.session, input.feedbackDue ?? input.session.shouldRequestFeedback ?? false);
  parts.push(...(attributes.length > 0 ? attributes : [CONTEXT_PLACEHOLDER]));

  return parts.join('\n');
}

function speaker(role: HistoryTurn['role']): string {
  return role === 'user' ? 'Customer' : 'Assistant';
}

export function buildPrompt(input: PromptInput): AssembledPrompt {
  const context = assembleContext(input);
  const limit = input.historyTurns ?? DEFAULT_HISTORY_TURNS;
  const recent = limit > 0 ? input.history.slice(-limit) : [];

  const body = [
    '**CONTEXT INFORMATION**:',
    context,
    '',
    '**CONVERSATION HISTORY**:',
    ...recent.map((turn) => `${speaker(turn.role)}: ${turn.text}`),
    '',
    `Customer: ${input.userMessage}`,
    'Assistant:',
  ].join('\n');

  return {
    system: input.systemPrompt,
    context,
    body,
    fullPrompt: `${input.systemPrompt}\n\n${body}`,
  };
}
