/**
 * Action protocol: how a structured command rides inside free-form model
 * output, and how the user-facing reply is recovered from the same text.
 *
 * Grammar: a fence opened by ``` immediately followed by the tag `action`
 * or `json`, a body, and a closing ```. Only the first block is decoded;
 * every block is stripped from the prose. The two passes are independent,
 * so a block whose body fails to decode is still removed from the reply.
 */

export const ACTION_TYPES = [
  'create_order',
  'create_complaint',
  'create_reservation',
  'update_customer_info',
  'save_feedback',
] as const;

export type ActionType = (typeof ACTION_TYPES)[number];

export type BlockTag = 'action' | 'json';

/** Decoded but not yet validated command */
export interface RawAction {
  type: string;
  data: Record<string, unknown>;
}

export type ExtractionResult =
  | { kind: 'none' }
  | { kind: 'malformed'; tag: BlockTag; body: string; reason: string }
  | { kind: 'action'; tag: BlockTag; action: RawAction };

export const MIN_REPLY_LENGTH = 5;
export const FALLBACK_REPLY = "I'll help you with that. How can I assist?";

const BLOCK_SOURCE = '```(action|json)\\b([\\s\\S]*?)```';

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isActionType(type: string): type is ActionType {
  return (ACTION_TYPES as readonly string[]).includes(type);
}

/**
 * Decode the first fenced action/json block. A missing block and an
 * undecodable one are reported differently: the first means the model
 * intended no action, the second is a model error.
 */
export function extractAction(raw: string): ExtractionResult {
  const match = new RegExp(BLOCK_SOURCE).exec(raw);
  if (!match) return { kind: 'none' };

  const tag: BlockTag = match[1] === 'json' ? 'json' : 'action';
  const body = match[2].trim();

  let decoded: unknown;
  try {
    decoded = JSON.parse(body);
  } catch (err) {
    return { kind: 'malformed', tag, body, reason: err instanceof Error ? err.message : 'invalid JSON' };
  }

  if (!isPlainObject(decoded)) {
    return { kind: 'malformed', tag, body, reason: 'block is not a JSON object' };
  }
  const { type, data } = decoded;
  if (typeof type !== 'string' || type.length === 0) {
    return { kind: 'malformed', tag, body, reason: 'missing "type"' };
  }
  if (data === undefined) {
    return { kind: 'action', tag, action: { type, data: {} } };
  }
  if (!isPlainObject(data)) {
    return { kind: 'malformed', tag, body, reason: '"data" is not an object' };
  }

  return { kind: 'action', tag, action: { type, data } };
}

/** Remove every fenced action/json block and trim. */
export function extractProse(raw: string): string {
  return raw.replace(new RegExp(BLOCK_SOURCE, 'g'), '').trim();
}

/** Never hand the transport an empty or truncated reply. */
export function withFallback(prose: string): { reply: string; usedFallback: boolean } {
  if (prose.length < MIN_REPLY_LENGTH) {
    return { reply: FALLBACK_REPLY, usedFallback: true };
  }
  return { reply: prose, usedFallback: false };
}

export interface ParsedModelOutput {
  extraction: ExtractionResult;
  prose: string;
  reply: string;
  usedFallback: boolean;
}

export function parseModelOutput(raw: string): ParsedModelOutput {
  const extraction = extractAction(raw);
  const prose = extractProse(raw);
  return { extraction, prose, ...withFallback(prose) };
}
