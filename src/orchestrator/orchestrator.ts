import { Logger } from 'pino';
import { AgentCore, GenerationResult } from '../agent/agent-core';
import { buildPrompt, DEFAULT_HISTORY_TURNS, HistoryTurn } from '../agent/context-assembler';
import { PromptManager } from '../agent/prompt-manager';
import { ExtractionResult, parseModelOutput } from '../agent/response-contract';
import { InboundTurn } from '../channels/types';
import { ActionDispatcher, DispatchOutcome } from './action-dispatcher';
import { DEFAULT_FEEDBACK_DELAY_MINUTES, isFeedbackDue } from '../restaurant/feedback-policy';
import { formatMenuForPrompt } from '../restaurant/menu-formatter';
import { Customer, RestaurantRepository } from '../restaurant/types';
import { SessionPatch, SessionRecord, SessionStore } from '../session/types';
import { computeCharge, DEFAULT_PRICING } from '../usage/usage-tracker';
import { UsageCharge, UsagePricing, UsageTracker } from '../usage/types';
import { logger, maskIdentity } from '../observability/logger';
import { actionExtractions, messagesProcessed, turnsCompleted } from '../observability/metrics';
import { TraceContext, endSpan, startSpan, summarizeSpans } from '../observability/trace';
import { isRetryable } from '../shared/errors';

export const APOLOGY_REPLY = 'I apologize, but I encountered an error processing your request. Please try again.';

export interface OrchestratorDeps {
  sessions: SessionStore;
  usage: UsageTracker;
  repo: RestaurantRepository;
  agent: AgentCore;
  dispatcher: ActionDispatcher;
  prompts: PromptManager;
  pricing?: UsagePricing;
  historyTurns?: number;
  feedbackDelayMinutes?: number;
  now?: () => number;
}

export type TurnOutcome = 'ok' | 'ignored' | 'backend_failure' | 'infra_failure';

export interface TurnResult {
  /** Text for the transport to send; null means send nothing */
  reply: string | null;
  outcome: TurnOutcome;
  extraction?: ExtractionResult['kind'];
  dispatch?: DispatchOutcome;
  usedFallback?: boolean;
}

/**
 * Orchestrator: runs one inbound turn end to end.
 *
 *   session + history → context → model → codec → dispatcher → session write
 *
 * The session is written only after the dispatcher returns. Callers must
 * serialize turns per identity; the read-modify-write on the session is
 * not guarded here.
 */
export class Orchestrator {
  private readonly sessions: SessionStore;
  private readonly usage: UsageTracker;
  private readonly repo: RestaurantRepository;
  private readonly agent: AgentCore;
  private readonly dispatcher: ActionDispatcher;
  private readonly prompts: PromptManager;
  private readonly pricing: UsagePricing;
  private readonly historyTurns: number;
  private readonly feedbackDelayMinutes: number;
  private readonly now: () => number;

  constructor(deps: OrchestratorDeps) {
    this.sessions = deps.sessions;
    this.usage = deps.usage;
    this.repo = deps.repo;
    this.agent = deps.agent;
    this.dispatcher = deps.dispatcher;
    this.prompts = deps.prompts;
    this.pricing = deps.pricing ?? DEFAULT_PRICING;
    this.historyTurns = deps.historyTurns ?? DEFAULT_HISTORY_TURNS;
    this.feedbackDelayMinutes = deps.feedbackDelayMinutes ?? DEFAULT_FEEDBACK_DELAY_MINUTES;
    this.now = deps.now ?? Date.now;
  }

  async handleTurn(inbound: InboundTurn, trace: TraceContext): Promise<TurnResult> {
    const log = logger.child({
      requestId: trace.requestId,
      identity: maskIdentity(inbound.identity),
      messageId: inbound.messageId,
    });

    messagesProcessed.inc({ type: inbound.content.kind });

    if (inbound.content.kind === 'unsupported') {
      log.info({ messageType: inbound.content.messageType }, 'Unsupported message type; ignoring');
      turnsCompleted.inc({ outcome: 'ignored' });
      return { reply: null, outcome: 'ignored' };
    }

    const spanTurn = startSpan(trace, 'orchestrator.handleTurn');

    try {
      const result = await this.runTurn(inbound, trace, log);
      endSpan(spanTurn, result.outcome === 'ok' ? 'ok' : 'error');
      turnsCompleted.inc({ outcome: result.outcome });
      log.info({ outcome: result.outcome, spans: summarizeSpans(trace) }, 'Turn completed');
      return result;
    } catch (err) {
      endSpan(spanTurn, 'error');
      turnsCompleted.inc({ outcome: 'infra_failure' });
      log.error({ err, retryable: isRetryable(err) }, 'Turn failed');
      return { reply: APOLOGY_REPLY, outcome: 'infra_failure' };
    }
  }

  // ─── Private ──────────────────────────────────────────────────

  private async runTurn(
    inbound: InboundTurn,
    trace: TraceContext,
    log: Logger,
  ): Promise<TurnResult> {
    const { identity } = inbound;

    // 1. Customer, and a location update on their profile
    const spanLoad = startSpan(trace, 'context.load');
    let customer = await this.repo.getOrCreateCustomer(identity);
    if (!customer.name && inbound.contactName) {
      customer = await this.repo.updateCustomer(customer.id, { name: inbound.contactName });
      log.info('Customer name taken from WhatsApp profile');
    }
    const carriedPatch: SessionPatch = {};
    let userText: string;

    if (inbound.content.kind === 'location') {
      const { latitude, longitude } = inbound.content;
      customer = await this.repo.updateCustomer(customer.id, { latitude, longitude });
      carriedPatch.location = { latitude, longitude };
      carriedPatch.pendingLocation = false;
      userText = `[Location shared: ${latitude}, ${longitude}]`;
      log.info('Customer location updated');
    } else if (inbound.content.kind === 'text') {
      userText = inbound.content.text;
    } else {
      return { reply: null, outcome: 'ignored' };
    }

    // 2. History comes from the session transcript, so it lapses with the
    // idle timeout. It is read before the current turn is appended.
    const stored = (await this.sessions.get(identity)) ?? {};
    const history = (stored.transcript ?? [])
      .slice(-this.historyTurns)
      .map((entry): HistoryTurn => ({ role: entry.role, text: entry.text }));
    await this.repo.appendConversation({ customerId: customer.id, role: 'user', message: userText });

    // 3. Session view for this turn: stored keys, profile name, carried location
    const view: SessionRecord = {
      ...stored,
      ...carriedPatch,
      customerName: customer.name ?? stored.customerName,
    };

    const menu = await this.repo.listMenuItems();
    const catalogText = formatMenuForPrompt(menu);

    // 4. Feedback policy against the most recent order
    const feedbackDue = await this.applyFeedbackPolicy(customer, view);
    endSpan(spanLoad);

    // 5. Generate
    const prompt = buildPrompt({
      systemPrompt: this.prompts.renderSystemPrompt(),
      history,
      userMessage: userText,
      session: view,
      catalogText,
      feedbackDue,
      historyTurns: this.historyTurns,
    });

    const spanLlm = startSpan(trace, 'llm.generate');
    let generation: GenerationResult;
    try {
      generation = await this.agent.generate(prompt, trace.requestId);
      endSpan(spanLlm);
    } catch (err) {
      endSpan(spanLlm, 'error');
      log.error({ err, retryable: isRetryable(err) }, 'Generation failed; sending apology');
      await this.keepCarriedState(identity, carriedPatch, log);
      return { reply: APOLOGY_REPLY, outcome: 'backend_failure' };
    }

    // 6. Usage accounting runs beside the action pipeline
    const charge = await this.recordUsage(generation, identity, log);

    // 7. Codec
    const parsed = parseModelOutput(generation.text);
    actionExtractions.inc({ kind: parsed.extraction.kind });
    if (parsed.extraction.kind === 'malformed') {
      log.warn({ tag: parsed.extraction.tag, reason: parsed.extraction.reason }, 'Action block could not be decoded');
    }
    if (parsed.usedFallback) {
      log.warn({ rawLength: generation.text.length }, 'Reply prose empty or too short; using fallback');
    }

    // 8. Dispatch
    let dispatch: DispatchOutcome | undefined;
    if (parsed.extraction.kind === 'action') {
      const spanDispatch = startSpan(trace, 'action.dispatch', { action: parsed.extraction.action.type });
      dispatch = await this.dispatcher.dispatch(parsed.extraction.action, {
        identity,
        customer,
        session: view,
        requestId: trace.requestId,
      });
      endSpan(spanDispatch, dispatch.ok ? 'ok' : 'error');
    }

    // 9. Session write, strictly after dispatch. From here on the reply
    // is already decided, so store failures are logged and the reply still goes out.
    const patch: SessionPatch = { ...carriedPatch, ...(dispatch?.ok ? dispatch.value.sessionPatch : {}) };
    try {
      await this.writeSession(identity, patch, userText, parsed.reply, log);
    } catch (err) {
      log.error({ err, patchedKeys: Object.keys(patch) }, 'Session write failed after dispatch');
    }

    // 10. Persist the assistant turn with what it cost
    try {
      await this.repo.appendConversation({
        customerId: customer.id,
        role: 'assistant',
        message: parsed.reply,
        promptSent: generation.promptSent,
        tokensInput: generation.inputTokens,
        tokensOutput: generation.outputTokens,
        costDisplay: charge.totalCostDisplay,
      });
    } catch (err) {
      log.error({ err }, 'Failed to persist assistant turn');
    }

    return {
      reply: parsed.reply,
      outcome: 'ok',
      extraction: parsed.extraction.kind,
      dispatch,
      usedFallback: parsed.usedFallback,
    };
  }

  /**
   * Surfaces a feedback-due order on the session view for this turn only.
   * The flag is persisted as cleared once save_feedback is dispatched.
   */
  private async applyFeedbackPolicy(customer: Customer, view: SessionRecord): Promise<boolean> {
    const lastOrder = await this.repo.getLastOrder(customer.id);
    if (!lastOrder || !isFeedbackDue(lastOrder, this.now(), this.feedbackDelayMinutes)) {
      return false;
    }
    view.shouldRequestFeedback = true;
    view.lastOrder = {
      id: lastOrder.id,
      items: lastOrder.items,
      total: lastOrder.totalPrice,
      type: lastOrder.orderType,
      completedAt: lastOrder.completedAt,
    };
    return true;
  }

  /** A failed counter update must not cost the customer their reply. */
  private async recordUsage(generation: GenerationResult, identity: string, log: Logger): Promise<UsageCharge> {
    try {
      return await this.usage.record(generation.inputTokens, generation.outputTokens, identity);
    } catch (err) {
      log.error({ err }, 'Usage accounting failed; continuing turn');
      return computeCharge(generation.inputTokens, generation.outputTokens, this.pricing);
    }
  }

  /** A shared location stays on the session even when the turn produced no reply. */
  private async keepCarriedState(identity: string, carriedPatch: SessionPatch, log: Logger): Promise<void> {
    if (Object.keys(carriedPatch).length === 0) return;
    try {
      await this.sessions.update(identity, carriedPatch);
    } catch (err) {
      log.error({ err, patchedKeys: Object.keys(carriedPatch) }, 'Session write failed after generation failure');
    }
  }

  private async writeSession(
    identity: string,
    patch: SessionPatch,
    userText: string,
    reply: string,
    log: Logger,
  ): Promise<void> {
    if (Object.keys(patch).length > 0) {
      await this.sessions.update(identity, patch);
    }
    await this.sessions.appendTranscript(identity, 'user', userText);
    await this.sessions.appendTranscript(identity, 'assistant', reply);
    log.debug({ patchedKeys: Object.keys(patch) }, 'Session written');
  }
}
