import { randomUUID } from 'crypto';
import type { AppointmentPayload, ChatReply, ChatRequest, Conversation, RoutingDecision } from '@shared/schema';
import { NotFoundError } from '../errors';
import type { IStorage } from '../storage';
import logger from '../utils/logger';
import { sanitizeForLog } from '../utils/sanitizer';
import type { AppointmentAgent } from './appointment-agent';
import type { IntentRouter } from './intent-router';
import type { QnaAgent } from './qna-agent';

export const CLARIFYING_QUESTION =
  'I want to make sure I help with the right thing. Would you like to book or manage an appointment, ' +
  'or do you have a health question I can answer?';

export const APOLOGY_MESSAGE =
  "I'm sorry, I'm having trouble processing your request right now. Please try again later.";

export class ChatService {
  private readonly log = logger.child({ component: 'chat' });

  constructor(
    private readonly router: IntentRouter,
    private readonly qnaAgent: QnaAgent,
    private readonly appointmentAgent: AppointmentAgent,
    private readonly storage: IStorage
  ) {}

  async handle(request: ChatRequest, signal?: AbortSignal): Promise<ChatReply> {
    const existing = request.conversationId ? await this.findConversation(request.conversationId, request.patientId) : undefined;

    // Rejects with InvalidInputError before anything is stored.
    const decision = await this.router.route(request.message, existing?.turns ?? [], { signal });
    const conversation = existing ?? (await this.storage.createConversation(request.patientId));
    const message = request.message.trim();
    this.log.info(`Routed "${sanitizeForLog(message)}"`, {
      intent: decision.intent,
      confidence: decision.confidence,
      source: decision.source
    });

    const { reply, appointment } = await this.dispatch(decision, message, conversation, signal);

    await this.storage.appendTurns(conversation.id, [
      { role: 'user', text: message },
      { role: 'assistant', text: reply }
    ]);

    return {
      message: reply,
      messageId: randomUUID(),
      conversationId: conversation.id,
      intent: decision.intent,
      routingDecision: decision,
      ...(appointment && { appointment })
    };
  }

  private async findConversation(conversationId: string, patientId: number): Promise<Conversation> {
    const conversation = await this.storage.getConversation(conversationId);
    if (!conversation || conversation.patientId !== patientId) {
      throw new NotFoundError('Conversation not found or access denied');
    }
    return conversation;
  }

  private async dispatch(
    decision: RoutingDecision,
    message: string,
    conversation: Conversation,
    signal?: AbortSignal
  ): Promise<{ reply: string; appointment?: AppointmentPayload }> {
    switch (decision.intent) {
      case 'appointment_service': {
        const outcome = await this.appointmentAgent.handle({
          message,
          history: conversation.turns,
          patientId: conversation.patientId,
          signal
        });
        if (!outcome.success) {
          this.log.error('Appointment agent failed', { kind: outcome.error.kind, error: outcome.error.message });
          return { reply: APOLOGY_MESSAGE };
        }
        return { reply: outcome.data.message, appointment: outcome.data.appointment };
      }
      case 'qna_service': {
        const outcome = await this.qnaAgent.generateResponse(message, conversation.turns, signal);
        if (!outcome.success) {
          this.log.error('Q&A agent failed', { kind: outcome.error.kind, error: outcome.error.message });
          return { reply: APOLOGY_MESSAGE };
        }
        return { reply: outcome.data };
      }
      case 'user_decision':
        return { reply: CLARIFYING_QUESTION };
    }
  }
}
