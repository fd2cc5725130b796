import {
  AppointmentActionSchema,
  type Appointment,
  type AppointmentAction,
  type AppointmentPayload,
  type ConversationTurn
} from '@shared/schema';
import { toDependencyError, type DependencyError } from '../errors';
import type { IStorage } from '../storage';
import logger from '../utils/logger';
import { fail, ok, type Result } from '../utils/result';
import type { ChatCompletionClient, ChatMessage } from './llm-provider';

export type AppointmentOperation = 'cancel' | 'update' | 'list' | 'create';

const CANCEL_KEYWORDS = ['cancel', 'delete', 'remove'];
const UPDATE_KEYWORDS = ['reschedule', 'change', 'move', 'update', 'modify'];
const LIST_KEYWORDS = [
  'my appointments', 'list appointments', 'show appointments', 'show my', 'list my',
  'view appointments', 'view my', 'upcoming appointments', 'appointment history',
  'next appointment', 'what appointments', 'see my appointments'
];

export interface AppointmentRequest {
  message: string;
  history: ConversationTurn[];
  patientId: number;
  signal?: AbortSignal;
}

export interface AppointmentReply {
  message: string;
  appointment?: AppointmentPayload;
}

export interface AppointmentAgentOptions {
  maxDaysAhead: number;
  now?: () => Date;
}

// Keywords match at the start of a word, so "move" is not found in "remove".
function mentionsAny(text: string, keywords: string[]): boolean {
  return keywords.some((keyword) => new RegExp(`\\b${keyword}`).test(text));
}

export function detectAppointmentOperation(message: string): AppointmentOperation {
  const lower = message.toLowerCase();
  if (mentionsAny(lower, CANCEL_KEYWORDS)) return 'cancel';
  if (mentionsAny(lower, UPDATE_KEYWORDS)) return 'update';
  if (mentionsAny(lower, LIST_KEYWORDS)) return 'list';
  return 'create';
}

/** "#12", "appointment 12", "appointment id 12". */
export function extractAppointmentId(message: string): number | null {
  const match = message.match(/(?:#|\bappointment\s+(?:id\s+|number\s+)?)(\d+)/i);
  return match ? Number(match[1]) : null;
}

function findJsonObjects(text: string): Array<{ start: number; end: number }> {
  const spans: Array<{ start: number; end: number }> = [];
  let depth = 0;
  let start = -1;
  let inString = false;
  let escaped = false;

  for (let i = 0; i < text.length; i++) {
    const char = text[i];
    if (inString) {
      if (escaped) escaped = false;
      else if (char === '\\') escaped = true;
      else if (char === '"') inString = false;
      continue;
    }
    if (char === '"' && depth > 0) {
      inString = true;
    } else if (char === '{') {
      if (depth === 0) start = i;
      depth++;
    } else if (char === '}' && depth > 0) {
      depth--;
      if (depth === 0) spans.push({ start, end: i + 1 });
    }
  }
  return spans;
}

/**
 * Pulls the first valid action object out of an LLM reply and returns the
 * reply text with that object (and any code fence around it) removed.
 */
export function extractAppointmentAction(reply: string): { action: AppointmentAction | null; text: string } {
  for (const span of findJsonObjects(reply)) {
    let json: unknown;
    try {
      json = JSON.parse(reply.slice(span.start, span.end));
    } catch {
      continue;
    }
    const parsed = AppointmentActionSchema.safeParse(json);
    if (!parsed.success) continue;

    const text = (reply.slice(0, span.start) + reply.slice(span.end))
      .replace(/```(?:json)?\s*```/g, '')
      .replace(/\n{3,}/g, '\n\n')
      .trim();
    return { action: parsed.data, text };
  }
  return { action: null, text: reply.trim() };
}

const ZONE_SUFFIX = /(?:Z|[+-]\d{2}:?\d{2})$/i;

/** Date-times without a zone designator are read as UTC, not server local time. */
export function parseUtcDateTime(value: string): Date {
  const trimmed = value.trim();
  return new Date(trimmed.includes('T') && !ZONE_SUFFIX.test(trimmed) ? `${trimmed}Z` : trimmed);
}

export function formatDateTime(iso: string): string {
  return `${new Date(iso).toISOString().slice(0, 16).replace('T', ' ')} UTC`;
}

function describeAppointment(appointment: Appointment): string {
  const mode = appointment.isVirtual ? 'virtual' : 'in person';
  return `Appointment #${appointment.id}: ${appointment.appointmentType} with ${appointment.doctorName} on ${formatDateTime(appointment.scheduledTime)} (${mode}, ${appointment.status})`;
}

export class AppointmentAgent {
  private readonly now: () => Date;
  private readonly log = logger.child({ component: 'appointment-agent' });

  constructor(
    private readonly client: ChatCompletionClient,
    private readonly storage: IStorage,
    private readonly options: AppointmentAgentOptions
  ) {
    this.now = options.now ?? (() => new Date());
  }

  async handle(request: AppointmentRequest): Promise<Result<AppointmentReply, DependencyError>> {
    const operation = detectAppointmentOperation(request.message);
    this.log.debug('Appointment operation detected', { operation, patientId: request.patientId });

    switch (operation) {
      case 'list':
        return ok(await this.listAppointments(request.patientId));
      case 'cancel':
        return ok(await this.cancelAppointment(request.patientId, extractAppointmentId(request.message)));
      case 'update':
      case 'create':
        return this.converse(request, operation);
    }
  }

  async listAppointments(patientId: number): Promise<AppointmentReply> {
    const appointments = await this.storage.listAppointments(patientId);
    if (appointments.length === 0) {
      return {
        message: "You don't have any upcoming appointments. Would you like to book one?",
        appointment: { action: 'list', appointments }
      };
    }
    return {
      message: `Here are your appointments:\n\n${appointments.map((a) => `- ${describeAppointment(a)}`).join('\n')}`,
      appointment: { action: 'list', appointments }
    };
  }

  async cancelAppointment(patientId: number, appointmentId: number | null): Promise<AppointmentReply> {
    if (appointmentId === null) {
      const appointments = await this.storage.listAppointments(patientId);
      if (appointments.length === 0) {
        return { message: "You don't have any upcoming appointments to cancel." };
      }
      return {
        message:
          'Which appointment would you like to cancel? Reply with its number, for example "cancel appointment #' +
          `${appointments[0].id}".\n\n${appointments.map((a) => `- ${describeAppointment(a)}`).join('\n')}`,
        appointment: { action: 'list', appointments }
      };
    }

    const existing = await this.storage.getAppointment(appointmentId);
    if (!existing || existing.patientId !== patientId) {
      return { message: `I couldn't find appointment #${appointmentId} on your account.` };
    }
    if (existing.status === 'cancelled') {
      return { message: `Appointment #${appointmentId} is already cancelled.` };
    }

    const cancelled = await this.storage.updateAppointment(appointmentId, { status: 'cancelled' });
    if (!cancelled) {
      return { message: `I couldn't find appointment #${appointmentId} on your account.` };
    }
    this.log.info('Appointment cancelled', { appointmentId, patientId });
    return {
      message: `Appointment #${appointmentId} with ${cancelled.doctorName} on ${formatDateTime(cancelled.scheduledTime)} has been cancelled.`,
      appointment: { action: 'cancel', appointment: cancelled }
    };
  }

  private async converse(
    request: AppointmentRequest,
    operation: 'create' | 'update'
  ): Promise<Result<AppointmentReply, DependencyError>> {
    const existing = await this.storage.listAppointments(request.patientId);
    const messages: ChatMessage[] = [
      { role: 'system', content: this.buildSystemPrompt(operation, existing) },
      ...request.history.map((turn): ChatMessage => ({ role: turn.role, content: turn.text })),
      { role: 'user', content: request.message }
    ];

    let reply: string;
    try {
      const response = await this.client.chat(messages, {
        temperature: 0.3,
        maxTokens: 800,
        signal: request.signal
      });
      reply = response.content;
    } catch (error) {
      return fail(toDependencyError(error));
    }

    const { action, text } = extractAppointmentAction(reply);
    if (!action) {
      return ok({ message: text });
    }
    return ok(await this.applyAction(request.patientId, action, text));
  }

  private async applyAction(patientId: number, action: AppointmentAction, text: string): Promise<AppointmentReply> {
    const prefix = text ? `${text}\n\n` : '';

    if (action.action === 'book_appointment') {
      const details = action.appointment_details;
      const scheduled = this.checkScheduledTime(details.scheduled_time);
      if (typeof scheduled === 'string') {
        return { message: scheduled };
      }
      const appointment = await this.storage.createAppointment({
        patientId,
        doctorName: details.doctor_name,
        appointmentType: details.appointment_type,
        scheduledTime: scheduled.toISOString(),
        durationMinutes: details.duration_minutes,
        reason: details.reason,
        isVirtual: details.is_virtual
      });
      this.log.info('Appointment booked', { appointmentId: appointment.id, patientId });
      return {
        message: `${prefix}Your appointment is booked.\n${describeAppointment(appointment)}`,
        appointment: { action: 'create', appointment }
      };
    }

    const existing = await this.storage.getAppointment(action.appointment_id);
    if (!existing || existing.patientId !== patientId) {
      return { message: `I couldn't find appointment #${action.appointment_id} on your account.` };
    }
    if (existing.status === 'cancelled') {
      return { message: `Appointment #${existing.id} is cancelled and can't be changed. Would you like to book a new one?` };
    }

    const { scheduled_time, doctor_name, reason, is_virtual } = action.updates;
    let scheduledTime: string | undefined;
    if (scheduled_time !== undefined) {
      const scheduled = this.checkScheduledTime(scheduled_time);
      if (typeof scheduled === 'string') {
        return { message: scheduled };
      }
      scheduledTime = scheduled.toISOString();
    }

    const updated = await this.storage.updateAppointment(existing.id, {
      ...(scheduledTime !== undefined && { scheduledTime }),
      ...(doctor_name !== undefined && { doctorName: doctor_name }),
      ...(reason !== undefined && { reason }),
      ...(is_virtual !== undefined && { isVirtual: is_virtual })
    });
    if (!updated) {
      return { message: `I couldn't find appointment #${action.appointment_id} on your account.` };
    }
    this.log.info('Appointment updated', { appointmentId: updated.id, patientId });
    return {
      message: `${prefix}Your appointment has been updated.\n${describeAppointment(updated)}`,
      appointment: { action: 'update', appointment: updated }
    };
  }

  /** The parsed date, or a message explaining why it can't be used. */
  private checkScheduledTime(value: string): Date | string {
    const scheduled = parseUtcDateTime(value);
    if (Number.isNaN(scheduled.getTime())) {
      return `I couldn't understand the time "${value}". Could you give the date and time again?`;
    }
    const now = this.now();
    if (scheduled.getTime() <= now.getTime()) {
      return 'That time has already passed. Please choose a future date and time.';
    }
    const latest = now.getTime() + this.options.maxDaysAhead * 24 * 60 * 60 * 1000;
    if (scheduled.getTime() > latest) {
      return `Appointments can be booked at most ${this.options.maxDaysAhead} days ahead. Please choose an earlier date.`;
    }
    return scheduled;
  }

  private buildSystemPrompt(operation: 'create' | 'update', existing: Appointment[]): string {
    const current = existing.length > 0
      ? existing.map((a) => `- ${describeAppointment(a)}`).join('\n')
      : '- none';

    return `You are an appointment management assistant for a healthcare clinic.

Each booking is independent: always ask which doctor or specialty the patient wants, the date and time, and the reason for the visit. Offer in-person or virtual visits. Default to 30-minute appointments.

${operation === 'create' ? 'The patient wants to book an appointment.' : 'The patient wants to change an existing appointment.'}

When you have ALL required details, include exactly one JSON object in your reply:
{"action": "book_appointment", "appointment_details": {"appointment_type": "consultation", "doctor_name": "Dr. Name", "scheduled_time": "YYYY-MM-DDTHH:MM:SSZ", "reason": "short reason", "is_virtual": false, "duration_minutes": 30}}

To reschedule or change an existing appointment, include:
{"action": "update_appointment", "appointment_id": 5, "updates": {"scheduled_time": "YYYY-MM-DDTHH:MM:SSZ"}}

All times are UTC and must end in "Z".

Do not claim a booking is made unless you include the JSON. Never give a diagnosis.

Patient's current appointments:
${current}

Current date and time (UTC): ${this.now().toISOString().slice(0, 19)}`;
  }
}
