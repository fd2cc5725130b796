import { z } from "zod";

// Intent routing types
export const INTENT_LABELS = ["scheduling", "qna"] as const;

export const IntentLabelSchema = z.enum(INTENT_LABELS);

export const ServiceIntentSchema = z.enum([
  "appointment_service",
  "qna_service",
  "user_decision",
]);

export const ClassificationSourceSchema = z.enum(["keyword", "llm"]);

export const RouterActionSchema = z.enum([
  "book_appointment",
  "answer_question",
  "ask_user_decision",
]);

export type IntentLabel = z.infer<typeof IntentLabelSchema>;
export type ServiceIntent = z.infer<typeof ServiceIntentSchema>;
export type ClassificationSource = z.infer<typeof ClassificationSourceSchema>;
export type RouterAction = z.infer<typeof RouterActionSchema>;

export const ConversationTurnSchema = z.object({
  role: z.enum(["user", "assistant"]),
  text: z.string(),
});

export type ConversationTurn = z.infer<typeof ConversationTurnSchema>;

export const KeywordListsSchema = z.object({
  scheduling: z.array(z.string()),
  qna: z.array(z.string()),
});

export type KeywordLists = z.infer<typeof KeywordListsSchema>;

// Structured answer requested from the LLM during verification
export const RouterVerdictSchema = z.object({
  intent: IntentLabelSchema,
  rationale: z.string(),
  confidence: z.number().min(0).max(1).optional(),
});

export type RouterVerdict = z.infer<typeof RouterVerdictSchema>;

export interface IntentEvidence {
  keyword: string;
  label: IntentLabel;
  index: number;
}

export interface ClassificationResult {
  intent: ServiceIntent;
  confidence: number;
  source: ClassificationSource;
  counts: Record<IntentLabel, number>;
  evidence: IntentEvidence[];
  rationale: string;
  raw?: RouterVerdict;
}

export interface RoutingDecision extends ClassificationResult {
  action: RouterAction;
}

export const ClassifyRequestSchema = z.object({
  message: z.string(),
  conversation_history: z.array(ConversationTurnSchema).optional(),
});

export type ClassifyRequest = z.infer<typeof ClassifyRequestSchema>;

// Appointment types
export const AppointmentStatusSchema = z.enum([
  "scheduled",
  "confirmed",
  "completed",
  "cancelled",
]);

export type AppointmentStatus = z.infer<typeof AppointmentStatusSchema>;

export const AppointmentSchema = z.object({
  id: z.number(),
  patientId: z.number(),
  doctorName: z.string(),
  appointmentType: z.string(),
  scheduledTime: z.string(),
  durationMinutes: z.number(),
  status: AppointmentStatusSchema,
  reason: z.string().optional(),
  isVirtual: z.boolean(),
  createdAt: z.string(),
  updatedAt: z.string(),
});

export type Appointment = z.infer<typeof AppointmentSchema>;

export type InsertAppointment = Omit<Appointment, "id" | "status" | "createdAt" | "updatedAt">;

// Booking details the appointment agent asks the LLM to emit
export const AppointmentDetailsSchema = z.object({
  appointment_type: z.string().min(1).default("consultation"),
  doctor_name: z.string().min(1),
  scheduled_time: z.string().min(1),
  reason: z.string().optional(),
  is_virtual: z.boolean().default(false),
  duration_minutes: z.number().int().positive().default(30),
});

export type AppointmentDetails = z.infer<typeof AppointmentDetailsSchema>;

export const AppointmentActionSchema = z.discriminatedUnion("action", [
  z.object({
    action: z.literal("book_appointment"),
    appointment_details: AppointmentDetailsSchema,
  }),
  z.object({
    action: z.literal("update_appointment"),
    appointment_id: z.number().int().positive(),
    updates: z.object({
      scheduled_time: z.string().min(1).optional(),
      doctor_name: z.string().min(1).optional(),
      reason: z.string().optional(),
      is_virtual: z.boolean().optional(),
    }),
  }),
]);

export type AppointmentAction = z.infer<typeof AppointmentActionSchema>;

export interface AppointmentPayload {
  action: "list" | "cancel" | "create" | "update";
  appointments?: Appointment[];
  appointment?: Appointment;
}

// Chat types
export const ChatRequestSchema = z.object({
  message: z.string().max(5000, "Message is too long"),
  conversationId: z.string().optional(),
  patientId: z.number().int().positive(),
});

export type ChatRequest = z.infer<typeof ChatRequestSchema>;

export interface Conversation {
  id: string;
  patientId: number;
  turns: ConversationTurn[];
  createdAt: string;
  updatedAt: string;
}

export interface ChatReply {
  message: string;
  messageId: string;
  conversationId: string;
  intent: ServiceIntent;
  routingDecision: RoutingDecision;
  appointment?: AppointmentPayload;
}
