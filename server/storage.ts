import { randomUUID } from "crypto";
import type {
  Appointment,
  AppointmentStatus,
  Conversation,
  ConversationTurn,
  InsertAppointment,
} from "@shared/schema";

export type AppointmentUpdate = Partial<
  Pick<Appointment, "doctorName" | "scheduledTime" | "reason" | "isVirtual" | "status">
>;

export interface IStorage {
  getConversation(id: string): Promise<Conversation | undefined>;
  createConversation(patientId: number): Promise<Conversation>;
  appendTurns(id: string, turns: ConversationTurn[]): Promise<Conversation>;

  listAppointments(patientId: number, options?: { includeCancelled?: boolean }): Promise<Appointment[]>;
  getAppointment(id: number): Promise<Appointment | undefined>;
  createAppointment(input: InsertAppointment): Promise<Appointment>;
  updateAppointment(id: number, update: AppointmentUpdate): Promise<Appointment | undefined>;
}

export class MemStorage implements IStorage {
  private conversations = new Map<string, Conversation>();
  private appointments = new Map<number, Appointment>();
  private nextAppointmentId = 1;

  async getConversation(id: string): Promise<Conversation | undefined> {
    return this.conversations.get(id);
  }

  async createConversation(patientId: number): Promise<Conversation> {
    const now = new Date().toISOString();
    const conversation: Conversation = {
      id: randomUUID(),
      patientId,
      turns: [],
      createdAt: now,
      updatedAt: now,
    };
    this.conversations.set(conversation.id, conversation);
    return conversation;
  }

  async appendTurns(id: string, turns: ConversationTurn[]): Promise<Conversation> {
    const existing = this.conversations.get(id);
    if (!existing) {
      throw new Error(`Conversation ${id} does not exist`);
    }
    const updated: Conversation = {
      ...existing,
      turns: [...existing.turns, ...turns],
      updatedAt: new Date().toISOString(),
    };
    this.conversations.set(id, updated);
    return updated;
  }

  async listAppointments(
    patientId: number,
    { includeCancelled = false }: { includeCancelled?: boolean } = {},
  ): Promise<Appointment[]> {
    return Array.from(this.appointments.values())
      .filter((appointment) => appointment.patientId === patientId)
      .filter((appointment) => includeCancelled || appointment.status !== "cancelled")
      .sort((a, b) => a.scheduledTime.localeCompare(b.scheduledTime));
  }

  async getAppointment(id: number): Promise<Appointment | undefined> {
    return this.appointments.get(id);
  }

  async createAppointment(input: InsertAppointment): Promise<Appointment> {
    const now = new Date().toISOString();
    const status: AppointmentStatus = "scheduled";
    const appointment: Appointment = {
      ...input,
      id: this.nextAppointmentId++,
      status,
      createdAt: now,
      updatedAt: now,
    };
    this.appointments.set(appointment.id, appointment);
    return appointment;
  }

  async updateAppointment(id: number, update: AppointmentUpdate): Promise<Appointment | undefined> {
    const existing = this.appointments.get(id);
    if (!existing) return undefined;
    const updated: Appointment = {
      ...existing,
      ...update,
      updatedAt: new Date().toISOString(),
    };
    this.appointments.set(id, updated);
    return updated;
  }
}
