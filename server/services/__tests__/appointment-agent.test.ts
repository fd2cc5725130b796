import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { MemStorage } from "../../storage";
import {
  AppointmentAgent,
  detectAppointmentOperation,
  extractAppointmentAction,
  extractAppointmentId,
  formatDateTime,
  parseUtcDateTime,
} from "../appointment-agent";
import type { ChatCompletionClient, ChatMessage, ChatOptions, ChatResponse } from "../llm-provider";

const NOW = new Date("2026-03-02T09:00:00Z");
const PATIENT_ID = 7;

function scriptedClient(content: string) {
  const chat = vi.fn(async (_messages: ChatMessage[], _options?: ChatOptions): Promise<ChatResponse> => ({ content }));
  const client: ChatCompletionClient = { chat };
  return { client, chat };
}

describe("detectAppointmentOperation", () => {
  it.each([
    ["Please cancel my appointment", "cancel"],
    ["please remove my appointment", "cancel"],
    ["Can you reschedule my visit?", "update"],
    ["Move appointment #3 to Friday", "update"],
    ["Show my appointments", "list"],
    ["When is my next appointment?", "list"],
    ["I want to book a checkup", "create"],
  ])("%s -> %s", (message, operation) => {
    expect(detectAppointmentOperation(message)).toBe(operation);
  });
});

describe("extractAppointmentId", () => {
  it("reads ids written with a hash or after the word appointment", () => {
    expect(extractAppointmentId("cancel #12 please")).toBe(12);
    expect(extractAppointmentId("cancel appointment 4")).toBe(4);
    expect(extractAppointmentId("cancel appointment number 9")).toBe(9);
    expect(extractAppointmentId("cancel my appointment")).toBeNull();
  });
});

describe("extractAppointmentAction", () => {
  it("removes the action object and its code fence from the reply", () => {
    const reply =
      'Great, I have everything I need.\n```json\n{"action":"book_appointment","appointment_details":{"doctor_name":"Dr. Rivera","scheduled_time":"2026-03-05T14:30:00Z"}}\n```';

    const { action, text } = extractAppointmentAction(reply);

    expect(text).toBe("Great, I have everything I need.");
    expect(action).toEqual({
      action: "book_appointment",
      appointment_details: {
        appointment_type: "consultation",
        doctor_name: "Dr. Rivera",
        scheduled_time: "2026-03-05T14:30:00Z",
        is_virtual: false,
        duration_minutes: 30,
      },
    });
  });

  it("leaves replies without a valid action untouched", () => {
    expect(extractAppointmentAction("Which doctor would you like to see? {not json}")).toEqual({
      action: null,
      text: "Which doctor would you like to see? {not json}",
    });
  });
});

describe("parseUtcDateTime", () => {
  it("reads a date-time without a zone as UTC", () => {
    expect(parseUtcDateTime("2026-03-05T14:30:00").toISOString()).toBe("2026-03-05T14:30:00.000Z");
  });

  it("keeps an explicit zone", () => {
    expect(parseUtcDateTime("2026-03-05T14:30:00Z").toISOString()).toBe("2026-03-05T14:30:00.000Z");
    expect(parseUtcDateTime("2026-03-05T14:30:00-05:00").toISOString()).toBe("2026-03-05T19:30:00.000Z");
  });
});

describe("formatDateTime", () => {
  it("renders minutes precision in UTC", () => {
    expect(formatDateTime("2026-03-05T14:30:00.000Z")).toBe("2026-03-05 14:30 UTC");
  });
});

describe("AppointmentAgent", () => {
  let storage: MemStorage;

  beforeEach(() => {
    storage = new MemStorage();
  });

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  function agentWith(client: ChatCompletionClient) {
    return new AppointmentAgent(client, storage, { maxDaysAhead: 90, now: () => NOW });
  }

  function seedAppointment(patientId = PATIENT_ID) {
    return storage.createAppointment({
      patientId,
      doctorName: "Dr. Rivera",
      appointmentType: "consultation",
      scheduledTime: "2026-03-05T14:30:00.000Z",
      durationMinutes: 30,
      isVirtual: false,
    });
  }

  it("books an appointment once the LLM emits the booking action", async () => {
    const { client } = scriptedClient(
      'Great, I have everything I need.\n```json\n{"action":"book_appointment","appointment_details":{"doctor_name":"Dr. Rivera","scheduled_time":"2026-03-05T14:30:00Z","reason":"knee pain"}}\n```'
    );

    const outcome = await agentWith(client).handle({
      message: "I'd like to see Dr. Rivera on March 5 at 2:30pm for knee pain",
      history: [],
      patientId: PATIENT_ID,
    });

    expect(outcome.success).toBe(true);
    if (!outcome.success) return;
    expect(outcome.data.message).toBe(
      "Great, I have everything I need.\n\nYour appointment is booked.\n" +
        "Appointment #1: consultation with Dr. Rivera on 2026-03-05 14:30 UTC (in person, scheduled)"
    );
    expect(outcome.data.appointment?.action).toBe("create");
    const stored = await storage.listAppointments(PATIENT_ID);
    expect(stored).toHaveLength(1);
    expect(stored[0].reason).toBe("knee pain");
  });

  it("books a time given without a zone in UTC regardless of the server zone", async () => {
    vi.stubEnv("TZ", "America/New_York");
    const { client } = scriptedClient(
      '{"action":"book_appointment","appointment_details":{"doctor_name":"Dr. Rivera","scheduled_time":"2026-03-05T14:30:00"}}'
    );

    const outcome = await agentWith(client).handle({ message: "book me in", history: [], patientId: PATIENT_ID });

    expect(outcome.success && outcome.data.message).toBe(
      "Your appointment is booked.\n" +
        "Appointment #1: consultation with Dr. Rivera on 2026-03-05 14:30 UTC (in person, scheduled)"
    );
    expect((await storage.getAppointment(1))?.scheduledTime).toBe("2026-03-05T14:30:00.000Z");
  });

  it("asks the LLM for UTC times with a Z suffix", async () => {
    const { client, chat } = scriptedClient("Which doctor would you like to see?");

    await agentWith(client).handle({ message: "I need a checkup", history: [], patientId: PATIENT_ID });

    const [messages] = chat.mock.calls[0];
    expect(messages[0].content).toContain('"scheduled_time": "YYYY-MM-DDTHH:MM:SSZ"');
    expect(messages[0].content).toContain("Current date and time (UTC): 2026-03-02T09:00:00");
  });

  it("asks follow-up questions when the LLM has no action yet", async () => {
    const { client, chat } = scriptedClient("Which doctor would you like to see?");

    const outcome = await agentWith(client).handle({
      message: "I need a checkup",
      history: [{ role: "user", text: "hi" }],
      patientId: PATIENT_ID,
    });

    expect(outcome).toEqual({ success: true, data: { message: "Which doctor would you like to see?" } });
    const [messages, options] = chat.mock.calls[0];
    expect(messages[0].role).toBe("system");
    expect(messages.slice(1)).toEqual([
      { role: "user", content: "hi" },
      { role: "user", content: "I need a checkup" },
    ]);
    expect(options?.temperature).toBe(0.3);
  });

  it("refuses to book a time in the past", async () => {
    const { client } = scriptedClient(
      '{"action":"book_appointment","appointment_details":{"doctor_name":"Dr. Rivera","scheduled_time":"2026-03-01T10:00:00Z"}}'
    );

    const outcome = await agentWith(client).handle({ message: "book me in", history: [], patientId: PATIENT_ID });

    expect(outcome).toEqual({
      success: true,
      data: { message: "That time has already passed. Please choose a future date and time." },
    });
    expect(await storage.listAppointments(PATIENT_ID)).toEqual([]);
  });

  it("refuses to book beyond the booking window", async () => {
    const { client } = scriptedClient(
      '{"action":"book_appointment","appointment_details":{"doctor_name":"Dr. Rivera","scheduled_time":"2026-09-01T10:00:00Z"}}'
    );

    const outcome = await agentWith(client).handle({ message: "book me in", history: [], patientId: PATIENT_ID });

    expect(outcome.success && outcome.data.message).toBe(
      "Appointments can be booked at most 90 days ahead. Please choose an earlier date."
    );
  });

  it("reschedules an existing appointment", async () => {
    await seedAppointment();
    const { client } = scriptedClient(
      '{"action":"update_appointment","appointment_id":1,"updates":{"scheduled_time":"2026-03-06T09:00:00Z"}}'
    );

    const outcome = await agentWith(client).handle({
      message: "Can you move appointment #1 to Friday at 9?",
      history: [],
      patientId: PATIENT_ID,
    });

    expect(outcome.success && outcome.data.message).toBe(
      "Your appointment has been updated.\n" +
        "Appointment #1: consultation with Dr. Rivera on 2026-03-06 09:00 UTC (in person, scheduled)"
    );
  });

  it("lists appointments without calling the LLM", async () => {
    await seedAppointment();
    const { client, chat } = scriptedClient("unused");

    const outcome = await agentWith(client).handle({ message: "show my appointments", history: [], patientId: PATIENT_ID });

    expect(outcome.success && outcome.data.message).toBe(
      "Here are your appointments:\n\n" +
        "- Appointment #1: consultation with Dr. Rivera on 2026-03-05 14:30 UTC (in person, scheduled)"
    );
    expect(chat).not.toHaveBeenCalled();
  });

  it("reports an empty appointment list", async () => {
    const { client } = scriptedClient("unused");

    const outcome = await agentWith(client).handle({ message: "show my appointments", history: [], patientId: PATIENT_ID });

    expect(outcome.success && outcome.data.message).toBe(
      "You don't have any upcoming appointments. Would you like to book one?"
    );
  });

  it("cancels an appointment by number", async () => {
    await seedAppointment();
    const { client, chat } = scriptedClient("unused");

    const outcome = await agentWith(client).handle({
      message: "please cancel appointment #1",
      history: [],
      patientId: PATIENT_ID,
    });

    expect(outcome.success && outcome.data.message).toBe(
      "Appointment #1 with Dr. Rivera on 2026-03-05 14:30 UTC has been cancelled."
    );
    expect((await storage.getAppointment(1))?.status).toBe("cancelled");
    expect(await storage.listAppointments(PATIENT_ID)).toEqual([]);
    expect(chat).not.toHaveBeenCalled();
  });

  it("does not cancel another patient's appointment", async () => {
    await seedAppointment(99);
    const { client } = scriptedClient("unused");

    const outcome = await agentWith(client).handle({ message: "cancel #1", history: [], patientId: PATIENT_ID });

    expect(outcome.success && outcome.data.message).toBe("I couldn't find appointment #1 on your account.");
    expect((await storage.getAppointment(1))?.status).toBe("scheduled");
  });

  it("returns a dependency error when the LLM call fails", async () => {
    const chat = vi.fn(async (_messages: ChatMessage[], _options?: ChatOptions): Promise<ChatResponse> => {
      throw new Error("rate limited");
    });

    const outcome = await agentWith({ chat }).handle({ message: "book a checkup", history: [], patientId: PATIENT_ID });

    expect(outcome.success).toBe(false);
    if (!outcome.success) {
      expect(outcome.error.kind).toBe("unavailable");
    }
  });
});
