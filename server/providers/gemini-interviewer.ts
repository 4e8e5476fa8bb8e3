import { GoogleGenAI, type GenerateContentParameters } from "@google/genai";
import type {
  InterviewRequest,
  InterviewResponder,
  InterviewTurn,
} from "../voice-session/types";

/** The slice of the SDK this adapter calls; `ai.models` satisfies it. */
export interface GenerateContentApi {
  generateContent(params: GenerateContentParameters): Promise<{ text?: string | undefined }>;
}

export type GeminiInterviewerOptions = {
  apiKey?: string;
  model?: string;
  api?: GenerateContentApi;
  maxRetries?: number;
  retryBaseDelayMs?: number;
};

const MAX_TRANSCRIPT_TURNS = 20;

function statusOf(error: unknown): number | null {
  if (typeof error === "object" && error !== null && "status" in error) {
    return typeof error.status === "number" ? error.status : null;
  }
  return null;
}

function isRetryable(error: unknown): boolean {
  const status = statusOf(error);
  return status === 429 || status === 500 || status === 503;
}

export function buildSystemInstruction(request: InterviewRequest): string {
  const { context } = request;
  const company = context.targetCompany ?? "a company of their choice";
  return [
    `You are a friendly but rigorous interview coach running a mock ${context.targetRole} interview for ${company}.`,
    `Candidate: ${context.summary}`,
    `Plan roughly ${context.suggestedQuestionCount} questions over about ${context.estimatedDurationMinutes} minutes, matched to the candidate's experience level.`,
    "Your reply is spoken aloud: keep it to two or three short sentences, plain text, no lists or markdown.",
    "Briefly react to the candidate's last answer, then ask exactly one next question.",
    "If the candidate asks to stop, thank them and give two concrete pieces of feedback.",
  ].join("\n");
}

export function formatTranscript(history: InterviewTurn[], utterance: string): string {
  const recent = history.slice(-MAX_TRANSCRIPT_TURNS);
  const lines = recent.map(
    (turn) => `${turn.speaker === "coach" ? "Coach" : "Candidate"}: ${turn.text}`,
  );
  lines.push(`Candidate: ${utterance}`);
  return `Conversation so far:\n${lines.join("\n")}\n\nReply as the coach.`;
}

export class GeminiInterviewer implements InterviewResponder {
  private readonly api: GenerateContentApi;
  private readonly model: string;
  private readonly maxRetries: number;
  private readonly retryBaseDelayMs: number;

  constructor(options: GeminiInterviewerOptions) {
    if (options.api) {
      this.api = options.api;
    } else {
      if (!options.apiKey) {
        throw new Error("GEMINI_API_KEY environment variable is required");
      }
      this.api = new GoogleGenAI({ apiKey: options.apiKey }).models;
    }
    this.model = options.model ?? "gemini-2.5-flash";
    this.maxRetries = options.maxRetries ?? 3;
    this.retryBaseDelayMs = options.retryBaseDelayMs ?? 1000;
  }

  async respond(request: InterviewRequest): Promise<string> {
    const params: GenerateContentParameters = {
      model: this.model,
      contents: [
        {
          role: "user",
          parts: [{ text: formatTranscript(request.history, request.utterance) }],
        },
      ],
      config: {
        systemInstruction: buildSystemInstruction(request),
        temperature: 0.7,
        maxOutputTokens: 300,
      },
    };

    let lastError: unknown = new Error("Unknown error");
    for (let attempt = 0; attempt < this.maxRetries; attempt++) {
      try {
        const response = await this.api.generateContent(params);
        const text = response.text?.trim();
        if (!text) {
          throw new Error("Interview model returned an empty reply");
        }
        return text;
      } catch (error) {
        lastError = error;
        console.error(
          `[Interviewer] Attempt ${attempt + 1}/${this.maxRetries} failed:`,
          error instanceof Error ? error.message : error,
        );
        if (!isRetryable(error) || attempt === this.maxRetries - 1) break;
        const delay = Math.pow(2, attempt) * this.retryBaseDelayMs;
        await new Promise((resolve) => setTimeout(resolve, delay));
      }
    }
    throw lastError;
  }
}
