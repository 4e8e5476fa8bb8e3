import { describe, it, expect, vi } from "vitest";
import type { GenerateContentParameters } from "@google/genai";
import type { SpeechCreateParams } from "openai/resources/audio/speech";
import type { InterviewContext } from "@shared/types/profiling";
import {
  GeminiInterviewer,
  buildSystemInstruction,
  formatTranscript,
} from "../providers/gemini-interviewer";
import {
  OpenAISpeechSynthesizer,
  SynthesisError,
  describePitch,
} from "../providers/openai-speech";
import {
  UnavailableInterviewer,
  UnavailableTranscriptionProvider,
} from "../providers/unavailable";
import {
  DEFAULT_VOICE_ID,
  listVoicePresets,
  resolveVoice,
} from "../providers/voice-catalog";
import type { InterviewRequest } from "../voice-session/types";

function bytes(values: number[]): ArrayBuffer {
  const buffer = new ArrayBuffer(values.length);
  new Uint8Array(buffer).set(values);
  return buffer;
}

function httpError(message: string, status: number): Error {
  return Object.assign(new Error(message), { status });
}

describe("voice catalog", () => {
  it("lists eight presets without provider details", () => {
    const presets = listVoicePresets();

    expect(presets).toHaveLength(8);
    expect(presets[0]).toEqual({
      id: "neural2_female",
      displayName: "Priya",
      description: "Warm, encouraging female voice",
      gender: "female",
    });
  });

  it("falls back to the default preset for unknown ids", () => {
    expect(resolveVoice("robot_voice").id).toBe(DEFAULT_VOICE_ID);
    expect(resolveVoice(undefined).id).toBe(DEFAULT_VOICE_ID);
    expect(resolveVoice("wavenet_male").providerVoice).toBe("onyx");
  });
});

describe("OpenAISpeechSynthesizer", () => {
  function createSynthesizer() {
    const create = vi.fn(async (_params: SpeechCreateParams) => ({
      arrayBuffer: async () => bytes([1, 2, 3]),
    }));
    return { create, synthesizer: new OpenAISpeechSynthesizer({ api: { create } }) };
  }

  it("maps the preset, rate and pitch onto the request", () => {
    const { synthesizer } = createSynthesizer();

    expect(
      synthesizer.buildParams({ text: "Hello", voice: "neural2_female", speakingRate: 5, pitch: 5 }),
    ).toEqual({
      model: "gpt-4o-mini-tts",
      voice: "coral",
      input: "Hello",
      speed: 4,
      response_format: "mp3",
      instructions:
        "Speak English with a gentle Indian accent, warm and encouraging. " +
        "Use a slightly higher pitch than usual.",
    });
  });

  it("returns mp3 audio", async () => {
    const { synthesizer, create } = createSynthesizer();

    const speech = await synthesizer.synthesize({
      text: "  Tell me about yourself.  ",
      voice: "neural2_male",
      speakingRate: 0.9,
      pitch: 0,
    });

    expect(speech).toEqual({ audio: Buffer.from([1, 2, 3]), mimeType: "audio/mpeg" });
    expect(create).toHaveBeenCalledWith(
      expect.objectContaining({ input: "Tell me about yourself.", voice: "ash", speed: 0.9 }),
    );
  });

  it("rejects empty text without calling the API", async () => {
    const { synthesizer, create } = createSynthesizer();

    await expect(
      synthesizer.synthesize({ text: "   ", voice: "neural2_male", speakingRate: 1, pitch: 0 }),
    ).rejects.toBeInstanceOf(SynthesisError);
    expect(create).not.toHaveBeenCalled();
  });

  it("wraps API failures", async () => {
    const failure = new Error("rate limited");
    const synthesizer = new OpenAISpeechSynthesizer({
      api: {
        create: async () => {
          throw failure;
        },
      },
    });

    const error = await synthesizer
      .synthesize({ text: "Hi", voice: "neural2_male", speakingRate: 1, pitch: 0 })
      .catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(SynthesisError);
    expect(error).toMatchObject({ message: "Speech synthesis failed: rate limited", cause: failure });
  });

  it("describes pitch offsets as delivery hints", () => {
    expect(describePitch(0)).toBeNull();
    expect(describePitch(2.9)).toBeNull();
    expect(describePitch(-3)).toBe("Use a slightly lower pitch than usual.");
    expect(describePitch(12)).toBe("Use a noticeably higher pitch than usual.");
  });

  it("requires an API key when no client is injected", () => {
    expect(() => new OpenAISpeechSynthesizer({})).toThrow(
      "OPENAI_API_KEY is required for speech synthesis",
    );
  });
});

describe("GeminiInterviewer", () => {
  const context: InterviewContext = {
    summary: "Current role: Student. Preparing for a Product Manager interview at Razorpay.",
    currentRole: "Student",
    background: "third year at BITS Pilani",
    targetRole: "Product Manager",
    targetCompany: "Razorpay",
    suggestedQuestionCount: 6,
    estimatedDurationMinutes: 12,
  };

  const request: InterviewRequest = {
    utterance: "I led the product club's hackathon.",
    profile: {
      role: "Student",
      experienceLevel: "third year",
      targetRole: "Product Manager",
      targetCompany: "Razorpay",
      educationDetails: "third year at BITS Pilani",
    },
    context,
    history: [
      { speaker: "coach", text: "Tell me about a project you led." },
    ],
  };

  function createApi(...replies: Array<() => Promise<{ text?: string }>>) {
    let call = 0;
    return {
      generateContent: vi.fn(async (_params: GenerateContentParameters) => {
        const reply = replies[Math.min(call, replies.length - 1)];
        call += 1;
        return reply();
      }),
    };
  }

  it("formats the conversation for the model", () => {
    expect(formatTranscript(request.history, request.utterance)).toBe(
      "Conversation so far:\n" +
        "Coach: Tell me about a project you led.\n" +
        "Candidate: I led the product club's hackathon.\n\n" +
        "Reply as the coach.",
    );
  });

  it("keeps only the most recent turns", () => {
    const history = Array.from({ length: 25 }, (_, i) => ({
      speaker: "candidate" as const,
      text: `answer ${i}`,
    }));

    const transcript = formatTranscript(history, "latest");

    expect(transcript).not.toContain("answer 4\n");
    expect(transcript).toContain("Candidate: answer 5\n");
  });

  it("tailors the system instruction to the target role and company", () => {
    expect(buildSystemInstruction(request).split("\n")[0]).toBe(
      "You are a friendly but rigorous interview coach running a mock Product Manager interview for Razorpay.",
    );
  });

  it("returns the trimmed reply", async () => {
    const api = createApi(async () => ({ text: "  Nice. What was the hardest trade-off?  " }));
    const interviewer = new GeminiInterviewer({ api });

    await expect(interviewer.respond(request)).resolves.toBe(
      "Nice. What was the hardest trade-off?",
    );
    expect(api.generateContent).toHaveBeenCalledWith(
      expect.objectContaining({
        model: "gemini-2.5-flash",
        config: expect.objectContaining({ temperature: 0.7, maxOutputTokens: 300 }),
      }),
    );
  });

  it("retries rate limits with backoff", async () => {
    const api = createApi(
      async () => {
        throw httpError("rate limited", 429);
      },
      async () => ({ text: "Go on." }),
    );
    const interviewer = new GeminiInterviewer({ api, retryBaseDelayMs: 0 });

    await expect(interviewer.respond(request)).resolves.toBe("Go on.");
    expect(api.generateContent).toHaveBeenCalledTimes(2);
  });

  it("gives up after the retry budget", async () => {
    const api = createApi(async () => {
      throw httpError("unavailable", 503);
    });
    const interviewer = new GeminiInterviewer({ api, retryBaseDelayMs: 0, maxRetries: 3 });

    await expect(interviewer.respond(request)).rejects.toThrow("unavailable");
    expect(api.generateContent).toHaveBeenCalledTimes(3);
  });

  it("does not retry other failures", async () => {
    const api = createApi(async () => {
      throw httpError("bad request", 400);
    });
    const interviewer = new GeminiInterviewer({ api, retryBaseDelayMs: 0 });

    await expect(interviewer.respond(request)).rejects.toThrow("bad request");
    expect(api.generateContent).toHaveBeenCalledTimes(1);
  });

  it("treats an empty reply as a failure", async () => {
    const api = createApi(async () => ({ text: "   " }));
    const interviewer = new GeminiInterviewer({ api });

    await expect(interviewer.respond(request)).rejects.toThrow(
      "Interview model returned an empty reply",
    );
  });
});

describe("unavailable providers", () => {
  it("explain which capability is missing", async () => {
    await expect(
      new UnavailableTranscriptionProvider("OPENAI_API_KEY is not set").openSession(),
    ).rejects.toThrow("Transcription is not configured: OPENAI_API_KEY is not set");
    await expect(new UnavailableInterviewer("GEMINI_API_KEY is not set").respond()).rejects.toThrow(
      "Interview replies are not configured: GEMINI_API_KEY is not set",
    );
  });
});
