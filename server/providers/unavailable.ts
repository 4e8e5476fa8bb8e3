import type {
  InterviewResponder,
  TranscriptionProvider,
  TranscriptionSession,
} from "../voice-session/types";

// Stand-ins used when an API key is missing, so sessions still run in text
// mode and surface a clear error for the missing capability.

export class UnavailableTranscriptionProvider implements TranscriptionProvider {
  readonly name = "unavailable";

  constructor(private readonly reason: string) {}

  async openSession(): Promise<TranscriptionSession> {
    throw new Error(`Transcription is not configured: ${this.reason}`);
  }
}

export class UnavailableInterviewer implements InterviewResponder {
  constructor(private readonly reason: string) {}

  async respond(): Promise<string> {
    throw new Error(`Interview replies are not configured: ${this.reason}`);
  }
}
