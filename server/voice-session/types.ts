import type { InterviewContext, CandidateProfile } from "@shared/types/profiling";
import type { ServerEvent } from "@shared/schema";
import type { AudioChunk, AudioStreamLease } from "./shared-audio-stream";

// ---------------------------------------------------------------------------
// Transcription
// ---------------------------------------------------------------------------

export type TranscriptEvent = {
  text: string;
  isFinal: boolean;
};

export type TranscriptionHandlers = {
  onTranscript: (event: TranscriptEvent) => void;
  onError: (error: Error) => void;
  onConnectionChange?: (connected: boolean) => void;
};

export interface TranscriptionSession {
  sendAudio(chunk: AudioChunk): void;
  /** Signals the end of the utterance; results may still arrive afterwards. */
  finalize(): Promise<void>;
  close(): void;
}

export interface TranscriptionProvider {
  readonly name: string;
  openSession(handlers: TranscriptionHandlers): Promise<TranscriptionSession>;
}

// ---------------------------------------------------------------------------
// Speech synthesis and playback
// ---------------------------------------------------------------------------

export type VoiceSettings = {
  voice: string;
  speakingRate: number;
  pitch: number;
};

export type SynthesisRequest = VoiceSettings & {
  text: string;
};

export type SynthesizedSpeech = {
  audio: Buffer;
  mimeType: string;
};

export interface SpeechSynthesizer {
  readonly name: string;
  synthesize(request: SynthesisRequest): Promise<SynthesizedSpeech>;
}

export interface PlaybackChannel {
  /** Resolves when the client reports the audio finished playing. */
  playAudio(utteranceId: string, speech: SynthesizedSpeech, estimatedMs: number): Promise<void>;
  /** Asks the client to voice the text with its own synthesiser. */
  speakLocally(utteranceId: string, request: SynthesisRequest, estimatedMs: number): Promise<void>;
  stop(): void;
}

// ---------------------------------------------------------------------------
// Interview replies
// ---------------------------------------------------------------------------

export type InterviewTurn = {
  speaker: "coach" | "candidate";
  text: string;
};

export type InterviewRequest = {
  utterance: string;
  profile: CandidateProfile;
  context: InterviewContext;
  history: InterviewTurn[];
};

export interface InterviewResponder {
  respond(request: InterviewRequest): Promise<string>;
}

// ---------------------------------------------------------------------------
// Client side of the session
// ---------------------------------------------------------------------------

export interface SessionTransport {
  isConnected(): boolean;
  send(event: ServerEvent): void;
}

export interface AudioInput {
  /** Bumped each time the underlying stream is replaced. */
  readonly streamGeneration: number;
  isAvailable(): boolean;
  acquire(owner: string): Promise<AudioStreamLease>;
}
