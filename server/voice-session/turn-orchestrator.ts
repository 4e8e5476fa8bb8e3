import type {
  InterviewContext,
  ProfilingSession,
} from "@shared/types/profiling";
import type {
  TurnMode,
  TurnPhase,
  TurnSnapshot,
  TurnTrigger,
} from "@shared/types/turn-state";
import type { ServerEvent } from "@shared/schema";
import type { EntityExtractor } from "../profiling/entity-extractor";
import { buildInterviewContext } from "../profiling/interview-context";
import {
  createProfilingSession,
  getCurrentQuestion,
  processResponse,
  resetProfilingSession,
} from "../profiling/state-machine";
import {
  createAnalyserLevelSource,
  type AudioLevelSource,
} from "../vad/level-source";
import {
  VoiceActivityDetector,
  type VoiceActivityDetectorOptions,
} from "../vad/voice-activity-detector";
import { PlaybackCancelledError } from "./client-playback";
import { SerialQueue } from "./serial-queue";
import type { AudioChunk, AudioStreamLease } from "./shared-audio-stream";
import type { SpeechOutput } from "./speech-output";
import { TranscriptBuffer } from "./transcript-buffer";
import type {
  AudioInput,
  InterviewResponder,
  InterviewTurn,
  SessionTransport,
  TranscriptEvent,
  TranscriptionProvider,
  TranscriptionSession,
  VoiceSettings,
} from "./types";

export const DEFAULT_TRANSCRIPT_GRACE_MS = 500;
export const INTERVIEW_ERROR_MESSAGE =
  "Error processing your response. Please try again.";
const MAX_HISTORY_ENTRIES = 40;

type ReplySource = "profiling" | "interview" | "system";

type ActiveRecording = {
  token: number;
  trigger: TurnTrigger;
  lease: AudioStreamLease;
  streamGeneration: number;
  session: TranscriptionSession;
  unsubscribe: () => void;
  startedAt: number;
};

type RecordingRefusal = {
  code: "BUSY" | "AI_SPEAKING" | "TRANSPORT_DISCONNECTED" | "MICROPHONE_UNAVAILABLE";
  message: string;
};

export type TurnVadOptions = Omit<
  VoiceActivityDetectorOptions,
  "onSpeechStart" | "onSpeechEnd" | "onError" | "label"
>;

export type TurnOrchestratorOptions = {
  sessionId: string;
  mode: TurnMode;
  voice: VoiceSettings;
  transport: SessionTransport;
  audioInput: AudioInput;
  transcription: TranscriptionProvider;
  speech: SpeechOutput;
  interviewer: InterviewResponder;
  extractor: EntityExtractor;
  graceMs?: number;
  vad?: TurnVadOptions;
  createLevelSource?: (lease: AudioStreamLease) => AudioLevelSource;
};

/**
 * Drives one user's turns: recording, transcription, profiling or interview
 * replies, and speech. Every phase change runs on a per-session serial queue;
 * transcript text and playback acknowledgements only feed the task that is
 * currently running.
 */
export class TurnOrchestrator {
  readonly sessionId: string;

  private readonly transport: SessionTransport;
  private readonly audioInput: AudioInput;
  private readonly transcription: TranscriptionProvider;
  private readonly speech: SpeechOutput;
  private readonly interviewer: InterviewResponder;
  private readonly extractor: EntityExtractor;
  private readonly graceMs: number;
  private readonly vadOptions: TurnVadOptions;
  private readonly createLevelSource: (lease: AudioStreamLease) => AudioLevelSource;
  private readonly queue: SerialQueue;

  private mode: TurnMode;
  private voice: VoiceSettings;
  private phase: TurnPhase = "idle";
  private isAISpeaking = false;
  private disposed = false;
  private greeted = false;

  private vad: VoiceActivityDetector | null = null;
  private vadGeneration = 0;
  private recording: ActiveRecording | null = null;
  private recordingSeq = 0;
  private listeningToken = 0;
  private readonly transcript = new TranscriptBuffer();
  private graceTimer: ReturnType<typeof setTimeout> | null = null;
  private wakeGrace: (() => void) | null = null;

  private profiling: ProfilingSession = createProfilingSession();
  private interviewContext: InterviewContext | null = null;
  private history: InterviewTurn[] = [];

  constructor(options: TurnOrchestratorOptions) {
    this.sessionId = options.sessionId;
    this.mode = options.mode;
    this.voice = { ...options.voice };
    this.transport = options.transport;
    this.audioInput = options.audioInput;
    this.transcription = options.transcription;
    this.speech = options.speech;
    this.interviewer = options.interviewer;
    this.extractor = options.extractor;
    this.graceMs = options.graceMs ?? DEFAULT_TRANSCRIPT_GRACE_MS;
    this.vadOptions = options.vad ?? {};
    this.createLevelSource = options.createLevelSource ?? ((lease) => createAnalyserLevelSource(lease));
    this.queue = new SerialQueue(`Turn:${options.sessionId}`);
  }

  // -------------------------------------------------------------------------
  // Read-only views
  // -------------------------------------------------------------------------

  getSnapshot(): TurnSnapshot {
    return {
      phase: this.phase,
      mode: this.mode,
      isRecording: this.phase === "recording",
      isAISpeaking: this.isAISpeaking,
      transportConnected: this.transport.isConnected(),
      microphoneAvailable: this.audioInput.isAvailable(),
    };
  }

  getProfilingSession(): ProfilingSession {
    return this.profiling;
  }

  getInterviewContext(): InterviewContext | null {
    return this.interviewContext;
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  /** Resolves once every transition queued so far has run. */
  idle(): Promise<void> {
    return this.queue.drain();
  }

  // -------------------------------------------------------------------------
  // Commands
  // -------------------------------------------------------------------------

  start(): Promise<void> {
    return this.queue.enqueue("start", async () => {
      this.emitState();
      await this.armVad();
    });
  }

  /** Voices the current profiling question once the client can play audio. */
  greet(): Promise<void> {
    return this.queue.enqueue("greet", async () => {
      if (this.greeted || this.phase !== "idle") return;
      this.greeted = true;
      const prompt = getCurrentQuestion(this.profiling.state);
      if (!prompt || this.profiling.completed) return;

      this.vad?.disable();
      await this.respond(prompt, "profiling");
      this.finishTurn();
    });
  }

  startRecording(trigger: TurnTrigger = "user"): Promise<boolean> {
    const refusal = this.recordingRefusal();
    if (refusal) {
      this.reportRefusal(trigger, refusal);
      return Promise.resolve(false);
    }

    let started = false;
    return this.queue
      .enqueue("start-recording", async () => {
        started = await this.beginRecording(trigger);
      })
      .then(() => started);
  }

  stopRecording(trigger: TurnTrigger = "user"): Promise<boolean> {
    let handled = false;
    return this.queue
      .enqueue("stop-recording", async () => {
        handled = await this.endRecording(trigger);
      })
      .then(() => handled);
  }

  /** A typed answer, handled like a transcribed one. */
  submitText(text: string): Promise<void> {
    return this.queue.enqueue("text-input", async () => {
      const utterance = text.trim();
      if (!utterance) return;
      if (this.phase !== "idle") {
        this.sendError("BUSY", "Please wait until the current turn has finished.");
        return;
      }
      this.vad?.disable();
      await this.processUtterance(utterance);
    });
  }

  setMode(mode: TurnMode): Promise<void> {
    return this.queue.enqueue("set-mode", async () => {
      if (mode === this.mode) return;
      this.mode = mode;
      console.log(`[Turn] ${this.sessionId} switched to ${mode} mode`);

      if (mode === "manual") {
        this.releaseVad();
      } else {
        await this.armVad();
      }
      this.emitState();
    });
  }

  setVoice(settings: Partial<VoiceSettings>): void {
    this.voice = {
      voice: settings.voice ?? this.voice.voice,
      speakingRate: settings.speakingRate ?? this.voice.speakingRate,
      pitch: settings.pitch ?? this.voice.pitch,
    };
  }

  resetProfiling(): Promise<void> {
    return this.queue.enqueue("reset-profiling", async () => {
      if (this.phase !== "idle") {
        this.sendError("BUSY", "Profiling can be restarted once the current turn has finished.");
        return;
      }
      this.profiling = resetProfilingSession();
      this.interviewContext = null;
      this.history = [];
      this.greeted = true;
      this.send({
        type: "profiling_update",
        state: this.profiling.state,
        profile: this.profiling.profile,
      });

      const welcome = getCurrentQuestion(this.profiling.state);
      this.vad?.disable();
      if (welcome) await this.respond(welcome, "profiling");
      this.finishTurn();
    });
  }

  handleMicrophoneReady(): Promise<void> {
    return this.queue.enqueue("microphone-ready", async () => {
      const generation = this.audioInput.streamGeneration;
      if (this.vad && this.vadGeneration !== generation) {
        this.releaseVad();
      }
      // The recording's stream is gone; finish the answer captured so far
      if (this.recording && this.recording.streamGeneration !== generation) {
        await this.endRecording("microphone");
      }
      await this.armVad();
      this.emitState();
    });
  }

  handleMicrophoneUnavailable(reason: string): Promise<void> {
    return this.queue.enqueue("microphone-unavailable", async () => {
      this.releaseVad();
      this.sendError(
        "MICROPHONE_UNAVAILABLE",
        `Microphone is unavailable (${reason}). Check browser permissions, or type your answer instead.`,
      );
      if (this.mode === "auto") {
        this.mode = "manual";
      }
      if (this.phase === "recording") {
        await this.endRecording("microphone");
      } else {
        this.emitState();
      }
    });
  }

  handleTransportState(connected: boolean): void {
    if (this.disposed) return;

    if (!connected) {
      console.log(`[Turn] ${this.sessionId} transport disconnected in phase ${this.phase}`);
      this.vad?.disable();
      if (this.phase === "recording") {
        void this.stopRecording("disconnect");
      }
      if (this.isAISpeaking) {
        this.speech.stop();
      }
      return;
    }

    void this.queue.enqueue("transport-restored", async () => {
      this.emitState();
      if (this.phase === "idle") await this.armVad();
    });
  }

  /** Tears the session down. No transition runs afterwards. */
  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    this.queue.close();

    this.releaseVad();

    const recording = this.recording;
    this.recording = null;
    this.listeningToken = 0;
    if (recording) {
      recording.unsubscribe();
      recording.lease.release();
      recording.session.close();
    }

    if (this.graceTimer) {
      clearTimeout(this.graceTimer);
      this.graceTimer = null;
    }
    const wake = this.wakeGrace;
    this.wakeGrace = null;
    wake?.();

    this.speech.stop();
    this.isAISpeaking = false;
    this.phase = "idle";
    console.log(`[Turn] ${this.sessionId} disposed`);
  }

  // -------------------------------------------------------------------------
  // Recording
  // -------------------------------------------------------------------------

  private recordingRefusal(): RecordingRefusal | null {
    if (this.isAISpeaking) {
      return { code: "AI_SPEAKING", message: "Please wait until the coach has finished speaking." };
    }
    if (this.phase !== "idle" || this.disposed) {
      return { code: "BUSY", message: "A turn is already in progress." };
    }
    if (!this.transport.isConnected()) {
      return { code: "TRANSPORT_DISCONNECTED", message: "Not connected to the server." };
    }
    if (!this.audioInput.isAvailable()) {
      return {
        code: "MICROPHONE_UNAVAILABLE",
        message: "No microphone is available. Allow microphone access or type your answer instead.",
      };
    }
    return null;
  }

  private reportRefusal(trigger: TurnTrigger, refusal: RecordingRefusal): void {
    console.log(`[Turn] ${this.sessionId} recording refused (${trigger}): ${refusal.code}`);
    if (trigger === "user") {
      this.sendError(refusal.code, refusal.message);
    }
  }

  private async beginRecording(trigger: TurnTrigger): Promise<boolean> {
    const refusal = this.recordingRefusal();
    if (refusal) {
      this.reportRefusal(trigger, refusal);
      return false;
    }

    let lease: AudioStreamLease;
    const streamGeneration = this.audioInput.streamGeneration;
    try {
      lease = await this.audioInput.acquire("recorder");
    } catch (error) {
      console.warn(`[Turn] ${this.sessionId} could not acquire microphone:`, error);
      this.sendError(
        "MICROPHONE_UNAVAILABLE",
        "No microphone is available. Allow microphone access or type your answer instead.",
      );
      return false;
    }

    // Hold audio that arrives while the transcription session is connecting
    const preRoll = trigger === "vad" ? lease.recentChunks() : [];
    const pending: AudioChunk[] = [];
    let forward: (chunk: AudioChunk) => void = (chunk) => {
      pending.push(chunk);
    };
    const unsubscribe = lease.onChunk((chunk) => forward(chunk));

    this.transcript.clear();
    const token = ++this.recordingSeq;
    this.listeningToken = token;
    this.setPhase("recording");

    let session: TranscriptionSession;
    try {
      session = await this.transcription.openSession({
        onTranscript: (event) => this.handleTranscript(token, event),
        onError: (error) => this.handleTranscriptionError(token, error),
        onConnectionChange: (connected) =>
          this.send({ type: "connection_state_changed", service: "transcription", connected }),
      });
    } catch (error) {
      unsubscribe();
      lease.release();
      pending.length = 0;
      this.listeningToken = 0;
      console.error(`[Turn] ${this.sessionId} transcription unavailable:`, error);
      if (this.disposed) return false;
      this.sendError(
        "TRANSCRIPTION_UNAVAILABLE",
        "Speech recognition is unavailable right now. Please try again or type your answer.",
      );
      this.finishTurn();
      return false;
    }

    if (this.disposed) {
      unsubscribe();
      session.close();
      lease.release();
      return false;
    }

    for (const chunk of [...preRoll, ...pending]) {
      session.sendAudio(chunk);
    }
    pending.length = 0;
    forward = (chunk) => session.sendAudio(chunk);

    this.recording = {
      token,
      trigger,
      lease,
      streamGeneration,
      session,
      unsubscribe,
      startedAt: Date.now(),
    };
    console.log(`[Turn] ${this.sessionId} recording started (${trigger})`);
    return true;
  }

  private async endRecording(trigger: TurnTrigger): Promise<boolean> {
    if (this.phase !== "recording") {
      console.log(`[Turn] ${this.sessionId} stop (${trigger}) ignored in phase ${this.phase}`);
      return false;
    }

    const recording = this.recording;
    this.recording = null;
    this.vad?.disable();
    this.setPhase("awaiting_final");

    if (recording) {
      recording.unsubscribe();
      recording.lease.release();
      console.log(
        `[Turn] ${this.sessionId} recording stopped (${trigger}) after ${Date.now() - recording.startedAt}ms`,
      );
      try {
        await recording.session.finalize();
      } catch (error) {
        console.warn(`[Turn] ${this.sessionId} transcription finalize failed:`, error);
      }
    }

    // Final results may still be in flight after finalize
    await this.sleep(this.graceMs);
    recording?.session.close();
    this.listeningToken = 0;
    if (this.disposed) return false;

    const text = this.transcript.resolve();
    this.transcript.clear();
    if (!text) {
      console.log(`[Turn] ${this.sessionId} no speech detected in turn`);
      this.sendError("NO_SPEECH_DETECTED", "I didn't catch that. Please try again.");
      this.finishTurn();
      return true;
    }

    await this.processUtterance(text);
    return true;
  }

  private handleTranscript(token: number, event: TranscriptEvent): void {
    if (this.disposed || token !== this.listeningToken) return;
    this.transcript.apply(event);
    this.send({
      type: "transcript_update",
      text: event.isFinal ? this.transcript.finalTranscript : event.text,
      isFinal: event.isFinal,
    });
  }

  private handleTranscriptionError(token: number, error: Error): void {
    if (this.disposed || token !== this.listeningToken) return;
    console.error(`[Turn] ${this.sessionId} transcription error:`, error.message);
    this.sendError("TRANSCRIPTION_ERROR", "Speech recognition hit a problem; part of your answer may be missing.");
  }

  // -------------------------------------------------------------------------
  // Processing and speaking
  // -------------------------------------------------------------------------

  private async processUtterance(text: string): Promise<void> {
    this.setPhase("processing");
    this.send({ type: "user_utterance", text });

    const reply = this.profiling.completed
      ? await this.generateInterviewReply(text)
      : this.advanceProfiling(text);

    if (this.disposed) return;
    if (reply) {
      await this.respond(reply.text, reply.source);
    }
    this.finishTurn();
  }

  private advanceProfiling(text: string): { text: string; source: ReplySource } | null {
    const turn = processResponse(this.profiling, text, this.extractor);
    if (!turn) return null;

    this.profiling = turn.session;
    this.remember("candidate", text);

    if (turn.effects.profileUpdated || turn.session.state !== turn.previousState) {
      this.send({
        type: "profiling_update",
        state: turn.session.state,
        profile: turn.session.profile,
      });
    }

    if (turn.effects.profilingCompleted) {
      const context = buildInterviewContext(turn.session.profile);
      this.interviewContext = context;
      console.log(`[Turn] ${this.sessionId} profiling completed: ${context.summary}`);
      this.send({
        type: "profiling_completed",
        success: true,
        profile: turn.session.profile,
        interviewContext: context,
      });
    }

    return turn.prompt ? { text: turn.prompt, source: "profiling" } : null;
  }

  private async generateInterviewReply(
    text: string,
  ): Promise<{ text: string; source: ReplySource } | null> {
    const context = this.interviewContext ?? buildInterviewContext(this.profiling.profile);
    const history = [...this.history];
    this.remember("candidate", text);

    try {
      const reply = await this.interviewer.respond({
        utterance: text,
        profile: this.profiling.profile,
        context,
        history,
      });
      const trimmed = reply.trim();
      return trimmed ? { text: trimmed, source: "interview" } : null;
    } catch (error) {
      console.error(`[Turn] ${this.sessionId} interview reply failed:`, error);
      return { text: INTERVIEW_ERROR_MESSAGE, source: "system" };
    }
  }

  private async respond(text: string, source: ReplySource): Promise<void> {
    this.send({ type: "ai_response", text, source });
    this.remember("coach", text);
    await this.speak(text);
  }

  private async speak(text: string): Promise<void> {
    this.isAISpeaking = true;
    this.setPhase("speaking");
    try {
      const outcome = await this.speech.speak(text, this.voice);
      if (outcome === "fallback") {
        console.log(`[Turn] ${this.sessionId} reply voiced by client-side speech`);
      }
    } catch (error) {
      if (!this.disposed && !(error instanceof PlaybackCancelledError)) {
        console.error(`[Turn] ${this.sessionId} speech failed:`, error);
        this.sendError(
          "SPEECH_UNAVAILABLE",
          "The reply could not be played. It is shown as text instead.",
        );
      }
    } finally {
      this.isAISpeaking = false;
    }
  }

  private finishTurn(): void {
    if (this.disposed) return;
    this.setPhase("idle");
    if (this.mode === "auto" && this.vad && this.transport.isConnected()) {
      this.vad.enable();
    }
  }

  // -------------------------------------------------------------------------
  // Voice activity detection
  // -------------------------------------------------------------------------

  private async armVad(): Promise<void> {
    if (this.disposed || this.mode !== "auto" || !this.audioInput.isAvailable()) return;

    if (this.vad && this.vadGeneration !== this.audioInput.streamGeneration) {
      this.releaseVad();
    }

    if (!this.vad) {
      this.vadGeneration = this.audioInput.streamGeneration;
      const vad = new VoiceActivityDetector({
        ...this.vadOptions,
        label: this.sessionId,
        onSpeechStart: () => {
          void this.startRecording("vad");
        },
        onSpeechEnd: () => {
          void this.stopRecording("vad");
        },
        onError: (error) => {
          void this.handleVadFailure(error);
        },
      });
      const ready = await vad.initialize(async () => {
        const lease = await this.audioInput.acquire("vad");
        try {
          return this.createLevelSource(lease);
        } catch (error) {
          lease.release();
          throw error;
        }
      });
      if (!ready || this.disposed) {
        vad.dispose();
        if (!this.disposed) this.fallBackToManual();
        return;
      }
      this.vad = vad;
    }

    if (this.phase === "idle" && this.transport.isConnected()) {
      this.vad.enable();
    }
  }

  private handleVadFailure(error: unknown): Promise<void> {
    return this.queue.enqueue("vad-failure", () => {
      console.error(`[Turn] ${this.sessionId} voice activity detection failed:`, error);
      this.releaseVad();
      this.fallBackToManual();
      this.emitState();
    });
  }

  private releaseVad(): void {
    const vad = this.vad;
    this.vad = null;
    vad?.dispose();
  }

  private fallBackToManual(): void {
    this.mode = "manual";
    this.sendError(
      "MICROPHONE_UNAVAILABLE",
      "Automatic turn detection is unavailable. Use the record button to answer.",
    );
  }

  // -------------------------------------------------------------------------
  // Helpers
  // -------------------------------------------------------------------------

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => {
      this.wakeGrace = resolve;
      this.graceTimer = setTimeout(() => {
        this.graceTimer = null;
        this.wakeGrace = null;
        resolve();
      }, ms);
    });
  }

  private remember(speaker: InterviewTurn["speaker"], text: string): void {
    this.history.push({ speaker, text });
    if (this.history.length > MAX_HISTORY_ENTRIES) {
      this.history.splice(0, this.history.length - MAX_HISTORY_ENTRIES);
    }
  }

  private setPhase(phase: TurnPhase): void {
    if (this.disposed) return;
    this.phase = phase;
    this.emitState();
  }

  private emitState(): void {
    this.send({ type: "turn_state", snapshot: this.getSnapshot() });
  }

  private sendError(code: string, message: string): void {
    this.send({ type: "error", code, message });
  }

  private send(event: ServerEvent): void {
    if (this.disposed) return;
    this.transport.send(event);
  }
}
