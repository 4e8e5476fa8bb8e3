import WebSocket from "ws";
import { z } from "zod";
import type { AudioChunk } from "../voice-session/shared-audio-stream";
import type {
  TranscriptionHandlers,
  TranscriptionProvider,
  TranscriptionSession,
} from "../voice-session/types";
import { pcm16DurationMs, resamplePcm16 } from "./pcm";

const OPENAI_TRANSCRIPTION_URL = "wss://api.openai.com/v1/realtime?intent=transcription";
const PROVIDER_SAMPLE_RATE = 24000;
// The API rejects commits of less than 100ms of audio
const MIN_COMMIT_MS = 100;
const DEFAULT_CONNECT_TIMEOUT_MS = 10_000;

export interface RealtimeSocket {
  isOpen(): boolean;
  send(data: string): void;
  close(): void;
}

export type RealtimeSocketHandlers = {
  onOpen: () => void;
  onMessage: (data: string) => void;
  onError: (error: Error) => void;
  onClose: (code: number) => void;
};

export type RealtimeSocketFactory = (
  url: string,
  headers: Record<string, string>,
  handlers: RealtimeSocketHandlers,
) => RealtimeSocket;

function rawDataToString(data: WebSocket.RawData): string {
  if (Buffer.isBuffer(data)) return data.toString("utf8");
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf8");
  return Buffer.from(data).toString("utf8");
}

export const connectWithWs: RealtimeSocketFactory = (url, headers, handlers) => {
  const ws = new WebSocket(url, { headers });
  ws.on("open", () => handlers.onOpen());
  ws.on("message", (data) => handlers.onMessage(rawDataToString(data)));
  ws.on("error", (error) => handlers.onError(error));
  ws.on("close", (code) => handlers.onClose(code));
  return {
    isOpen: () => ws.readyState === WebSocket.OPEN,
    send: (data) => ws.send(data),
    close: () => {
      if (ws.readyState === WebSocket.OPEN || ws.readyState === WebSocket.CONNECTING) {
        ws.close();
      }
    },
  };
};

const providerEventSchema = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("conversation.item.input_audio_transcription.delta"),
    item_id: z.string(),
    delta: z.string(),
  }),
  z.object({
    type: z.literal("conversation.item.input_audio_transcription.completed"),
    item_id: z.string(),
    transcript: z.string(),
  }),
  z.object({
    type: z.literal("conversation.item.input_audio_transcription.failed"),
    item_id: z.string(),
    error: z.object({ message: z.string().optional() }).optional(),
  }),
  z.object({
    type: z.literal("error"),
    error: z.object({
      message: z.string().optional(),
      code: z.string().nullish(),
    }),
  }),
]);

type ProviderEvent = z.infer<typeof providerEventSchema>;

export type OpenAIRealtimeTranscriptionOptions = {
  apiKey: string;
  model?: string;
  language?: string;
  url?: string;
  connectTimeoutMs?: number;
  socketFactory?: RealtimeSocketFactory;
};

class RealtimeTranscriptionSession implements TranscriptionSession {
  private readonly interim = new Map<string, string>();
  private uncommittedBytes = 0;
  private closed = false;
  private droppedChunks = 0;

  constructor(
    private readonly socket: RealtimeSocket,
    private readonly handlers: TranscriptionHandlers,
  ) {}

  get isClosed(): boolean {
    return this.closed;
  }

  sendAudio(chunk: AudioChunk): void {
    if (this.closed || !this.socket.isOpen()) {
      this.droppedChunks += 1;
      if (this.droppedChunks === 1) {
        console.warn("[Transcription] Dropping audio: provider socket is not open");
      }
      return;
    }
    const pcm = resamplePcm16(chunk.pcm, chunk.sampleRate, PROVIDER_SAMPLE_RATE);
    this.uncommittedBytes += pcm.length;
    this.socket.send(
      JSON.stringify({ type: "input_audio_buffer.append", audio: pcm.toString("base64") }),
    );
  }

  async finalize(): Promise<void> {
    if (this.closed || !this.socket.isOpen()) return;
    const bufferedMs = pcm16DurationMs(this.uncommittedBytes, PROVIDER_SAMPLE_RATE);
    this.uncommittedBytes = 0;
    if (bufferedMs < MIN_COMMIT_MS) {
      this.socket.send(JSON.stringify({ type: "input_audio_buffer.clear" }));
      return;
    }
    this.socket.send(JSON.stringify({ type: "input_audio_buffer.commit" }));
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.interim.clear();
    this.socket.close();
  }

  handleMessage(raw: string): void {
    if (this.closed) return;

    let payload: unknown;
    try {
      payload = JSON.parse(raw);
    } catch (error) {
      console.warn("[Transcription] Ignoring non-JSON provider message:", error);
      return;
    }

    const parsed = providerEventSchema.safeParse(payload);
    if (!parsed.success) return; // other realtime events are not needed here
    this.handleEvent(parsed.data);
  }

  private handleEvent(event: ProviderEvent): void {
    switch (event.type) {
      case "conversation.item.input_audio_transcription.delta": {
        const text = (this.interim.get(event.item_id) ?? "") + event.delta;
        this.interim.set(event.item_id, text);
        this.handlers.onTranscript({ text, isFinal: false });
        break;
      }
      case "conversation.item.input_audio_transcription.completed":
        this.interim.delete(event.item_id);
        this.handlers.onTranscript({ text: event.transcript, isFinal: true });
        break;
      case "conversation.item.input_audio_transcription.failed":
        this.interim.delete(event.item_id);
        this.handlers.onError(
          new Error(event.error?.message ?? "Transcription failed for an audio segment"),
        );
        break;
      case "error":
        this.handlers.onError(
          new Error(`Realtime error${event.error.code ? ` (${event.error.code})` : ""}: ${event.error.message ?? "unknown"}`),
        );
        break;
    }
  }
}

/**
 * Streaming speech-to-text over the OpenAI Realtime API in transcription-only
 * mode. Turn detection is left to our own VAD: the provider's is switched off
 * and each turn is committed explicitly on finalize.
 */
export class OpenAIRealtimeTranscriptionProvider implements TranscriptionProvider {
  readonly name = "openai-realtime";

  private readonly apiKey: string;
  private readonly model: string;
  private readonly language: string;
  private readonly url: string;
  private readonly connectTimeoutMs: number;
  private readonly socketFactory: RealtimeSocketFactory;

  constructor(options: OpenAIRealtimeTranscriptionOptions) {
    this.apiKey = options.apiKey;
    this.model = options.model ?? "gpt-4o-mini-transcribe";
    this.language = options.language ?? "en";
    this.url = options.url ?? OPENAI_TRANSCRIPTION_URL;
    this.connectTimeoutMs = options.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS;
    this.socketFactory = options.socketFactory ?? connectWithWs;
  }

  getWebSocketHeaders(): Record<string, string> {
    return {
      Authorization: `Bearer ${this.apiKey}`,
      "OpenAI-Beta": "realtime=v1",
    };
  }

  buildSessionConfig() {
    return {
      type: "transcription_session.update",
      session: {
        input_audio_format: "pcm16",
        input_audio_transcription: {
          model: this.model,
          language: this.language,
        },
        input_audio_noise_reduction: { type: "near_field" },
        turn_detection: null,
      },
    };
  }

  openSession(handlers: TranscriptionHandlers): Promise<TranscriptionSession> {
    return new Promise<TranscriptionSession>((resolve, reject) => {
      let settled = false;
      let session: RealtimeTranscriptionSession | null = null;

      const timer = setTimeout(() => {
        if (settled) return;
        settled = true;
        socket.close();
        reject(new Error(`Transcription connection timed out after ${this.connectTimeoutMs}ms`));
      }, this.connectTimeoutMs);

      let socket: RealtimeSocket;
      try {
        socket = this.socketFactory(this.url, this.getWebSocketHeaders(), {
          onOpen: () => {
            if (settled) return;
            settled = true;
            clearTimeout(timer);
            socket.send(JSON.stringify(this.buildSessionConfig()));
            session = new RealtimeTranscriptionSession(socket, handlers);
            handlers.onConnectionChange?.(true);
            resolve(session);
          },
          onMessage: (data) => session?.handleMessage(data),
          onError: (error) => {
            if (!settled) {
              settled = true;
              clearTimeout(timer);
              reject(error);
              return;
            }
            console.error("[Transcription] Provider socket error:", error.message);
            handlers.onError(error);
          },
          onClose: (code) => {
            if (!settled) {
              settled = true;
              clearTimeout(timer);
              reject(new Error(`Transcription socket closed before opening (code ${code})`));
              return;
            }
            if (session && !session.isClosed) {
              console.log(`[Transcription] Provider socket closed (code ${code})`);
              handlers.onConnectionChange?.(false);
            }
          },
        });
      } catch (error) {
        settled = true;
        clearTimeout(timer);
        reject(error);
      }
    });
  }
}
