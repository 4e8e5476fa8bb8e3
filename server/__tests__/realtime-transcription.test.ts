import { describe, it, expect, vi, afterEach } from "vitest";
import { pcm16DurationMs, resamplePcm16 } from "../providers/pcm";
import {
  OpenAIRealtimeTranscriptionProvider,
  type RealtimeSocket,
  type RealtimeSocketHandlers,
} from "../providers/realtime-transcription";
import type { TranscriptionHandlers } from "../voice-session/types";

class FakeRealtimeSocket implements RealtimeSocket {
  open = false;
  sent: string[] = [];
  closeCalls = 0;

  constructor(
    readonly url: string,
    readonly headers: Record<string, string>,
    readonly handlers: RealtimeSocketHandlers,
  ) {}

  isOpen(): boolean {
    return this.open;
  }

  send(data: string): void {
    this.sent.push(data);
  }

  close(): void {
    this.closeCalls += 1;
    this.open = false;
  }

  sentTypes(): string[] {
    return this.sent.map((raw) => {
      const message: { type: string } = JSON.parse(raw);
      return message.type;
    });
  }

  accept(): void {
    this.open = true;
    this.handlers.onOpen();
  }

  deliver(event: object): void {
    this.handlers.onMessage(JSON.stringify(event));
  }
}

function setup(connectTimeoutMs = 10_000) {
  const sockets: FakeRealtimeSocket[] = [];
  const provider = new OpenAIRealtimeTranscriptionProvider({
    apiKey: "test-secret",
    connectTimeoutMs,
    socketFactory: (url, headers, handlers) => {
      const socket = new FakeRealtimeSocket(url, headers, handlers);
      sockets.push(socket);
      return socket;
    },
  });
  const handlers = {
    onTranscript: vi.fn<TranscriptionHandlers["onTranscript"]>(),
    onError: vi.fn<TranscriptionHandlers["onError"]>(),
    onConnectionChange: vi.fn<(connected: boolean) => void>(),
  };
  return { provider, sockets, handlers };
}

async function openSession() {
  const context = setup();
  const opening = context.provider.openSession(context.handlers);
  const socket = context.sockets[0];
  socket.accept();
  const session = await opening;
  return { ...context, socket, session };
}

function pcmOfMs(ms: number, sampleRate: number): Buffer {
  return Buffer.alloc(Math.round((sampleRate * ms) / 1000) * 2);
}

describe("OpenAIRealtimeTranscriptionProvider", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("connects with bearer auth and configures transcription-only mode", async () => {
    const { provider, socket, handlers } = await openSession();

    expect(socket.url).toBe("wss://api.openai.com/v1/realtime?intent=transcription");
    expect(socket.headers).toEqual({
      Authorization: "Bearer test-secret",
      "OpenAI-Beta": "realtime=v1",
    });
    expect(JSON.parse(socket.sent[0])).toEqual(provider.buildSessionConfig());
    expect(provider.buildSessionConfig().session).toEqual({
      input_audio_format: "pcm16",
      input_audio_transcription: { model: "gpt-4o-mini-transcribe", language: "en" },
      input_audio_noise_reduction: { type: "near_field" },
      turn_detection: null,
    });
    expect(handlers.onConnectionChange).toHaveBeenCalledWith(true);
  });

  it("resamples audio to 24 kHz before appending it", async () => {
    const { socket, session } = await openSession();

    session.sendAudio({ pcm: pcmOfMs(10, 16_000), sampleRate: 16_000, receivedAt: 0 });

    const append: { type: string; audio: string } = JSON.parse(socket.sent[1]);
    expect(append.type).toBe("input_audio_buffer.append");
    expect(Buffer.from(append.audio, "base64")).toHaveLength(480);
  });

  it("commits a turn with enough buffered audio", async () => {
    const { socket, session } = await openSession();

    session.sendAudio({ pcm: pcmOfMs(100, 24_000), sampleRate: 24_000, receivedAt: 0 });
    await session.finalize();

    expect(socket.sentTypes().slice(1)).toEqual([
      "input_audio_buffer.append",
      "input_audio_buffer.commit",
    ]);
  });

  it("clears instead of committing a too-short buffer", async () => {
    const { socket, session } = await openSession();

    session.sendAudio({ pcm: pcmOfMs(50, 24_000), sampleRate: 24_000, receivedAt: 0 });
    await session.finalize();

    expect(socket.sentTypes().at(-1)).toBe("input_audio_buffer.clear");
  });

  it("accumulates deltas per item as interim text and reports completions as final", async () => {
    const { socket, handlers } = await openSession();
    const delta = "conversation.item.input_audio_transcription.delta";

    socket.deliver({ type: delta, item_id: "a", delta: "I am" });
    socket.deliver({ type: delta, item_id: "a", delta: " ready" });
    socket.deliver({
      type: "conversation.item.input_audio_transcription.completed",
      item_id: "a",
      transcript: "I am ready.",
    });

    expect(handlers.onTranscript.mock.calls.map(([event]) => event)).toEqual([
      { text: "I am", isFinal: false },
      { text: "I am ready", isFinal: false },
      { text: "I am ready.", isFinal: true },
    ]);
  });

  it("surfaces provider failures as errors", async () => {
    const { socket, handlers } = await openSession();

    socket.deliver({
      type: "conversation.item.input_audio_transcription.failed",
      item_id: "a",
      error: { message: "audio unintelligible" },
    });
    socket.deliver({ type: "error", error: { message: "bad audio", code: "invalid_value" } });

    expect(handlers.onError.mock.calls.map(([error]) => error.message)).toEqual([
      "audio unintelligible",
      "Realtime error (invalid_value): bad audio",
    ]);
  });

  it("ignores unrelated and malformed messages", async () => {
    const { socket, handlers } = await openSession();

    socket.handlers.onMessage("not json");
    socket.deliver({ type: "transcription_session.updated", session: {} });

    expect(handlers.onTranscript).not.toHaveBeenCalled();
    expect(handlers.onError).not.toHaveBeenCalled();
  });

  it("rejects when the socket fails before opening", async () => {
    const { provider, sockets, handlers } = setup();
    const opening = provider.openSession(handlers);

    sockets[0].handlers.onClose(1006);

    await expect(opening).rejects.toThrow(
      "Transcription socket closed before opening (code 1006)",
    );
  });

  it("rejects and closes the socket when the connection times out", async () => {
    vi.useFakeTimers();
    const { provider, sockets, handlers } = setup(1_000);
    const opening = provider.openSession(handlers);
    const rejection = expect(opening).rejects.toThrow(
      "Transcription connection timed out after 1000ms",
    );

    await vi.advanceTimersByTimeAsync(1_000);

    await rejection;
    expect(sockets[0].closeCalls).toBe(1);
  });

  it("rejects without leaving a timer when the socket cannot be created", async () => {
    vi.useFakeTimers();
    const { handlers } = setup();
    const provider = new OpenAIRealtimeTranscriptionProvider({
      apiKey: "test-secret",
      connectTimeoutMs: 1_000,
      socketFactory: () => {
        throw new Error("invalid url");
      },
    });

    await expect(provider.openSession(handlers)).rejects.toThrow("invalid url");
    expect(vi.getTimerCount()).toBe(0);
  });

  it("reports a remote close but not its own", async () => {
    const remote = await openSession();
    remote.socket.handlers.onClose(1011);
    expect(remote.handlers.onConnectionChange).toHaveBeenLastCalledWith(false);

    const local = await openSession();
    local.session.close();
    local.session.close();
    local.socket.handlers.onClose(1000);
    expect(local.socket.closeCalls).toBe(1);
    expect(local.handlers.onConnectionChange).not.toHaveBeenCalledWith(false);
  });

  it("drops audio once closed", async () => {
    const { socket, session } = await openSession();
    session.close();

    session.sendAudio({ pcm: pcmOfMs(10, 24_000), sampleRate: 24_000, receivedAt: 0 });

    expect(socket.sent).toHaveLength(1);
  });
});

describe("resamplePcm16", () => {
  it("interpolates between neighbouring samples", () => {
    const input = Buffer.alloc(4);
    input.writeInt16LE(0, 0);
    input.writeInt16LE(100, 2);

    const output = resamplePcm16(input, 1_000, 2_000);

    expect([0, 1, 2, 3].map((i) => output.readInt16LE(i * 2))).toEqual([0, 50, 100, 100]);
  });

  it("returns the input when rates match", () => {
    const input = Buffer.alloc(8);
    expect(resamplePcm16(input, 24_000, 24_000)).toBe(input);
  });

  it("measures PCM16 duration", () => {
    expect(pcm16DurationMs(4_800, 24_000)).toBe(100);
  });
});
