import type { SessionTransport, AudioInput } from "./types";
import { SharedAudioStream, type AudioStreamLease } from "./shared-audio-stream";

export class MicrophoneUnavailableError extends Error {
  constructor(reason: string) {
    super(`Microphone unavailable: ${reason}`);
    this.name = "MicrophoneUnavailableError";
  }
}

type MicrophoneStatus =
  | { kind: "pending" }
  | { kind: "ready"; stream: SharedAudioStream }
  | { kind: "unavailable"; reason: string };

export type ClientMicrophoneOptions = {
  sessionId: string;
  transport: SessionTransport;
  preRollMs?: number;
};

/**
 * The browser's microphone as seen from the server: audio frames arrive over
 * the session socket and are fanned out through one shared stream. The client
 * announces the device with `microphone_ready` or reports a failure with
 * `microphone_unavailable`.
 */
export class ClientMicrophone implements AudioInput {
  private status: MicrophoneStatus = { kind: "pending" };
  private droppedFrames = 0;
  private generation = 0;

  constructor(private readonly options: ClientMicrophoneOptions) {}

  get sampleRate(): number | null {
    return this.status.kind === "ready" ? this.status.stream.sampleRate : null;
  }

  get streamGeneration(): number {
    return this.generation;
  }

  isAvailable(): boolean {
    return this.status.kind === "ready" && !this.status.stream.isStopped;
  }

  markReady(sampleRate: number): void {
    const previous = this.status.kind === "ready" ? this.status.stream : null;
    if (previous && previous.sampleRate === sampleRate && !previous.isStopped) {
      return;
    }

    const stream = new SharedAudioStream({
      label: `mic:${this.options.sessionId}`,
      sampleRate,
      preRollMs: this.options.preRollMs,
      onStop: () => {
        // A replaced stream must not release the device the client just announced
        if (this.status.kind === "ready" && this.status.stream !== stream) return;
        this.options.transport.send({ type: "release_microphone" });
      },
    });
    this.status = { kind: "ready", stream };
    this.generation += 1;
    previous?.stop("microphone re-announced");
    this.droppedFrames = 0;
    console.log(
      `[Microphone] ${this.options.sessionId} ready at ${sampleRate} Hz`,
    );
  }

  markUnavailable(reason: string): void {
    if (this.status.kind === "ready") {
      this.status.stream.stop(reason);
    }
    this.status = { kind: "unavailable", reason };
    console.warn(`[Microphone] ${this.options.sessionId} unavailable: ${reason}`);
  }

  pushAudio(base64Audio: string): void {
    if (this.status.kind !== "ready") {
      this.droppedFrames += 1;
      if (this.droppedFrames === 1 || this.droppedFrames % 100 === 0) {
        console.warn(
          `[Microphone] ${this.options.sessionId} dropped ${this.droppedFrames} audio frame(s) before microphone_ready`,
        );
      }
      return;
    }
    this.status.stream.push(Buffer.from(base64Audio, "base64"));
  }

  async acquire(owner: string): Promise<AudioStreamLease> {
    switch (this.status.kind) {
      case "ready":
        return this.status.stream.acquire(owner);
      case "unavailable":
        throw new MicrophoneUnavailableError(this.status.reason);
      case "pending":
        throw new MicrophoneUnavailableError("the client has not announced a microphone yet");
    }
  }

  /** Ends the stream for good; used on session teardown. */
  stop(reason: string): void {
    if (this.status.kind === "ready") {
      this.status.stream.stop(reason);
    }
    this.status = { kind: "unavailable", reason };
  }
}
