import type { TranscriptEvent } from "./types";

// Interim text is replaced wholesale by each interim event; finals are appended
// space-joined and clear the interim.
export class TranscriptBuffer {
  private interim = "";
  private finals: string[] = [];

  apply(event: TranscriptEvent): void {
    if (event.isFinal) {
      const text = event.text.trim();
      if (text) this.finals.push(text);
      this.interim = "";
      return;
    }
    this.interim = event.text;
  }

  get transcript(): string {
    return this.interim;
  }

  get finalTranscript(): string {
    return this.finals.join(" ");
  }

  /** The final transcript, or the last interim text when no final arrived. */
  resolve(): string {
    return this.finalTranscript.trim() || this.interim.trim();
  }

  clear(): void {
    this.interim = "";
    this.finals = [];
  }
}
