export type TurnPhase =
  | "idle"
  | "recording"
  | "awaiting_final"
  | "processing"
  | "speaking";

export type TurnMode = "auto" | "manual";

export type TurnTrigger = "user" | "vad" | "disconnect" | "microphone";

export type TurnSnapshot = {
  phase: TurnPhase;
  mode: TurnMode;
  isRecording: boolean;
  isAISpeaking: boolean;
  transportConnected: boolean;
  microphoneAvailable: boolean;
};

export type VoicePreset = {
  id: string;
  displayName: string;
  description: string;
  gender: "female" | "male";
};
