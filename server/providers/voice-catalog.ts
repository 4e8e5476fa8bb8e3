import type { SpeechCreateParams } from "openai/resources/audio/speech";
import type { VoicePreset } from "@shared/types/turn-state";

export type VoiceCatalogEntry = VoicePreset & {
  providerVoice: SpeechCreateParams["voice"];
  style: string;
};

export const DEFAULT_VOICE_ID = "neural2_male";

// Presets keep the Indian-English coaching voices the product shipped with;
// each maps to a provider voice plus a delivery style.
export const VOICE_CATALOG: readonly VoiceCatalogEntry[] = [
  {
    id: "neural2_female",
    displayName: "Priya",
    description: "Warm, encouraging female voice",
    gender: "female",
    providerVoice: "coral",
    style: "Speak English with a gentle Indian accent, warm and encouraging.",
  },
  {
    id: "neural2_male",
    displayName: "Arjun",
    description: "Calm, professional male voice",
    gender: "male",
    providerVoice: "ash",
    style: "Speak English with a gentle Indian accent, calm and professional.",
  },
  {
    id: "neural2_female_2",
    displayName: "Ananya",
    description: "Bright, energetic female voice",
    gender: "female",
    providerVoice: "nova",
    style: "Speak English with an Indian accent, bright and upbeat.",
  },
  {
    id: "neural2_male_2",
    displayName: "Rohan",
    description: "Friendly conversational male voice",
    gender: "male",
    providerVoice: "echo",
    style: "Speak English with an Indian accent, friendly and conversational.",
  },
  {
    id: "wavenet_female",
    displayName: "Kavya",
    description: "Clear, measured female voice",
    gender: "female",
    providerVoice: "shimmer",
    style: "Speak English with an Indian accent, clear and measured like an interviewer.",
  },
  {
    id: "wavenet_male",
    displayName: "Vikram",
    description: "Deep, steady male voice",
    gender: "male",
    providerVoice: "onyx",
    style: "Speak English with an Indian accent, deep and steady like a senior interviewer.",
  },
  {
    id: "wavenet_female_2",
    displayName: "Meera",
    description: "Soft, patient female voice",
    gender: "female",
    providerVoice: "sage",
    style: "Speak English with an Indian accent, soft and patient.",
  },
  {
    id: "wavenet_male_2",
    displayName: "Aditya",
    description: "Crisp, neutral male voice",
    gender: "male",
    providerVoice: "alloy",
    style: "Speak English with an Indian accent, crisp and neutral.",
  },
];

export function findVoice(id: string): VoiceCatalogEntry | undefined {
  return VOICE_CATALOG.find((entry) => entry.id === id);
}

/** Unknown ids fall back to the default preset. */
export function resolveVoice(id: string | undefined): VoiceCatalogEntry {
  const match = id ? findVoice(id) : undefined;
  if (match) return match;
  if (id) {
    console.warn(`[Voices] Unknown voice "${id}", using ${DEFAULT_VOICE_ID}`);
  }
  const fallback = findVoice(DEFAULT_VOICE_ID);
  if (!fallback) {
    throw new Error(`Default voice ${DEFAULT_VOICE_ID} is missing from the catalog`);
  }
  return fallback;
}

export function listVoicePresets(): VoicePreset[] {
  return VOICE_CATALOG.map(({ id, displayName, description, gender }) => ({
    id,
    displayName,
    description,
    gender,
  }));
}
