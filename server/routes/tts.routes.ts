import type { Express } from "express";
import { fromError } from "zod-validation-error";
import { synthesizeBodySchema } from "@shared/schema";
import { listVoicePresets, resolveVoice } from "../providers/voice-catalog";
import type { SpeechSynthesizer } from "../voice-session/types";

export function registerTtsRoutes(
  app: Express,
  synthesizer: SpeechSynthesizer | null,
  defaultVoice: string,
) {
  app.get("/api/tts/voices", (_req, res) => {
    res.json({
      voices: listVoicePresets(),
      defaultVoice: resolveVoice(defaultVoice).id,
    });
  });

  app.post("/api/tts/synthesize", async (req, res) => {
    try {
      const parseResult = synthesizeBodySchema.safeParse(req.body);
      if (!parseResult.success) {
        const errorMessage = fromError(parseResult.error).toString();
        return res.status(400).json({ message: errorMessage });
      }
      if (!synthesizer) {
        return res.status(503).json({ message: "Speech synthesis is not configured" });
      }

      const body = parseResult.data;
      const text = body.text.trim();
      if (!text) {
        return res.status(400).json({ message: "Text is required" });
      }

      const voice = resolveVoice(body.voice ?? defaultVoice).id;
      const speech = await synthesizer.synthesize({
        text,
        voice,
        speakingRate: body.speakingRate,
        pitch: body.pitch,
      });

      if (body.format === "binary") {
        res.setHeader("Content-Type", speech.mimeType);
        res.setHeader("Content-Disposition", 'attachment; filename="speech.mp3"');
        return res.send(speech.audio);
      }

      res.json({
        audio: speech.audio.toString("base64"),
        format: "base64",
        mimeType: speech.mimeType,
        voice,
        textLength: text.length,
      });
    } catch (error) {
      console.error("[TTS] Error synthesizing speech:", error);
      res.status(500).json({ message: "Failed to synthesize speech" });
    }
  });

  app.get("/api/tts/health", (_req, res) => {
    res.json({
      status: synthesizer ? "healthy" : "unconfigured",
      provider: synthesizer?.name ?? null,
    });
  });
}
