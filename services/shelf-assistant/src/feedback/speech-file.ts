import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { GoogleGenAI, Modality } from "@google/genai";
import { createLogger, type Logger } from "../logger.js";
import type { FeedbackEmitter } from "./emitter.js";

// Gemini TTS returns raw 16-bit little-endian mono PCM at 24 kHz.
const SAMPLE_RATE = 24_000;
const CHANNELS = 1;
const BITS_PER_SAMPLE = 16;

export const wavFromPcm = (pcm: Buffer): Buffer => {
  const header = Buffer.alloc(44);
  const byteRate = (SAMPLE_RATE * CHANNELS * BITS_PER_SAMPLE) / 8;
  header.write("RIFF", 0, "ascii");
  header.writeUInt32LE(36 + pcm.length, 4);
  header.write("WAVE", 8, "ascii");
  header.write("fmt ", 12, "ascii");
  header.writeUInt32LE(16, 16);
  header.writeUInt16LE(1, 20);
  header.writeUInt16LE(CHANNELS, 22);
  header.writeUInt32LE(SAMPLE_RATE, 24);
  header.writeUInt32LE(byteRate, 28);
  header.writeUInt16LE((CHANNELS * BITS_PER_SAMPLE) / 8, 32);
  header.writeUInt16LE(BITS_PER_SAMPLE, 34);
  header.write("data", 36, "ascii");
  header.writeUInt32LE(pcm.length, 40);
  return Buffer.concat([header, pcm]);
};

export type SpeechSynthesizer = (phrase: string) => Promise<Buffer>;

export const geminiSynthesizer = (apiKey: string, model: string, voiceName: string): SpeechSynthesizer => {
  const ai = new GoogleGenAI({ apiKey });
  return async (phrase) => {
    const response = await ai.models.generateContent({
      model,
      contents: [{ role: "user", parts: [{ text: `Say calmly and clearly: ${phrase}` }] }],
      config: {
        responseModalities: [Modality.AUDIO],
        speechConfig: { voiceConfig: { prebuiltVoiceConfig: { voiceName } } },
      },
    });
    const data = response.candidates?.[0]?.content?.parts?.find((part) => part.inlineData?.data)?.inlineData?.data;
    if (!data) throw new Error(`${model} returned no audio`);
    return Buffer.from(data, "base64");
  };
};

/**
 * Synthesises each phrase and writes it as a numbered WAV file into
 * `outputDir`, where the wearable's audio player picks it up.
 */
export class SpeechFileEmitter implements FeedbackEmitter {
  private sequence = 0;

  constructor(
    private readonly outputDir: string,
    private readonly synthesize: SpeechSynthesizer,
    private readonly log: Logger = createLogger("speak"),
    private readonly now: () => Date = () => new Date(),
  ) {}

  async speak(phrase: string): Promise<void> {
    this.log.info(phrase);
    const pcm = await this.synthesize(phrase);
    await mkdir(this.outputDir, { recursive: true });
    this.sequence += 1;
    const stamp = this.now().toISOString().replaceAll(":", "-");
    const file = join(this.outputDir, `speech_${stamp}_${String(this.sequence).padStart(4, "0")}.wav`);
    await writeFile(file, wavFromPcm(pcm));
  }
}
