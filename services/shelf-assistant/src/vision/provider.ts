import { GoogleGenAI } from "@google/genai";
import type { PhotoImage } from "../photo/image.js";

export type VisionRequest = {
  image: PhotoImage;
  instructions: string;
  prompt: string;
  responseFormat: "json" | "text";
};

export interface VisionProvider {
  name: string;
  /** Raw model text for one image. Rejects on transport failure or abort. */
  describe(request: VisionRequest, signal: AbortSignal): Promise<string>;
}

export class GeminiVisionProvider implements VisionProvider {
  name = "gemini";
  private readonly ai: GoogleGenAI;

  constructor(
    apiKey: string,
    private readonly model: string,
  ) {
    this.ai = new GoogleGenAI({ apiKey });
  }

  async describe(request: VisionRequest, signal: AbortSignal): Promise<string> {
    const response = await this.ai.models.generateContent({
      model: this.model,
      contents: [
        {
          role: "user",
          parts: [
            { inlineData: { mimeType: request.image.mimeType, data: request.image.data.toString("base64") } },
            { text: request.prompt },
          ],
        },
      ],
      config: {
        systemInstruction: request.instructions,
        responseMimeType: request.responseFormat === "json" ? "application/json" : "text/plain",
        abortSignal: signal,
      },
    });
    return response.text ?? "";
  }
}
