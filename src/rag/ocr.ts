import type { Logger } from "./logger.js";
import type { FallbackChain } from "./llm/fallback-chain.js";
import type { LlmProvider } from "./llm/types.js";

export interface OcrOptions {
  /** Tesseract-style language code, e.g. "deu" or "eng+deu". */
  language: string;
  signal?: AbortSignal;
}

/** Turns one rendered page image into text. */
export interface OcrEngine {
  recognize(image: Buffer, options: OcrOptions): Promise<string>;
}

const OCR_PROMPT = (language: string) =>
  `Transcribe all text on this scanned document page exactly as written. ` +
  `The expected language code is "${language}". ` +
  `Keep the reading order and line breaks. Output only the transcribed text, ` +
  `without commentary. If the page has no text, output nothing.`;

/**
 * OCR through a vision-capable chat model. The page image goes in as a
 * base64 data URL next to the transcription prompt.
 */
export class VisionOcrEngine implements OcrEngine {
  constructor(
    private readonly llm: LlmProvider,
    private readonly chain: FallbackChain,
    private readonly logger: Logger,
  ) {}

  async recognize(image: Buffer, options: OcrOptions): Promise<string> {
    const url = `data:image/png;base64,${image.toString("base64")}`;
    const { model, value } = await this.chain.run(
      (m, signal) =>
        this.llm.complete(
          {
            messages: [
              {
                role: "user",
                content: [
                  { type: "text", text: OCR_PROMPT(options.language) },
                  { type: "image_url", image_url: { url } },
                ],
              },
            ],
            temperature: 0,
            maxTokens: 4000,
          },
          m,
          signal,
        ),
      options.signal,
    );
    this.logger.debug({ model, chars: value.length }, "page recognized");
    return value.trim();
  }
}
