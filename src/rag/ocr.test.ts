import { describe, it, expect } from "vitest";
import { ProviderRequestError } from "./errors.js";
import { FallbackChain } from "./llm/fallback-chain.js";
import { silentLogger } from "./logger.js";
import { VisionOcrEngine } from "./ocr.js";
import { FakeLlm } from "./testing/fakes.js";

const policy = { maxRetries: 1, baseDelayMs: 0, maxDelayMs: 0 };
const noSleep = async () => {};

describe("VisionOcrEngine", () => {
  it("sends the page as a data URL and trims the transcription", async () => {
    const llm = new FakeLlm({ "v/ocr": ["\n  Rechnung Nr. 7\n"] });
    const engine = new VisionOcrEngine(llm, new FallbackChain(["v/ocr"], policy, silentLogger(), noSleep), silentLogger());

    const text = await engine.recognize(Buffer.from("png"), { language: "deu" });

    expect(text).toBe("Rechnung Nr. 7");
    const request = llm.calls[0]?.request;
    expect(request?.temperature).toBe(0);
    const content = request?.messages[0]?.content;
    expect(Array.isArray(content) && content[1]).toEqual({
      type: "image_url",
      image_url: { url: "data:image/png;base64,cG5n" },
    });
    expect(Array.isArray(content) && content[0]?.type === "text" && content[0].text).toContain('"deu"');
  });

  it("retries a transient failure on the same model", async () => {
    const llm = new FakeLlm({
      "v/ocr": [new ProviderRequestError("API error (503) from v/ocr: busy", "v/ocr", true, 503), "text"],
    });
    const engine = new VisionOcrEngine(llm, new FallbackChain(["v/ocr"], policy, silentLogger(), noSleep), silentLogger());

    expect(await engine.recognize(Buffer.from("png"), { language: "eng" })).toBe("text");
    expect(llm.calls).toHaveLength(2);
  });
});
