import { describe, expect, it } from "vitest";

import { buildCreateVoiceRequest } from "./create";
import { buildDesignVoiceRequest } from "./design";
import { ELEVEN_TTV_V3 } from "./models";
import { designVoiceWarnings, validateCreateVoiceRequest, validateDesignVoiceRequest } from "./validate";

describe("validateDesignVoiceRequest", () => {
  it("accepts the defaults", () => {
    expect(validateDesignVoiceRequest(buildDesignVoiceRequest({ description: "X" }))).toEqual([]);
  });

  it("accepts values on the range boundaries", () => {
    const req = buildDesignVoiceRequest({
      description: "X",
      text: "t".repeat(1000),
      loudness: -1,
      guidanceScale: 100,
      quality: 1,
      seed: 4294967295,
      promptStrength: 0,
    });
    expect(validateDesignVoiceRequest(req)).toEqual([]);
  });

  it("reports out-of-range numbers", () => {
    const req = buildDesignVoiceRequest({
      description: "X",
      loudness: 1.5,
      guidanceScale: -1,
      quality: -2,
      promptStrength: 2,
    });
    expect(validateDesignVoiceRequest(req)).toEqual([
      "loudness: must be <= 1",
      "guidance_scale: must be >= 0",
      "quality: must be >= -1",
      "prompt_strength: must be <= 1",
    ]);
  });

  it("reports text length and seed problems", () => {
    expect(validateDesignVoiceRequest(buildDesignVoiceRequest({ description: "X", text: "too short" }))).toEqual([
      "text: must be at least 100 characters",
    ]);
    expect(validateDesignVoiceRequest(buildDesignVoiceRequest({ description: "X", text: "t".repeat(1001) }))).toEqual([
      "text: must be at most 1000 characters",
    ]);
    expect(validateDesignVoiceRequest(buildDesignVoiceRequest({ description: "X", seed: 1.5 }))).toEqual([
      "seed: must be an integer",
    ]);
  });

  it("measures text length in characters rather than UTF-16 units", () => {
    const emoji = (n: number) => "\u{1F600}".repeat(n);
    expect(validateDesignVoiceRequest(buildDesignVoiceRequest({ description: "X", text: emoji(600) }))).toEqual([]);
    expect(validateDesignVoiceRequest(buildDesignVoiceRequest({ description: "X", text: emoji(99) }))).toEqual([
      "text: must be at least 100 characters",
    ]);
    expect(validateDesignVoiceRequest(buildDesignVoiceRequest({ description: "X", text: emoji(1001) }))).toEqual([
      "text: must be at most 1000 characters",
    ]);
  });

  it("reports a blank description", () => {
    expect(validateDesignVoiceRequest(buildDesignVoiceRequest({ description: "   " }))).toEqual([
      "voice_description: must not be empty",
    ]);
  });
});

describe("validateCreateVoiceRequest", () => {
  it("requires the three identifiers", () => {
    const req = buildCreateVoiceRequest({ name: "", description: "d", generatedVoiceId: "" });
    expect(validateCreateVoiceRequest(req)).toEqual([
      "voice_name: must not be empty",
      "generated_voice_id: must not be empty",
    ]);
  });

  it("accepts a complete request", () => {
    const req = buildCreateVoiceRequest({
      name: "Jack",
      description: "d",
      generatedVoiceId: "abc123",
      labels: { accent: "american" },
    });
    expect(validateCreateVoiceRequest(req)).toEqual([]);
  });
});

describe("designVoiceWarnings", () => {
  it("is quiet for reference audio on v3", () => {
    const req = buildDesignVoiceRequest({
      description: "X",
      model: ELEVEN_TTV_V3,
      referenceAudioBase64: "UklGRg==",
      promptStrength: 0.4,
    });
    expect(designVoiceWarnings(req)).toEqual([]);
  });

  it("warns about reference audio on the default model", () => {
    const req = buildDesignVoiceRequest({ description: "X", referenceAudioBase64: "UklGRg==" });
    expect(designVoiceWarnings(req)).toEqual([
      "reference_audio_base64 is only supported by eleven_ttv_v3, got eleven_multilingual_ttv_v2",
    ]);
  });

  it("warns about prompt strength without reference audio", () => {
    const req = buildDesignVoiceRequest({ description: "X", model: ELEVEN_TTV_V3, promptStrength: 0.5 });
    expect(designVoiceWarnings(req)).toEqual(["prompt_strength has no effect without reference_audio_base64"]);
  });
});
