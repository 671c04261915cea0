import { DESIGN_DEFAULTS, type OutputFormat } from "./models";
import type {
  DesignVoiceBody,
  DesignVoiceOptions,
  DesignVoiceRequest,
  VoiceResult,
} from "./types";
import type { DesignVoiceResult } from "./schemas";

export type DesignVoiceSender = (
  req: DesignVoiceRequest,
  signal?: AbortSignal,
) => Promise<VoiceResult<DesignVoiceResult>>;

/**
 * Finalizes design options into the wire request.
 * Precedence per field: explicit value, then contextual default, then absent.
 */
export function buildDesignVoiceRequest(opts: DesignVoiceOptions): DesignVoiceRequest {
  const body: DesignVoiceBody = {
    voice_description: opts.description,
    model_id: opts.model ?? DESIGN_DEFAULTS.model,
    loudness: opts.loudness ?? DESIGN_DEFAULTS.loudness,
    guidance_scale: opts.guidanceScale ?? DESIGN_DEFAULTS.guidanceScale,
    stream_previews: opts.streamPreviews ?? DESIGN_DEFAULTS.streamPreviews,
  };

  if (opts.text !== undefined) body.text = opts.text;

  // a request always carries either text or the instruction to generate it
  if (opts.autoGenerateText !== undefined) body.auto_generate_text = opts.autoGenerateText;
  else if (opts.text === undefined) body.auto_generate_text = true;

  if (opts.seed !== undefined) body.seed = opts.seed;
  if (opts.remixingSessionId !== undefined) body.remixing_session_id = opts.remixingSessionId;
  if (opts.remixingSessionIterationId !== undefined) {
    body.remixing_session_iteration_id = opts.remixingSessionIterationId;
  }
  if (opts.quality !== undefined) body.quality = opts.quality;
  if (opts.referenceAudioBase64 !== undefined) {
    body.reference_audio_base64 = opts.referenceAudioBase64;
  }
  if (opts.promptStrength !== undefined) body.prompt_strength = opts.promptStrength;

  return {
    outputFormat: opts.outputFormat ?? DESIGN_DEFAULTS.outputFormat,
    body: Object.freeze(body),
  };
}

/**
 * Immutable fluent configuration for a Design Voice call. Every setter returns
 * a new builder, so a partially configured builder can be shared and reused.
 */
export class DesignVoiceBuilder {
  private readonly opts: Readonly<DesignVoiceOptions>;
  private readonly send: DesignVoiceSender;

  constructor(opts: DesignVoiceOptions, send: DesignVoiceSender) {
    this.opts = Object.freeze({ ...opts });
    this.send = send;
  }

  private with(patch: Partial<DesignVoiceOptions>): DesignVoiceBuilder {
    return new DesignVoiceBuilder({ ...this.opts, ...patch }, this.send);
  }

  get options(): Readonly<DesignVoiceOptions> {
    return this.opts;
  }

  outputFormat(outputFormat: OutputFormat): DesignVoiceBuilder {
    return this.with({ outputFormat });
  }

  text(text: string): DesignVoiceBuilder {
    return this.with({ text });
  }

  model(model: string): DesignVoiceBuilder {
    return this.with({ model });
  }

  autoGenerateText(autoGenerateText: boolean): DesignVoiceBuilder {
    return this.with({ autoGenerateText });
  }

  loudness(loudness: number): DesignVoiceBuilder {
    return this.with({ loudness });
  }

  seed(seed: number): DesignVoiceBuilder {
    return this.with({ seed });
  }

  guidanceScale(guidanceScale: number): DesignVoiceBuilder {
    return this.with({ guidanceScale });
  }

  streamPreviews(streamPreviews: boolean): DesignVoiceBuilder {
    return this.with({ streamPreviews });
  }

  remixingSessionId(remixingSessionId: string): DesignVoiceBuilder {
    return this.with({ remixingSessionId });
  }

  remixingSessionIterationId(remixingSessionIterationId: string): DesignVoiceBuilder {
    return this.with({ remixingSessionIterationId });
  }

  quality(quality: number): DesignVoiceBuilder {
    return this.with({ quality });
  }

  referenceAudioBase64(referenceAudioBase64: string): DesignVoiceBuilder {
    return this.with({ referenceAudioBase64 });
  }

  promptStrength(promptStrength: number): DesignVoiceBuilder {
    return this.with({ promptStrength });
  }

  build(): DesignVoiceRequest {
    return buildDesignVoiceRequest(this.opts);
  }

  execute(signal?: AbortSignal): Promise<VoiceResult<DesignVoiceResult>> {
    return this.send(this.build(), signal);
  }
}
