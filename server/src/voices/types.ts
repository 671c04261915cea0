import type { OutputFormat } from "./models";
import type { VoiceClientError } from "./errors";

export type DesignVoiceOptions = {
  description: string;
  outputFormat?: OutputFormat;
  text?: string;               // 100..1000 chars
  model?: string;              // "eleven_multilingual_ttv_v2" | "eleven_ttv_v3"
  autoGenerateText?: boolean;
  loudness?: number;           // -1..1
  seed?: number;               // 0..4294967295, best effort
  guidanceScale?: number;      // 0..100
  streamPreviews?: boolean;
  remixingSessionId?: string;
  remixingSessionIterationId?: string;
  quality?: number;            // -1..1
  referenceAudioBase64?: string; // eleven_ttv_v3 only
  promptStrength?: number;     // 0..1, eleven_ttv_v3 with reference audio only
};

export type DesignVoiceOverrides = Omit<DesignVoiceOptions, "description">;

// JSON body of POST /text-to-voice/design; output_format travels in the query string
export type DesignVoiceBody = {
  voice_description: string;
  model_id: string;
  text?: string;
  auto_generate_text?: boolean;
  loudness: number;
  seed?: number;
  guidance_scale: number;
  stream_previews: boolean;
  remixing_session_id?: string;
  remixing_session_iteration_id?: string;
  quality?: number;
  reference_audio_base64?: string;
  prompt_strength?: number;
};

export type DesignVoiceRequest = {
  outputFormat: OutputFormat;
  body: Readonly<DesignVoiceBody>;
};

export type CreateVoiceOptions = {
  name: string;
  description: string;
  generatedVoiceId: string;
  labels?: Record<string, string>;
  playedNotSelectedVoiceIds?: string[];
};

export type CreateVoiceBody = {
  voice_name: string;
  voice_description: string;
  generated_voice_id: string;
  labels?: Record<string, string>;
  played_not_selected_voice_ids?: string[];
};

export type CreateVoiceRequest = {
  body: Readonly<CreateVoiceBody>;
};

export type VoiceResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: VoiceClientError };
