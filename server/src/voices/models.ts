export const ELEVEN_MULTILINGUAL_TTV_V2 = "eleven_multilingual_ttv_v2";
export const ELEVEN_TTV_V3 = "eleven_ttv_v3";

export type VoiceModelId = typeof ELEVEN_MULTILINGUAL_TTV_V2 | typeof ELEVEN_TTV_V3;

// codec_samplerate_bitrate; mp3_44100_192 needs Creator tier, pcm_44100 needs Pro tier
export const OUTPUT_FORMATS = [
  "mp3_22050_32",
  "mp3_44100_32",
  "mp3_44100_64",
  "mp3_44100_96",
  "mp3_44100_128",
  "mp3_44100_192",
  "pcm_8000",
  "pcm_16000",
  "pcm_22050",
  "pcm_24000",
  "pcm_44100",
  "pcm_48000",
  "ulaw_8000",
  "alaw_8000",
  "opus_48000_32",
  "opus_48000_64",
  "opus_48000_96",
] as const;

export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export const DEFAULT_BASE_URL = "https://api.elevenlabs.io/v1";

export const DESIGN_DEFAULTS = {
  outputFormat: "mp3_44100_128",
  model: ELEVEN_MULTILINGUAL_TTV_V2,
  loudness: 0.5,
  guidanceScale: 5,
  streamPreviews: false,
} as const satisfies {
  outputFormat: OutputFormat;
  model: VoiceModelId;
  loudness: number;
  guidanceScale: number;
  streamPreviews: boolean;
};
