import type { CreatedVoice, VoiceSettings } from "./schemas";

// vendor-side defaults applied to a voice that was created without explicit settings
export const DEFAULT_VOICE_SETTINGS: Readonly<Required<VoiceSettings>> = Object.freeze({
  stability: 0.5,
  use_speaker_boost: true,
  similarity_boost: 0.5,
  style: 0,
  speed: 1,
});

/** A voice is usable once it needs no verification or has passed it. */
export function isVoiceReady(voice: CreatedVoice): boolean {
  const v = voice.voice_verification;
  if (!v) return true;
  return !v.requires_verification || v.is_verified;
}

export function totalSampleDuration(voice: CreatedVoice): number {
  return (voice.samples ?? []).reduce((sum, s) => sum + (s.duration_secs ?? 0), 0);
}

export function isVoiceShared(voice: CreatedVoice): boolean {
  return voice.sharing?.status === "enabled";
}
