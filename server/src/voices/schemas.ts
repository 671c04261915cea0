import { z } from "zod";

export const VoicePreviewSchema = z.object({
  audio_base_64: z.string(),
  generated_voice_id: z.string(),
  media_type: z.string(),
  duration_secs: z.number(),
  language: z.string().nullish(),
});

export const DesignVoiceResultSchema = z.object({
  previews: z.array(VoicePreviewSchema),
  text: z.string(),
});

export const VoiceCategorySchema = z.enum([
  "generated",
  "cloned",
  "premade",
  "professional",
  "famous",
  "high_quality",
]);

const UtteranceSchema = z.object({
  start: z.number(),
  end: z.number(),
});

const SpeakerSchema = z.object({
  speaker_id: z.string(),
  duration_secs: z.number(),
  utterances: z.array(UtteranceSchema).nullish(),
});

const SpeakerSeparationSchema = z.object({
  voice_id: z.string(),
  sample_id: z.string(),
  status: z.enum(["not_started", "pending", "completed", "failed"]),
  speakers: z.record(SpeakerSchema).nullish(),
  selected_speaker_ids: z.array(z.string()).nullish(),
});

export const SampleSchema = z.object({
  sample_id: z.string().nullish(),
  file_name: z.string().nullish(),
  mime_type: z.string().nullish(),
  size_bytes: z.number().nullish(),
  hash: z.string().nullish(),
  duration_secs: z.number().nullish(),
  remove_background_noise: z.boolean().nullish(),
  has_isolated_audio: z.boolean().nullish(),
  has_isolated_audio_preview: z.boolean().nullish(),
  speaker_separation: SpeakerSeparationSchema.nullish(),
  trim_start: z.number().nullish(),
  trim_end: z.number().nullish(),
});

const RecordingSchema = z.object({
  recording_id: z.string(),
  mime_type: z.string(),
  size_bytes: z.number(),
  upload_date_unix: z.number(),
  transcription: z.string(),
});

const VerificationAttemptSchema = z.object({
  text: z.string(),
  date_unix: z.number(),
  accepted: z.boolean(),
  similarity: z.number(),
  levenshtein_distance: z.number(),
  recording: RecordingSchema.nullish(),
});

const ManualVerificationSchema = z.object({
  extra_text: z.string(),
  request_time_unix: z.number(),
  files: z.array(
    z.object({
      file_id: z.string(),
      file_name: z.string(),
      mime_type: z.string(),
      size_bytes: z.number(),
      upload_date_unix: z.number(),
    }),
  ),
});

export const FineTuningStateSchema = z.enum([
  "not_started",
  "queued",
  "fine_tuning",
  "fine_tuned",
  "failed",
  "delayed",
]);

const FineTuningSchema = z.object({
  is_allowed_to_fine_tune: z.boolean().nullish(),
  state: z.record(FineTuningStateSchema).nullish(),
  verification_failures: z.array(z.string()).nullish(),
  verification_attempts_count: z.number().nullish(),
  manual_verification_requested: z.boolean().nullish(),
  language: z.string().nullish(),
  progress: z.record(z.number()).nullish(),
  message: z.record(z.string()).nullish(),
  dataset_duration_seconds: z.number().nullish(),
  verification_attempts: z.array(VerificationAttemptSchema).nullish(),
  slice_ids: z.array(z.string()).nullish(),
  manual_verification: ManualVerificationSchema.nullish(),
  max_verification_attempts: z.number().nullish(),
  next_max_verification_attempts_reset_unix_ms: z.number().nullish(),
  finetuning_state: z.unknown(),
});

export const VoiceSettingsSchema = z.object({
  stability: z.number().nullish(),
  use_speaker_boost: z.boolean().nullish(),
  similarity_boost: z.number().nullish(),
  style: z.number().nullish(),
  speed: z.number().nullish(),
});

export const SharingStatusSchema = z.enum(["enabled", "disabled", "copied", "copied_disabled"]);

const ModerationCheckSchema = z.object({
  date_checked_unix: z.number().nullish(),
  name_value: z.string().nullish(),
  name_check: z.boolean().nullish(),
  description_value: z.string().nullish(),
  description_check: z.boolean().nullish(),
  sample_ids: z.array(z.string()).nullish(),
  sample_checks: z.array(z.number()).nullish(),
  captcha_ids: z.array(z.string()).nullish(),
  captcha_checks: z.array(z.number()).nullish(),
});

const VoiceSharingSchema = z.object({
  status: SharingStatusSchema.nullish(),
  history_item_sample_id: z.string().nullish(),
  date_unix: z.number().nullish(),
  whitelisted_emails: z.array(z.string()).nullish(),
  public_owner_id: z.string().nullish(),
  original_voice_id: z.string().nullish(),
  financial_rewards_enabled: z.boolean().nullish(),
  free_users_allowed: z.boolean().nullish(),
  live_moderation_enabled: z.boolean().nullish(),
  rate: z.number().nullish(),
  fiat_rate: z.number().nullish(),
  notice_period: z.number().nullish(),
  disable_at_unix: z.number().nullish(),
  voice_mixing_allowed: z.boolean().nullish(),
  featured: z.boolean().nullish(),
  category: VoiceCategorySchema.nullish(),
  reader_app_enabled: z.boolean().nullish(),
  image_url: z.string().nullish(),
  ban_reason: z.string().nullish(),
  liked_by_count: z.number().nullish(),
  cloned_by_count: z.number().nullish(),
  name: z.string().nullish(),
  description: z.string().nullish(),
  labels: z.record(z.string()).nullish(),
  review_status: z
    .enum(["not_requested", "pending", "declined", "allowed", "allowed_with_changes"])
    .nullish(),
  review_message: z.string().nullish(),
  enabled_in_library: z.boolean().nullish(),
  instagram_username: z.string().nullish(),
  twitter_username: z.string().nullish(),
  youtube_username: z.string().nullish(),
  tiktok_username: z.string().nullish(),
  moderation_check: ModerationCheckSchema.nullish(),
  reader_restricted_on: z
    .array(
      z.object({
        resource_type: z.enum(["read", "collection"]),
        resource_id: z.string(),
      }),
    )
    .nullish(),
});

const VerifiedLanguageSchema = z.object({
  language: z.string(),
  model_id: z.string(),
  accent: z.string().nullish(),
  locale: z.string().nullish(),
  preview_url: z.string().nullish(),
});

const VoiceVerificationSchema = z.object({
  requires_verification: z.boolean(),
  is_verified: z.boolean(),
  verification_failures: z.array(z.string()),
  verification_attempts_count: z.number(),
  language: z.string().nullish(),
  verification_attempts: z.array(VerificationAttemptSchema).nullish(),
});

export const CreatedVoiceSchema = z.object({
  voice_id: z.string(),
  name: z.string().nullish(),
  samples: z.array(SampleSchema).nullish(),
  category: VoiceCategorySchema.nullish(),
  fine_tuning: FineTuningSchema.nullish(),
  labels: z.record(z.string()).nullish(),
  description: z.string().nullish(),
  preview_url: z.string().nullish(),
  available_for_tiers: z.array(z.string()).nullish(),
  settings: VoiceSettingsSchema.nullish(),
  sharing: VoiceSharingSchema.nullish(),
  high_quality_base_model_ids: z.array(z.string()).nullish(),
  verified_languages: z.array(VerifiedLanguageSchema).nullish(),
  safety_control: z
    .enum(["NONE", "BAN", "CAPTCHA", "ENTERPRISE_BAN", "ENTERPRISE_CAPTCHA"])
    .nullish(),
  voice_verification: VoiceVerificationSchema.nullish(),
  permission_on_resource: z.string().nullish(),
  is_owner: z.boolean().nullish(),
  is_legacy: z.boolean().nullish(),
  is_mixed: z.boolean().nullish(),
  favorited_at_unix: z.number().nullish(),
  created_at_unix: z.number().nullish(),
});

export type VoicePreview = z.infer<typeof VoicePreviewSchema>;
export type DesignVoiceResult = z.infer<typeof DesignVoiceResultSchema>;
export type VoiceCategory = z.infer<typeof VoiceCategorySchema>;
export type VoiceSample = z.infer<typeof SampleSchema>;
export type VoiceSettings = z.infer<typeof VoiceSettingsSchema>;
export type SharingStatus = z.infer<typeof SharingStatusSchema>;
export type CreatedVoice = z.infer<typeof CreatedVoiceSchema>;
