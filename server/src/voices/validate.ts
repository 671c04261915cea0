import { z } from "zod";

import { ELEVEN_TTV_V3, OUTPUT_FORMATS } from "./models";
import type { CreateVoiceRequest, DesignVoiceRequest } from "./types";

const DesignVoiceBodySchema = z.object({
  voice_description: z.string().trim().min(1, "must not be empty"),
  model_id: z.string().min(1, "must not be empty"),
  text: z
    .string()
    // counted in code points, not UTF-16 units
    .refine((t) => [...t].length >= 100, "must be at least 100 characters")
    .refine((t) => [...t].length <= 1000, "must be at most 1000 characters")
    .optional(),
  auto_generate_text: z.boolean().optional(),
  loudness: z.number().min(-1, "must be >= -1").max(1, "must be <= 1"),
  seed: z
    .number()
    .int("must be an integer")
    .min(0, "must be >= 0")
    .max(4294967295, "must be <= 4294967295")
    .optional(),
  guidance_scale: z.number().min(0, "must be >= 0").max(100, "must be <= 100"),
  stream_previews: z.boolean(),
  remixing_session_id: z.string().optional(),
  remixing_session_iteration_id: z.string().optional(),
  quality: z.number().min(-1, "must be >= -1").max(1, "must be <= 1").optional(),
  reference_audio_base64: z.string().min(1, "must not be empty").optional(),
  prompt_strength: z.number().min(0, "must be >= 0").max(1, "must be <= 1").optional(),
});

const CreateVoiceBodySchema = z.object({
  voice_name: z.string().trim().min(1, "must not be empty"),
  voice_description: z.string().trim().min(1, "must not be empty"),
  generated_voice_id: z.string().trim().min(1, "must not be empty"),
  labels: z.record(z.string()).optional(),
  played_not_selected_voice_ids: z.array(z.string()).optional(),
});

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
}

/** Local range and length checks; an empty list means the request passes. */
export function validateDesignVoiceRequest(req: DesignVoiceRequest): string[] {
  const issues: string[] = [];

  if (!OUTPUT_FORMATS.some((f) => f === req.outputFormat)) {
    issues.push(`output_format: unknown format '${req.outputFormat}'`);
  }

  const parsed = DesignVoiceBodySchema.safeParse(req.body);
  if (!parsed.success) issues.push(...formatIssues(parsed.error));

  return issues;
}

export function validateCreateVoiceRequest(req: CreateVoiceRequest): string[] {
  const parsed = CreateVoiceBodySchema.safeParse(req.body);
  return parsed.success ? [] : formatIssues(parsed.error);
}

/**
 * Combinations the vendor accepts on the wire but rejects or ignores server side.
 * Never blocks a request.
 */
export function designVoiceWarnings(req: DesignVoiceRequest): string[] {
  const warnings: string[] = [];
  const { body } = req;

  if (body.reference_audio_base64 !== undefined && body.model_id !== ELEVEN_TTV_V3) {
    warnings.push(`reference_audio_base64 is only supported by ${ELEVEN_TTV_V3}, got ${body.model_id}`);
  }

  if (body.prompt_strength !== undefined) {
    if (body.model_id !== ELEVEN_TTV_V3) {
      warnings.push(`prompt_strength is only supported by ${ELEVEN_TTV_V3}, got ${body.model_id}`);
    }
    if (body.reference_audio_base64 === undefined) {
      warnings.push("prompt_strength has no effect without reference_audio_base64");
    }
  }

  return warnings;
}
