import express from "express";
import { z } from "zod";

import type { VoiceDesignClient } from "./voices/client";
import { describeError, type VoiceClientError } from "./voices/errors";
import { OUTPUT_FORMATS } from "./voices/models";
import { designVoiceWarnings } from "./voices/validate";

// checked for content but forwarded exactly as received
const nonBlank = z.string().refine((s) => s.trim().length > 0, "must not be empty");

const DesignVoiceInput = z.object({
  description: nonBlank,
  outputFormat: z.enum(OUTPUT_FORMATS).optional(),
  text: z.string().optional(),
  model: z.string().optional(),
  autoGenerateText: z.boolean().optional(),
  loudness: z.number().optional(),
  seed: z.number().int().nonnegative().optional(),
  guidanceScale: z.number().optional(),
  streamPreviews: z.boolean().optional(),
  remixingSessionId: z.string().optional(),
  remixingSessionIterationId: z.string().optional(),
  quality: z.number().optional(),
  referenceAudioBase64: z.string().optional(),
  promptStrength: z.number().optional(),
});

const CreateVoiceInput = z.object({
  name: nonBlank,
  description: nonBlank,
  generatedVoiceId: nonBlank,
  labels: z.record(z.string()).optional(),
  playedNotSelectedVoiceIds: z.array(z.string()).optional(),
});

function inputError(error: z.ZodError): string {
  return error.issues.map((i) => `${i.path.join(".") || "body"}: ${i.message}`).join("; ");
}

export function statusForError(error: VoiceClientError): number {
  switch (error.kind) {
    case "authentication":
      return 401;
    case "quota_exceeded":
      return 402;
    case "rate_limited":
      return 429;
    case "validation":
      return 400;
    case "api":
    case "parse":
    case "request":
      return 502;
    default: {
      const _exhaustive: never = error;
      return _exhaustive;
    }
  }
}

function bodyParserErrorType(err: unknown): string | undefined {
  if (typeof err !== "object" || err === null || !("type" in err)) return undefined;
  return typeof err.type === "string" ? err.type : undefined;
}

function sendClientError(res: express.Response, error: VoiceClientError) {
  if (error.kind === "rate_limited" && error.retryAfter !== undefined) {
    res.setHeader("Retry-After", String(error.retryAfter));
  }
  res.status(statusForError(error)).json({ ok: false, kind: error.kind, error: describeError(error) });
}

export function createApp(client: VoiceDesignClient) {
  const app = express();
  app.use(express.json({ limit: "25mb" })); // reference audio arrives inline as base64

  app.get("/healthz", (_req, res) => res.status(200).send("ok"));

  app.post("/voices/design", async (req, res) => {
    try {
      const input = DesignVoiceInput.safeParse(req.body);
      if (!input.success) {
        res.status(400).json({ ok: false, error: inputError(input.error) });
        return;
      }

      const { description, ...overrides } = input.data;
      const builder = client.designVoice(description, overrides);

      for (const warning of designVoiceWarnings(builder.build())) {
        console.warn(`design voice: ${warning}`);
      }

      const result = await builder.execute();
      if (!result.ok) {
        console.error(`design voice failed: ${describeError(result.error)}`);
        sendClientError(res, result.error);
        return;
      }

      res.status(200).json({ ok: true, result: result.value });
    } catch (e) {
      console.error("design voice crashed", e);
      res.status(500).json({ ok: false, error: String(e) });
    }
  });

  app.post("/voices", async (req, res) => {
    try {
      const input = CreateVoiceInput.safeParse(req.body);
      if (!input.success) {
        res.status(400).json({ ok: false, error: inputError(input.error) });
        return;
      }

      const { name, description, generatedVoiceId, labels, playedNotSelectedVoiceIds } = input.data;
      let builder = client.createVoice(name, description, generatedVoiceId);
      if (labels) builder = builder.labels(labels);
      if (playedNotSelectedVoiceIds) builder = builder.playedNotSelectedVoiceIds(playedNotSelectedVoiceIds);

      const result = await builder.execute();
      if (!result.ok) {
        console.error(`create voice failed: ${describeError(result.error)}`);
        sendClientError(res, result.error);
        return;
      }

      res.status(200).json({ ok: true, voice: result.value });
    } catch (e) {
      console.error("create voice crashed", e);
      res.status(500).json({ ok: false, error: String(e) });
    }
  });

  app.use((err: unknown, _req: express.Request, res: express.Response, next: express.NextFunction) => {
    switch (bodyParserErrorType(err)) {
      case "entity.parse.failed":
        res.status(400).json({ ok: false, error: String(err) });
        return;
      case "entity.too.large":
        res.status(413).json({ ok: false, error: String(err) });
        return;
      default:
        next(err);
    }
  });

  return app;
}
