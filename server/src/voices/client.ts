import type { z } from "zod";

import { CreateVoiceBuilder } from "./create";
import { DesignVoiceBuilder } from "./design";
import {
  classifyHttpFailure,
  classifyTransportFailure,
  parseFailure,
  validationFailure,
} from "./errors";
import { DEFAULT_BASE_URL } from "./models";
import {
  CreatedVoiceSchema,
  DesignVoiceResultSchema,
  type CreatedVoice,
  type DesignVoiceResult,
} from "./schemas";
import type {
  CreateVoiceRequest,
  DesignVoiceOverrides,
  DesignVoiceRequest,
  VoiceResult,
} from "./types";
import { validateCreateVoiceRequest, validateDesignVoiceRequest } from "./validate";

export type VoiceDesignClientConfig = {
  apiKey: string;
  baseUrl?: string;           // vendor root, e.g. a test double or an enterprise endpoint
  strictValidation?: boolean; // check ranges locally before sending
  fetch?: typeof fetch;
};

export class VoiceDesignClient {
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly strictValidation: boolean;
  private readonly fetchImpl: typeof fetch;

  constructor(cfg: VoiceDesignClientConfig) {
    if (!cfg.apiKey) throw new Error("ELEVENLABS_API_KEY not set");

    this.apiKey = cfg.apiKey;
    this.baseUrl = (cfg.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, "");
    this.strictValidation = cfg.strictValidation ?? false;
    this.fetchImpl = cfg.fetch ?? ((input, init) => fetch(input, init));
  }

  static fromEnv(): VoiceDesignClient {
    const apiKey = process.env.ELEVENLABS_API_KEY ?? "";
    const baseUrl = process.env.ELEVENLABS_BASE_URL || undefined;
    const strictValidation = (process.env.ELEVENLABS_STRICT_VALIDATION ?? "").toLowerCase() === "true";

    if (!apiKey) {
      throw new Error("Missing ELEVENLABS_API_KEY");
    }

    return new VoiceDesignClient({ apiKey, baseUrl, strictValidation });
  }

  get endpoint(): string {
    return this.baseUrl;
  }

  designVoice(description: string, overrides: DesignVoiceOverrides = {}): DesignVoiceBuilder {
    return new DesignVoiceBuilder({ ...overrides, description }, (req, signal) =>
      this.sendDesignVoice(req, signal),
    );
  }

  createVoice(name: string, description: string, generatedVoiceId: string): CreateVoiceBuilder {
    return new CreateVoiceBuilder({ name, description, generatedVoiceId }, (req, signal) =>
      this.sendCreateVoice(req, signal),
    );
  }

  async sendDesignVoice(
    req: DesignVoiceRequest,
    signal?: AbortSignal,
  ): Promise<VoiceResult<DesignVoiceResult>> {
    if (this.strictValidation) {
      const issues = validateDesignVoiceRequest(req);
      if (issues.length > 0) return { ok: false, error: validationFailure(issues) };
    }

    const url = new URL(`${this.baseUrl}/text-to-voice/design`);
    url.searchParams.set("output_format", req.outputFormat);

    return this.post(url.toString(), req.body, DesignVoiceResultSchema, signal);
  }

  async sendCreateVoice(
    req: CreateVoiceRequest,
    signal?: AbortSignal,
  ): Promise<VoiceResult<CreatedVoice>> {
    if (this.strictValidation) {
      const issues = validateCreateVoiceRequest(req);
      if (issues.length > 0) return { ok: false, error: validationFailure(issues) };
    }

    return this.post(`${this.baseUrl}/text-to-voice`, req.body, CreatedVoiceSchema, signal);
  }

  private async post<T>(
    url: string,
    body: object,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    signal?: AbortSignal,
  ): Promise<VoiceResult<T>> {
    let resp: Response;
    try {
      resp = await this.fetchImpl(url, {
        method: "POST",
        headers: {
          "xi-api-key": this.apiKey,
          "Content-Type": "application/json",
        },
        body: JSON.stringify(body),
        signal,
      });
    } catch (e) {
      return { ok: false, error: classifyTransportFailure(e) };
    }

    // a status line has arrived; from here on the status drives classification
    let text: string;
    try {
      text = await resp.text();
    } catch (e) {
      if (resp.ok) return { ok: false, error: parseFailure(e) };
      text = "";
    }

    if (!resp.ok) {
      return { ok: false, error: classifyHttpFailure(resp.status, text, resp.headers.get("retry-after")) };
    }

    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch (e) {
      return { ok: false, error: parseFailure(e) };
    }

    const parsed = schema.safeParse(json);
    if (!parsed.success) return { ok: false, error: parseFailure(parsed.error) };

    return { ok: true, value: parsed.data };
  }
}
