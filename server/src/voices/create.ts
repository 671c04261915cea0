import type { CreateVoiceBody, CreateVoiceOptions, CreateVoiceRequest, VoiceResult } from "./types";
import type { CreatedVoice } from "./schemas";

export type CreateVoiceSender = (
  req: CreateVoiceRequest,
  signal?: AbortSignal,
) => Promise<VoiceResult<CreatedVoice>>;

export function buildCreateVoiceRequest(opts: CreateVoiceOptions): CreateVoiceRequest {
  const body: CreateVoiceBody = {
    voice_name: opts.name,
    voice_description: opts.description,
    generated_voice_id: opts.generatedVoiceId,
  };

  // unset optionals are left out of the JSON entirely, never sent as null
  if (opts.labels !== undefined) body.labels = { ...opts.labels };
  if (opts.playedNotSelectedVoiceIds !== undefined) {
    body.played_not_selected_voice_ids = [...opts.playedNotSelectedVoiceIds];
  }

  return { body: Object.freeze(body) };
}

export class CreateVoiceBuilder {
  private readonly opts: Readonly<CreateVoiceOptions>;
  private readonly send: CreateVoiceSender;

  constructor(opts: CreateVoiceOptions, send: CreateVoiceSender) {
    this.opts = Object.freeze({ ...opts });
    this.send = send;
  }

  get options(): Readonly<CreateVoiceOptions> {
    return this.opts;
  }

  labels(labels: Record<string, string>): CreateVoiceBuilder {
    return new CreateVoiceBuilder({ ...this.opts, labels }, this.send);
  }

  /** Preview ids the user listened to but did not pick; fed back to the vendor. */
  playedNotSelectedVoiceIds(ids: string[]): CreateVoiceBuilder {
    return new CreateVoiceBuilder({ ...this.opts, playedNotSelectedVoiceIds: ids }, this.send);
  }

  build(): CreateVoiceRequest {
    return buildCreateVoiceRequest(this.opts);
  }

  execute(signal?: AbortSignal): Promise<VoiceResult<CreatedVoice>> {
    return this.send(this.build(), signal);
  }
}
