export { VoiceDesignClient, type VoiceDesignClientConfig } from "./voices/client";
export { DesignVoiceBuilder, buildDesignVoiceRequest, type DesignVoiceSender } from "./voices/design";
export { CreateVoiceBuilder, buildCreateVoiceRequest, type CreateVoiceSender } from "./voices/create";
export {
  classifyHttpFailure,
  classifyTransportFailure,
  describeError,
  parseRetryAfter,
  type VoiceClientError,
  type VoiceClientErrorKind,
} from "./voices/errors";
export * from "./voices/models";
export * from "./voices/schemas";
export type * from "./voices/types";
export {
  designVoiceWarnings,
  validateCreateVoiceRequest,
  validateDesignVoiceRequest,
} from "./voices/validate";
export {
  DEFAULT_VOICE_SETTINGS,
  isVoiceReady,
  isVoiceShared,
  totalSampleDuration,
} from "./voices/created-voice";
