/**
 * Schemas Index
 *
 * Exports all schema definitions for validation.
 */

export {
  // Native file format
  StimulusKindSchema,
  ImagePositionSchema,
  ImageEventDataSchema,
  AudioEventDataSchema,
  SerializedEventSchema,
  SerializedMetadataSchema,
  SerializedTimelineSchema,
  KNOWN_DATA_KEYS,
  parseSerializedTimeline,
  toErrorIssues,
  type ParsedSerializedEvent,
  type ParsedSerializedTimeline,
} from './timelineFileSchemas';

export {
  // Stimulus input
  OnsetMsSchema,
  DurationMsSchema,
  VolumeSchema,
  MarkerCodeSchema,
  FilePathSchema,
  ImagePayloadInputSchema,
  AudioPayloadInputSchema,
  ImageStimulusInputSchema,
  AudioStimulusInputSchema,
  StimulusInputSchema,
  validateStimulusEvent,
  assertValidStimulusEvent,
  type StimulusInput,
  type ImageStimulusInput,
  type AudioStimulusInput,
  type ValidStimulus,
  type StimulusValidationResult,
} from './stimulusSchemas';

export {
  // Tone generator
  AmplitudeSchema,
  ToneDurationSchema,
  ToneRequestSchema,
  FrequencyRangeRequestSchema,
  type ToneRequest,
  type FrequencyRangeRequest,
} from './toneSchemas';
