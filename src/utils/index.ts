/**
 * Utility Exports
 */

export { getUserFriendlyError, getErrorSeverity, createErrorHandler } from './errorMessages';
export {
  IMAGE_EXTENSIONS,
  AUDIO_EXTENSIONS,
  getBasename,
  getExtension,
  getStem,
  inferKindFromPath,
  getStimulusFileFilter,
} from './stimulusPath';
export { timeToPixel, type TimelineScale } from './timeline';
export { renderTimelineText, type TimelineTextOptions } from './timelineText';
