/**
 * Store Exports
 */

export {
  createTimelineStore,
  type TimelineStore,
  type TimelineStoreState,
  type TimelineStoreOptions,
} from './timelineStore';
