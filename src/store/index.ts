/**
 * Feed Recorder: Store Module
 */

export {
  merge,
  mergeIntoStore,
  mergeCollections,
  sortByTimestampDesc,
  loadExisting,
  writeAtomic,
  resolveStoreFormat,
  getCodec,
  type MergeOptions,
} from './merge';

export {
  jsonCodec,
  csvCodec,
  joinTopics,
  splitTopics,
  TOPIC_SEPARATOR,
  CODECS,
} from './codecs';
