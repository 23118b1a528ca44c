/**
 * Sample Table model exports
 */

export type {
  GroupingColumn,
  SampleRow,
  SampleTable,
  RawSampleRow,
  RawSampleTable,
} from './SampleTable';

export {
  GROUPING_COLUMNS,
  DEFAULT_PARAMETER,
  hasColumn,
  activeColumns,
  normalizeSampleTable,
  displayOrder,
  uniqueInOrder,
} from './SampleTable';
